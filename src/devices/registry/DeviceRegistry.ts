import { ConfigurationError, ResolutionError } from '../../core/errors/DeviceError';
import { NetworkAddress } from '../transport/LineTransport';
import { PJLINK_DEFAULT_PORT } from '../protocol/PJLinkCodec';

export const ALL_GROUP = 'all';

/**
 * One projector as described by configuration
 */
export interface DeviceDescriptor {
  readonly id: string;
  readonly name: string;
  readonly address: Readonly<NetworkAddress>;
  readonly groups: ReadonlySet<string>;
  readonly aliases: readonly string[];
  readonly location?: string;
}

/**
 * Device entry as it appears in configuration
 */
export interface DeviceDefinition {
  id: string;
  host: string;
  port?: number;
  name?: string;
  groups?: string[];
  aliases?: string[];
  location?: string;
}

export interface RegistrySource {
  devices: DeviceDefinition[];
  /** alias -> nickname */
  aliases?: Record<string, string>;
}

function normalize(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Device Registry
 * Immutable lookup of projectors by nickname, alias and group
 */
export class DeviceRegistry {
  private readonly devices: readonly DeviceDescriptor[];
  private readonly byName: ReadonlyMap<string, DeviceDescriptor>;
  private readonly groups: ReadonlyMap<string, readonly DeviceDescriptor[]>;

  private constructor(
    devices: DeviceDescriptor[],
    byName: Map<string, DeviceDescriptor>,
    groups: Map<string, DeviceDescriptor[]>
  ) {
    this.devices = Object.freeze(devices);
    this.byName = byName;
    this.groups = groups;
  }

  /**
   * Build a registry, collecting every conflict before failing
   */
  static fromSource(source: RegistrySource): DeviceRegistry {
    const issues: string[] = [];
    const devices: DeviceDescriptor[] = [];
    const byName = new Map<string, DeviceDescriptor>();
    const aliasOwners = new Map<string, string>();

    for (const [index, definition] of source.devices.entries()) {
      const id = normalize(definition.id);
      if (!id) {
        issues.push(`devices[${index}]: nickname is empty`);
        continue;
      }
      if (byName.has(id)) {
        issues.push(`devices[${index}]: duplicate nickname "${id}"`);
        continue;
      }
      if (!definition.host || !definition.host.trim()) {
        issues.push(`devices[${index}] (${id}): host is empty`);
        continue;
      }

      const port = definition.port ?? PJLINK_DEFAULT_PORT;
      if (!Number.isInteger(port) || port < 1 || port > 65535) {
        issues.push(`devices[${index}] (${id}): port ${port} is out of range`);
        continue;
      }

      const descriptor: DeviceDescriptor = Object.freeze({
        id,
        name: definition.name?.trim() || definition.id.trim(),
        address: Object.freeze({ host: definition.host.trim(), port }),
        groups: new Set((definition.groups ?? []).map(normalize).filter(group => group.length > 0)),
        aliases: Object.freeze([...new Set((definition.aliases ?? []).map(normalize))]),
        location: definition.location
      });

      devices.push(descriptor);
      byName.set(id, descriptor);
    }

    const claimAlias = (alias: string, target: string, where: string) => {
      if (!alias) {
        issues.push(`${where}: alias is empty`);
        return;
      }
      if (alias === target) {
        return;
      }
      const owner = aliasOwners.get(alias);
      if (owner !== undefined && owner !== target) {
        issues.push(`${where}: alias "${alias}" points to both "${owner}" and "${target}"`);
        return;
      }
      if (byName.has(alias)) {
        issues.push(`${where}: alias "${alias}" is already the nickname of another device`);
        return;
      }
      aliasOwners.set(alias, target);
    };

    for (const device of devices) {
      for (const alias of device.aliases) {
        claimAlias(alias, device.id, `devices.${device.id}.aliases`);
      }
    }

    for (const [rawAlias, rawTarget] of Object.entries(source.aliases ?? {})) {
      const target = normalize(rawTarget);
      if (!byName.has(target)) {
        issues.push(`aliases.${rawAlias}: unknown device "${rawTarget}"`);
        continue;
      }
      claimAlias(normalize(rawAlias), target, `aliases.${rawAlias}`);
    }

    if (issues.length > 0) {
      throw new ConfigurationError(`Invalid device registry: ${issues.join('; ')}`, issues);
    }

    const lookup = new Map<string, DeviceDescriptor>(byName);
    for (const [alias, target] of aliasOwners) {
      const device = byName.get(target);
      if (device) {
        lookup.set(alias, device);
      }
    }

    const groups = new Map<string, DeviceDescriptor[]>();
    for (const device of devices) {
      for (const group of device.groups) {
        const members = groups.get(group) ?? [];
        members.push(device);
        groups.set(group, members);
      }
    }
    groups.set(ALL_GROUP, [...devices]);

    return new DeviceRegistry(devices, lookup, groups);
  }

  /**
   * Resolve a nickname or alias, case-insensitively
   */
  resolve(nameOrAlias: string): DeviceDescriptor {
    const device = this.find(nameOrAlias);
    if (!device) {
      throw new ResolutionError(`Unknown device "${nameOrAlias}"`, nameOrAlias);
    }
    return device;
  }

  find(nameOrAlias: string): DeviceDescriptor | undefined {
    return this.byName.get(normalize(nameOrAlias));
  }

  /**
   * Every device, in registration order
   */
  list(): readonly DeviceDescriptor[] {
    return this.devices;
  }

  get size(): number {
    return this.devices.length;
  }

  hasGroup(group: string): boolean {
    return this.groups.has(normalize(group));
  }

  /**
   * Members of a group in registration order; `all` is always defined
   */
  groupMembers(group: string): readonly DeviceDescriptor[] {
    const members = this.groups.get(normalize(group));
    if (!members) {
      throw new ResolutionError(`Unknown group "${group}"`, group);
    }
    return members;
  }

  groupNames(): string[] {
    return [...this.groups.keys()].sort();
  }

  /**
   * Position of a device in registration order
   */
  indexOf(device: DeviceDescriptor): number {
    return this.devices.indexOf(device);
  }
}
