import { ResolutionError } from '../../core/errors/DeviceError';
import { DeviceDescriptor, DeviceRegistry } from './DeviceRegistry';

/**
 * What a dispatch is aimed at: explicit devices, or one group
 */
export type TargetSpec =
  | { devices: readonly string[] }
  | { group: string };

export function describeTarget(target: TargetSpec): string {
  return 'group' in target
    ? `group:${target.group.toLowerCase()}`
    : `devices:${target.devices.map(name => name.toLowerCase()).join(',')}`;
}

/**
 * Expands a target into concrete devices, always in registration order
 */
export class GroupResolver {
  constructor(private readonly registry: DeviceRegistry) {}

  resolveTarget(target: TargetSpec): readonly DeviceDescriptor[] {
    if ('group' in target) {
      const members = this.registry.groupMembers(target.group);
      if (members.length === 0) {
        throw new ResolutionError(`Group "${target.group}" has no devices`, target.group);
      }
      return members;
    }

    if (target.devices.length === 0) {
      throw new ResolutionError('No devices given');
    }

    const selected = new Set<DeviceDescriptor>();
    for (const name of target.devices) {
      selected.add(this.registry.resolve(name));
    }

    return [...selected].sort((a, b) => this.registry.indexOf(a) - this.registry.indexOf(b));
  }
}
