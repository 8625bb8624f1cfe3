import chalk from 'chalk';
import { ConfigurationError, ResolutionError } from '../core/errors/DeviceError';
import { DeviceStatus } from '../devices/controller/FleetController';
import { GroupReport } from '../devices/controller/GroupReport';
import { SwitchAction } from '../devices/protocol/PJLinkCommands';
import { ALL_GROUP, DeviceRegistry } from '../devices/registry/DeviceRegistry';
import { TargetSpec } from '../devices/registry/GroupResolver';
import { DeviceResult, formatValue } from '../devices/session/DeviceResult';

export const EXIT_OK = 0;
export const EXIT_DEVICE_FAILURE = 1;
export const EXIT_USAGE = 2;

/**
 * Explicit devices win over a group; nothing given means every device
 */
export function targetFrom(devices: readonly string[], group?: string): TargetSpec {
  if (devices.length > 0) {
    return { devices };
  }
  return { group: group ?? ALL_GROUP };
}

/**
 * Map the word used on the command line to a command action
 */
export function switchActionFrom(word: string): SwitchAction {
  switch (word.toLowerCase()) {
    case 'on':
      return 'on';
    case 'off':
      return 'off';
    case 'toggle':
      return 'toggle';
    case 'status':
    case 'query':
      return 'query';
    default:
      throw new ResolutionError(`Unknown action "${word}" (expected on, off, toggle or status)`, word);
  }
}

export function exitCodeFor(error: unknown): number {
  return error instanceof ResolutionError || error instanceof ConfigurationError ? EXIT_USAGE : EXIT_DEVICE_FAILURE;
}

export function reportExitCode(report: GroupReport): number {
  return report.allSucceeded ? EXIT_OK : EXIT_DEVICE_FAILURE;
}

export function statusExitCode(devices: readonly DeviceStatus[]): number {
  return devices.every(device => device.failures.length === 0) ? EXIT_OK : EXIT_DEVICE_FAILURE;
}

export function formatResult(result: DeviceResult): string {
  if (result.ok) {
    return `${result.deviceId}: ${formatValue(result)}`;
  }
  return `${result.deviceId}: ${result.kind} ${result.error.message}`;
}

export function renderReport(report: GroupReport): string[] {
  const lines = report.all().map(result =>
    result.ok ? `${chalk.green('✔')} ${formatResult(result)}` : `${chalk.red('✖')} ${formatResult(result)}`
  );
  lines.push(report.allSucceeded ? chalk.green(report.summary()) : chalk.yellow(report.summary()));
  return lines;
}

export function formatStatus(status: DeviceStatus): string {
  if (!status.online) {
    const reason = status.failures[0]?.message ?? 'unreachable';
    return `${status.deviceId}: offline (${reason})`;
  }

  const parts: string[] = [];
  if (status.power) parts.push(`power=${status.power}`);
  if (status.mute) parts.push(`mute=${status.mute}`);
  if (status.freeze) parts.push(`freeze=${status.freeze}`);
  if (status.lamp) parts.push(`lamp=${status.lamp.hours}h`);
  if (status.input) parts.push(`input=${status.input.type} ${status.input.channel}`);
  if (status.errorStatus) parts.push(`errors=${status.errorStatus.raw}`);
  if (status.failures.length > 0) parts.push(`${status.failures.length} failed`);

  return `${status.deviceId}: ${parts.join(', ')}`;
}

export function renderStatus(devices: readonly DeviceStatus[]): string[] {
  return devices.map(status => {
    const mark = !status.online ? chalk.red('✖') : status.failures.length > 0 ? chalk.yellow('!') : chalk.green('✔');
    return `${mark} ${formatStatus(status)}`;
  });
}

export function formatDevice(registry: DeviceRegistry, id: string): string {
  const device = registry.resolve(id);
  const details = [`${device.address.host}:${device.address.port}`];
  if (device.groups.size > 0) details.push(`groups: ${[...device.groups].join(', ')}`);
  if (device.aliases.length > 0) details.push(`aliases: ${device.aliases.join(', ')}`);
  if (device.location) details.push(`location: ${device.location}`);
  return `${device.id} (${device.name}) ${details.join('; ')}`;
}

export function renderDeviceList(registry: DeviceRegistry): string[] {
  const lines = registry.list().map(device => formatDevice(registry, device.id));
  lines.push('');
  lines.push(chalk.bold('Groups:'));
  for (const group of registry.groupNames()) {
    const members = registry.groupMembers(group).map(device => device.id);
    lines.push(`  ${group}: ${members.join(', ')}`);
  }
  return lines;
}
