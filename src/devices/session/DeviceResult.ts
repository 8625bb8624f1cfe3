import { DeviceError, ErrorKind } from '../../core/errors/DeviceError';
import { CommandRequest, CommandValue } from '../protocol/PJLinkCommands';

export type DeviceSuccess = CommandValue & {
  ok: true;
  deviceId: string;
  command: CommandRequest;
  attempts: number;
};

export interface DeviceFailure {
  ok: false;
  deviceId: string;
  command: CommandRequest;
  kind: ErrorKind;
  error: DeviceError;
  attempts: number;
}

/**
 * Outcome of one command against one device
 */
export type DeviceResult = DeviceSuccess | DeviceFailure;

export function isSuccess(result: DeviceResult): result is DeviceSuccess {
  return result.ok;
}

export function isFailure(result: DeviceResult): result is DeviceFailure {
  return !result.ok;
}

/**
 * Short display form of a successful value
 */
export function formatValue(result: DeviceSuccess): string {
  switch (result.verb) {
    case 'power':
    case 'mute':
    case 'freeze':
      return result.value;
    case 'lamp-hours':
      return result.value.lamps
        .map((lamp, index) => `lamp ${index + 1}: ${lamp.hours}h${lamp.on ? '' : ' (off)'}`)
        .join(', ');
    case 'input':
      return `${result.value.type} ${result.value.channel}`;
    case 'error-status': {
      const status = result.value;
      const problems = (['fan', 'lamp', 'temperature', 'coverOpen', 'filter', 'other'] as const)
        .filter(key => status[key] !== 'ok')
        .map(key => `${key}=${status[key]}`);
      return problems.length === 0 ? 'no errors' : problems.join(', ');
    }
  }
}
