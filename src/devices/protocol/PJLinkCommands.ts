import {
  ErrorStatus,
  FreezeState,
  InputSource,
  LampStatus,
  MuteState,
  PowerState
} from '../../core/types/DeviceState';

export type SwitchVerb = 'power' | 'mute' | 'freeze';
export type StatusVerb = 'lamp-hours' | 'input' | 'error-status';
export type Verb = SwitchVerb | StatusVerb;

export type SwitchAction = 'on' | 'off' | 'query' | 'toggle';

/**
 * One logical command. Toggle never reaches the wire as such.
 */
export type CommandRequest =
  | { verb: SwitchVerb; action: SwitchAction }
  | { verb: StatusVerb; action: 'query' };

/**
 * Value type carried by a successful result, per verb
 */
export interface CommandValueMap {
  power: PowerState;
  mute: MuteState;
  freeze: FreezeState;
  'lamp-hours': LampStatus;
  input: InputSource;
  'error-status': ErrorStatus;
}

export type CommandValue = {
  [V in Verb]: { verb: V; value: CommandValueMap[V] };
}[Verb];

export type PJLinkClass = '1' | '2';
export type Mnemonic = 'POWR' | 'AVMT' | 'FREZ' | 'LAMP' | 'INPT' | 'ERST';

/**
 * A concrete line-level command: class, mnemonic and argument
 */
export interface WireCommand {
  cls: PJLinkClass;
  mnemonic: Mnemonic;
  arg: string;
}

export const QUERY_ARG = '?';

export const VERB_TABLE: Record<Verb, { cls: PJLinkClass; mnemonic: Mnemonic }> = {
  power: { cls: '1', mnemonic: 'POWR' },
  mute: { cls: '1', mnemonic: 'AVMT' },
  freeze: { cls: '2', mnemonic: 'FREZ' },
  'lamp-hours': { cls: '1', mnemonic: 'LAMP' },
  input: { cls: '1', mnemonic: 'INPT' },
  'error-status': { cls: '1', mnemonic: 'ERST' }
};

const SET_ARGS: Record<SwitchVerb, { on: string; off: string }> = {
  power: { on: '1', off: '0' },
  mute: { on: '31', off: '30' },
  freeze: { on: '1', off: '0' }
};

export const SWITCH_VERBS: readonly SwitchVerb[] = ['power', 'mute', 'freeze'];
export const STATUS_VERBS: readonly StatusVerb[] = ['lamp-hours', 'input', 'error-status'];

export function isSwitchVerb(verb: string): verb is SwitchVerb {
  return (SWITCH_VERBS as readonly string[]).includes(verb);
}

export function isStatusVerb(verb: string): verb is StatusVerb {
  return (STATUS_VERBS as readonly string[]).includes(verb);
}

export function queryCommand(verb: Verb): WireCommand {
  const { cls, mnemonic } = VERB_TABLE[verb];
  return { cls, mnemonic, arg: QUERY_ARG };
}

export function setCommand(verb: SwitchVerb, on: boolean): WireCommand {
  const { cls, mnemonic } = VERB_TABLE[verb];
  return { cls, mnemonic, arg: on ? SET_ARGS[verb].on : SET_ARGS[verb].off };
}

/**
 * State a successful set leaves the device in, used for the optimistic cache
 */
export function stateAfterSet(verb: SwitchVerb, on: boolean): CommandValue {
  switch (verb) {
    case 'power':
      return { verb, value: on ? PowerState.ON : PowerState.OFF };
    case 'mute':
      return { verb, value: on ? MuteState.MUTED : MuteState.UNMUTED };
    case 'freeze':
      return { verb, value: on ? FreezeState.FROZEN : FreezeState.NORMAL };
  }
}

/**
 * Reduce a switch state to on/off. A warming projector counts as on,
 * a cooling one as off.
 */
export function isActive(value: CommandValue): boolean {
  switch (value.verb) {
    case 'power':
      return value.value === PowerState.ON || value.value === PowerState.WARMING;
    case 'mute':
      return value.value === MuteState.MUTED;
    case 'freeze':
      return value.value === FreezeState.FROZEN;
    default:
      throw new Error(`${value.verb} has no on/off state`);
  }
}

export function describeCommand(command: CommandRequest): string {
  return `${command.verb} ${command.action}`;
}

export function formatWire(command: WireCommand): string {
  return `%${command.cls}${command.mnemonic} ${command.arg}`;
}
