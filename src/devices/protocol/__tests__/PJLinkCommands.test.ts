import {
  describeCommand,
  formatWire,
  isActive,
  isStatusVerb,
  isSwitchVerb,
  queryCommand,
  setCommand,
  stateAfterSet
} from '../PJLinkCommands';
import { FreezeState, MuteState, PowerState } from '../../../core/types/DeviceState';

describe('PJLinkCommands', () => {
  test('should classify verbs', () => {
    expect(isSwitchVerb('power')).toBe(true);
    expect(isSwitchVerb('lamp-hours')).toBe(false);
    expect(isStatusVerb('error-status')).toBe(true);
    expect(isStatusVerb('mute')).toBe(false);
  });

  test('should use class 2 for freeze only', () => {
    expect(queryCommand('freeze')).toEqual({ cls: '2', mnemonic: 'FREZ', arg: '?' });
    expect(queryCommand('input')).toEqual({ cls: '1', mnemonic: 'INPT', arg: '?' });
    expect(queryCommand('error-status')).toEqual({ cls: '1', mnemonic: 'ERST', arg: '?' });
  });

  test('should format wire commands for logs', () => {
    expect(formatWire(setCommand('mute', true))).toBe('%1AVMT 31');
    expect(describeCommand({ verb: 'power', action: 'toggle' })).toBe('power toggle');
  });

  test('should predict the state after a set', () => {
    expect(stateAfterSet('power', true)).toEqual({ verb: 'power', value: PowerState.ON });
    expect(stateAfterSet('mute', false)).toEqual({ verb: 'mute', value: MuteState.UNMUTED });
    expect(stateAfterSet('freeze', true)).toEqual({ verb: 'freeze', value: FreezeState.FROZEN });
  });

  test('should count warming as on and cooling as off', () => {
    expect(isActive({ verb: 'power', value: PowerState.ON })).toBe(true);
    expect(isActive({ verb: 'power', value: PowerState.WARMING })).toBe(true);
    expect(isActive({ verb: 'power', value: PowerState.COOLING })).toBe(false);
    expect(isActive({ verb: 'power', value: PowerState.OFF })).toBe(false);
    expect(isActive({ verb: 'mute', value: MuteState.MUTED })).toBe(true);
    expect(isActive({ verb: 'freeze', value: FreezeState.NORMAL })).toBe(false);
  });

  test('should refuse an on/off reading of status values', () => {
    expect(() => isActive({ verb: 'input', value: { raw: '31', type: 'DIGITAL', channel: '1' } })).toThrow(
      'input has no on/off state'
    );
  });
});
