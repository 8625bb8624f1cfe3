import {
  ErrorLevel,
  ErrorStatus,
  FreezeState,
  InputSource,
  InputType,
  LampInfo,
  MuteState,
  PowerState
} from '../../core/types/DeviceState';
import { PJLinkErrorCode } from '../../core/errors/DeviceError';
import {
  CommandValue,
  Mnemonic,
  PJLinkClass,
  Verb,
  WireCommand,
  formatWire
} from './PJLinkCommands';

export const PJLINK_TERMINATOR = '\r';
export const PJLINK_DEFAULT_PORT = 4352;
export const PJLINK_MAX_LINE = 136;

const MNEMONICS: readonly Mnemonic[] = ['POWR', 'AVMT', 'FREZ', 'LAMP', 'INPT', 'ERST'];
const ACK = 'OK';
const GREETING_PREFIX = 'PJLINK ';

/**
 * Decode Error Types
 */
export enum DecodeErrorType {
  MISSING_TERMINATOR = 'MISSING_TERMINATOR',
  BAD_PREFIX = 'BAD_PREFIX',
  VERB_MISMATCH = 'VERB_MISMATCH',
  MALFORMED = 'MALFORMED',
  UNKNOWN_ERROR_CODE = 'UNKNOWN_ERROR_CODE',
  INVALID_VALUE = 'INVALID_VALUE',
  BAD_GREETING = 'BAD_GREETING'
}

/**
 * A line that does not fit the grammar. The connection it came from is
 * out of sync and must not be reused.
 */
export class DecodeError extends Error {
  constructor(
    public readonly type: DecodeErrorType,
    message: string,
    public readonly line?: string
  ) {
    super(message);
    this.name = 'DecodeError';
  }
}

export type ParsedResponse =
  | { status: 'ack'; cls: PJLinkClass; mnemonic: Mnemonic }
  | { status: 'value'; cls: PJLinkClass; mnemonic: Mnemonic; value: string }
  | { status: 'error'; cls: PJLinkClass; mnemonic: Mnemonic; code: PJLinkErrorCode };

export type Greeting =
  | { authRequired: false }
  | { authRequired: true; seed: string }
  | { authRequired: true; rejected: true };

const ERROR_CODES: ReadonlyMap<string, PJLinkErrorCode> = new Map<string, PJLinkErrorCode>([
  ['ERR1', PJLinkErrorCode.UNDEFINED_COMMAND],
  ['ERR2', PJLinkErrorCode.OUT_OF_PARAMETER],
  ['ERR3', PJLinkErrorCode.UNAVAILABLE_TIME],
  ['ERR4', PJLinkErrorCode.PROJECTOR_FAILURE],
  ['ERRA', PJLinkErrorCode.AUTHENTICATION]
]);

export function encode(command: WireCommand): string {
  return `${formatWire(command)}${PJLINK_TERMINATOR}`;
}

function printable(line: string): string {
  return JSON.stringify(line);
}

function stripTerminator(line: string): string {
  if (!line.endsWith(PJLINK_TERMINATOR)) {
    throw new DecodeError(
      DecodeErrorType.MISSING_TERMINATOR,
      `Missing terminator in ${printable(line)}`,
      line
    );
  }
  return line.slice(0, -PJLINK_TERMINATOR.length);
}

function isClass(value: string): value is PJLinkClass {
  return value === '1' || value === '2';
}

export function isMnemonic(value: string): value is Mnemonic {
  return (MNEMONICS as readonly string[]).includes(value);
}

/**
 * Decode a response line against the command that was sent
 */
export function decode(line: string, sent: WireCommand): ParsedResponse {
  const body = stripTerminator(line);

  if (!body.startsWith('%')) {
    throw new DecodeError(DecodeErrorType.BAD_PREFIX, `Response does not start with '%': ${printable(line)}`, line);
  }

  const header = body.slice(1, 6);
  if (header !== `${sent.cls}${sent.mnemonic}`) {
    throw new DecodeError(
      DecodeErrorType.VERB_MISMATCH,
      `Expected reply to %${sent.cls}${sent.mnemonic}, got ${printable(line)}`,
      line
    );
  }

  if (body.charAt(6) !== '=') {
    throw new DecodeError(DecodeErrorType.MALFORMED, `Missing '=' in ${printable(line)}`, line);
  }

  const value = body.slice(7);
  if (value.length === 0) {
    throw new DecodeError(DecodeErrorType.MALFORMED, `Empty value in ${printable(line)}`, line);
  }

  const base = { cls: sent.cls, mnemonic: sent.mnemonic };

  if (value.startsWith('ERR')) {
    const code = ERROR_CODES.get(value);
    if (!code) {
      throw new DecodeError(DecodeErrorType.UNKNOWN_ERROR_CODE, `Unknown error code ${value}`, line);
    }
    return { ...base, status: 'error', code };
  }

  if (value === ACK) {
    return { ...base, status: 'ack' };
  }

  return { ...base, status: 'value', value };
}

/**
 * Decode the banner a device sends right after accepting a connection
 */
export function decodeGreeting(line: string): Greeting {
  const body = stripTerminator(line);
  const upper = body.toUpperCase();

  if (!upper.startsWith(GREETING_PREFIX)) {
    throw new DecodeError(DecodeErrorType.BAD_GREETING, `Unexpected greeting ${printable(line)}`, line);
  }

  const rest = body.slice(GREETING_PREFIX.length);
  if (rest === '0') {
    return { authRequired: false };
  }
  if (rest.toUpperCase() === 'ERRA') {
    return { authRequired: true, rejected: true };
  }
  if (rest.startsWith('1 ') && rest.length > 2) {
    return { authRequired: true, seed: rest.slice(2) };
  }

  throw new DecodeError(DecodeErrorType.BAD_GREETING, `Unexpected greeting ${printable(line)}`, line);
}

function invalid(verb: Verb, value: string): DecodeError {
  return new DecodeError(DecodeErrorType.INVALID_VALUE, `Invalid ${verb} value ${printable(value)}`);
}

const POWER_VALUES: ReadonlyMap<string, PowerState> = new Map<string, PowerState>([
  ['0', PowerState.OFF],
  ['1', PowerState.ON],
  ['2', PowerState.COOLING],
  ['3', PowerState.WARMING]
]);

// Video mute (11, 31) blanks the screen; audio-only mute (21) does not
const MUTE_VALUES: ReadonlyMap<string, MuteState> = new Map<string, MuteState>([
  ['10', MuteState.UNMUTED],
  ['11', MuteState.MUTED],
  ['20', MuteState.UNMUTED],
  ['21', MuteState.UNMUTED],
  ['30', MuteState.UNMUTED],
  ['31', MuteState.MUTED]
]);

const FREEZE_VALUES: ReadonlyMap<string, FreezeState> = new Map<string, FreezeState>([
  ['0', FreezeState.NORMAL],
  ['1', FreezeState.FROZEN]
]);

const INPUT_TYPES: ReadonlyMap<string, InputType> = new Map<string, InputType>([
  ['1', 'RGB'],
  ['2', 'VIDEO'],
  ['3', 'DIGITAL'],
  ['4', 'STORAGE'],
  ['5', 'NETWORK'],
  ['6', 'INTERNAL']
]);

const ERROR_LEVELS: Record<string, ErrorLevel> = {
  '0': 'ok',
  '1': 'warning',
  '2': 'error'
};

function parseLamps(value: string): LampInfo[] {
  const parts = value.split(' ');
  if (parts.length % 2 !== 0) {
    throw invalid('lamp-hours', value);
  }

  const lamps: LampInfo[] = [];
  for (let i = 0; i < parts.length; i += 2) {
    const hours = parts[i];
    const on = parts[i + 1];
    if (!/^\d{1,5}$/.test(hours) || (on !== '0' && on !== '1')) {
      throw invalid('lamp-hours', value);
    }
    lamps.push({ hours: Number(hours), on: on === '1' });
  }
  return lamps;
}

function parseInput(value: string): InputSource {
  const type = INPUT_TYPES.get(value.charAt(0));
  const channel = value.charAt(1);
  if (value.length !== 2 || !type || !/^[1-9A-Z]$/.test(channel)) {
    throw invalid('input', value);
  }
  return { raw: value, type, channel };
}

function parseErrorStatus(value: string): ErrorStatus {
  if (!/^[0-2]{6}$/.test(value)) {
    throw invalid('error-status', value);
  }
  const level = (index: number): ErrorLevel => ERROR_LEVELS[value.charAt(index)];
  return {
    raw: value,
    fan: level(0),
    lamp: level(1),
    temperature: level(2),
    coverOpen: level(3),
    filter: level(4),
    other: level(5)
  };
}

/**
 * Turn the value field of a query reply into its typed form
 */
export function interpretValue(verb: Verb, value: string): CommandValue {
  switch (verb) {
    case 'power': {
      const state = POWER_VALUES.get(value);
      if (!state) throw invalid(verb, value);
      return { verb, value: state };
    }
    case 'mute': {
      const state = MUTE_VALUES.get(value);
      if (!state) throw invalid(verb, value);
      return { verb, value: state };
    }
    case 'freeze': {
      const state = FREEZE_VALUES.get(value);
      if (!state) throw invalid(verb, value);
      return { verb, value: state };
    }
    case 'lamp-hours': {
      const lamps = parseLamps(value);
      return { verb, value: { hours: lamps[0].hours, lamps } };
    }
    case 'input':
      return { verb, value: parseInput(value) };
    case 'error-status':
      return { verb, value: parseErrorStatus(value) };
  }
}

// Server side, used by the mock projector

/**
 * A command as received by a device. The mnemonic may be one we do not know.
 */
export interface IncomingCommand {
  cls: PJLinkClass;
  mnemonic: string;
  arg: string;
}

/**
 * Parse an incoming command line (terminator included)
 */
export function parseCommandLine(line: string): IncomingCommand {
  const body = stripTerminator(line);

  if (!body.startsWith('%')) {
    throw new DecodeError(DecodeErrorType.BAD_PREFIX, `Command does not start with '%': ${printable(line)}`, line);
  }

  const cls = body.charAt(1);
  const mnemonic = body.slice(2, 6).toUpperCase();
  if (!isClass(cls) || !/^[A-Z]{4}$/.test(mnemonic) || body.charAt(6) !== ' ') {
    throw new DecodeError(DecodeErrorType.MALFORMED, `Malformed command ${printable(line)}`, line);
  }

  const arg = body.slice(7);
  if (arg.length === 0) {
    throw new DecodeError(DecodeErrorType.MALFORMED, `Missing argument in ${printable(line)}`, line);
  }

  return { cls, mnemonic, arg };
}

export function encodeResponse(cls: string, mnemonic: string, value: string): string {
  return `%${cls}${mnemonic}=${value}${PJLINK_TERMINATOR}`;
}

export function encodeGreeting(seed?: string): string {
  return seed === undefined
    ? `${GREETING_PREFIX}0${PJLINK_TERMINATOR}`
    : `${GREETING_PREFIX}1 ${seed}${PJLINK_TERMINATOR}`;
}

const MNEMONIC_VERBS: Record<Mnemonic, Verb> = {
  POWR: 'power',
  AVMT: 'mute',
  FREZ: 'freeze',
  LAMP: 'lamp-hours',
  INPT: 'input',
  ERST: 'error-status'
};

export function verbFor(mnemonic: Mnemonic): Verb {
  return MNEMONIC_VERBS[mnemonic];
}
