import {
  CommsFault,
  ConnectFault,
  DeviceError,
  PJLinkErrorCode,
  ProtocolError
} from '../../core/errors/DeviceError';
import { Logger, LogMeta, defaultLogger } from '../../core/logging/Logger';
import { DeviceState } from '../../core/types/DeviceState';
import {
  CommandRequest,
  CommandValue,
  SwitchVerb,
  Verb,
  WireCommand,
  describeCommand,
  formatWire,
  isActive,
  queryCommand,
  setCommand,
  stateAfterSet
} from '../protocol/PJLinkCommands';
import {
  DecodeError,
  DecodeErrorType,
  ParsedResponse,
  decode,
  decodeGreeting,
  encode,
  interpretValue
} from '../protocol/PJLinkCodec';
import { DeviceDescriptor } from '../registry/DeviceRegistry';
import { LineTransport, TransportError, TransportFactory, formatAddress } from '../transport/LineTransport';
import { TcpTransportFactory } from '../transport/TcpLineTransport';
import { DeviceResult } from './DeviceResult';

export interface SessionTimeouts {
  connectTimeoutMs: number;
  readTimeoutMs: number;
}

export const DEFAULT_TIMEOUTS: Readonly<SessionTimeouts> = Object.freeze({
  connectTimeoutMs: 3000,
  readTimeoutMs: 5000
});

export interface DeviceSessionOptions extends Partial<SessionTimeouts> {
  retryDelayMs?: number;
  transportFactory?: TransportFactory;
  logger?: Logger;
}

/**
 * First try plus one retry on a fresh connection
 */
export const MAX_ATTEMPTS = 2;

type Attempt<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: DeviceError; attempts: number };

type ResponseParser<T> = (response: ParsedResponse) => T;

const expectAck: ResponseParser<void> = response => {
  if (response.status !== 'ack') {
    throw new DecodeError(DecodeErrorType.MALFORMED, `Expected OK from %${response.cls}${response.mnemonic}`);
  }
};

function expectValue(verb: Verb): ResponseParser<CommandValue> {
  return response => {
    if (response.status !== 'value') {
      throw new DecodeError(DecodeErrorType.MALFORMED, `Expected a value from %${response.cls}${response.mnemonic}`);
    }
    return interpretValue(verb, response.value);
  };
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Device Session
 * Owns the single connection to one projector. Commands are strictly
 * serialized; the protocol has no pipelining.
 */
export class DeviceSession {
  private readonly timeouts: SessionTimeouts;
  private readonly retryDelayMs: number;
  private readonly transports: TransportFactory;
  private readonly logger: Logger;

  private handle?: LineTransport;
  private queue: Promise<void> = Promise.resolve();
  private state: DeviceState = {};
  private opened = 0;

  constructor(readonly device: DeviceDescriptor, options: DeviceSessionOptions = {}) {
    this.timeouts = {
      connectTimeoutMs: options.connectTimeoutMs ?? DEFAULT_TIMEOUTS.connectTimeoutMs,
      readTimeoutMs: options.readTimeoutMs ?? DEFAULT_TIMEOUTS.readTimeoutMs
    };
    this.retryDelayMs = options.retryDelayMs ?? 0;
    this.transports = options.transportFactory ?? new TcpTransportFactory();
    this.logger = (options.logger ?? defaultLogger).child({
      deviceId: device.id,
      endpoint: formatAddress(device.address)
    });
  }

  /**
   * Run one command. Never rejects: every outcome is a DeviceResult.
   */
  send(command: CommandRequest, timeouts: Partial<SessionTimeouts> = {}, meta: LogMeta = {}): Promise<DeviceResult> {
    const effective = { ...this.timeouts, ...timeouts };
    const log = Object.keys(meta).length > 0 ? this.logger.child(meta) : this.logger;

    const run = this.queue.then(() => this.execute(command, effective, log));
    this.queue = run.then(() => undefined, () => undefined);
    return run;
  }

  /**
   * Whether a live connection is currently held
   */
  get connected(): boolean {
    return this.handle !== undefined && !this.handle.closed;
  }

  /**
   * Number of connections opened over the session's lifetime
   */
  get connectionCount(): number {
    return this.opened;
  }

  cachedState(): DeviceState {
    return { ...this.state };
  }

  close(): void {
    if (this.handle) {
      this.handle.close();
      this.handle = undefined;
    }
  }

  private async execute(command: CommandRequest, timeouts: SessionTimeouts, log: Logger): Promise<DeviceResult> {
    log.debug(`Executing ${describeCommand(command)}`);

    switch (command.action) {
      case 'toggle':
        return this.toggle(command, command.verb, timeouts, log);
      case 'on':
      case 'off':
        return this.set(command, command.verb, command.action === 'on', timeouts, log);
      case 'query':
        return this.query(command, command.verb, timeouts, log);
    }
  }

  private async query(command: CommandRequest, verb: Verb, timeouts: SessionTimeouts, log: Logger): Promise<DeviceResult> {
    const outcome = await this.roundTrip(queryCommand(verb), expectValue(verb), timeouts, log);
    if (!outcome.ok) {
      return this.failure(command, outcome.error, outcome.attempts);
    }

    this.remember(outcome.value);
    return this.success(command, outcome.value, outcome.attempts);
  }

  private async set(
    command: CommandRequest,
    verb: SwitchVerb,
    on: boolean,
    timeouts: SessionTimeouts,
    log: Logger,
    priorAttempts = 0
  ): Promise<DeviceResult> {
    const outcome = await this.roundTrip(setCommand(verb, on), expectAck, timeouts, log);
    const attempts = priorAttempts + outcome.attempts;
    if (!outcome.ok) {
      return this.failure(command, outcome.error, attempts);
    }

    // Optimistic: the next query replaces this with the device's own answer
    const next = stateAfterSet(verb, on);
    this.remember(next);
    return this.success(command, next, attempts);
  }

  /**
   * Query, then set the opposite. No set is sent if the query fails.
   */
  private async toggle(command: CommandRequest, verb: SwitchVerb, timeouts: SessionTimeouts, log: Logger): Promise<DeviceResult> {
    const current = await this.roundTrip(queryCommand(verb), expectValue(verb), timeouts, log);
    if (!current.ok) {
      return this.failure(command, current.error, current.attempts);
    }

    this.remember(current.value);
    const turnOn = !isActive(current.value);
    log.debug(`Toggling ${verb} from ${current.value.value} to ${turnOn ? 'on' : 'off'}`);
    return this.set(command, verb, turnOn, timeouts, log, current.attempts);
  }

  /**
   * One wire exchange with at most one retry on a fresh connection
   */
  private async roundTrip<T>(
    wire: WireCommand,
    parse: ResponseParser<T>,
    timeouts: SessionTimeouts,
    log: Logger
  ): Promise<Attempt<T>> {
    let attempt = 0;

    while (true) {
      attempt++;
      try {
        const value = await this.exchange(wire, parse, timeouts, log);
        return { ok: true, value, attempts: attempt };
      } catch (error) {
        const fault = this.toDeviceError(error);

        if (!fault.recoverable || attempt >= MAX_ATTEMPTS) {
          log.error(`${formatWire(wire)} failed: ${fault.message}`, { kind: fault.kind, attempt });
          return { ok: false, error: fault, attempts: attempt };
        }

        log.warn(`${formatWire(wire)} failed, retrying on a new connection: ${fault.message}`, {
          kind: fault.kind,
          attempt
        });
        if (this.retryDelayMs > 0) {
          await delay(this.retryDelayMs);
        }
      }
    }
  }

  private async exchange<T>(
    wire: WireCommand,
    parse: ResponseParser<T>,
    timeouts: SessionTimeouts,
    log: Logger
  ): Promise<T> {
    const handle = await this.acquire(timeouts, log);

    let response: ParsedResponse;
    try {
      await handle.write(encode(wire));
      log.debug(`Sent ${formatWire(wire)}`);

      const line = await handle.readLine(timeouts.readTimeoutMs);
      log.debug(`Received ${JSON.stringify(line)}`);

      response = decode(line, wire);
    } catch (error) {
      this.discard(handle, log);
      throw error;
    }

    // The link is still in step after an error reply; keep it
    if (response.status === 'error') {
      throw new ProtocolError(response.code, this.device.id, formatWire(wire));
    }

    try {
      return parse(response);
    } catch (error) {
      this.discard(handle, log);
      throw error;
    }
  }

  private async acquire(timeouts: SessionTimeouts, log: Logger): Promise<LineTransport> {
    if (this.handle && !this.handle.closed) {
      return this.handle;
    }
    this.handle = undefined;

    const handle = await this.transports.open(this.device.address, timeouts.connectTimeoutMs);
    this.opened++;

    try {
      const greeting = decodeGreeting(await handle.readLine(timeouts.readTimeoutMs));
      if (greeting.authRequired) {
        throw new ProtocolError(PJLinkErrorCode.AUTHENTICATION, this.device.id, 'connection');
      }
    } catch (error) {
      handle.close();
      throw error;
    }

    log.debug(`Connected (connection #${this.opened})`);
    this.handle = handle;
    return handle;
  }

  private discard(handle: LineTransport, log: Logger): void {
    handle.close();
    if (this.handle === handle) {
      this.handle = undefined;
    }
    log.debug('Discarded connection');
  }

  private toDeviceError(error: unknown): DeviceError {
    const endpoint = formatAddress(this.device.address);

    if (error instanceof DeviceError) {
      return error;
    }
    if (error instanceof TransportError) {
      return error.duringConnect
        ? new ConnectFault(error.message, this.device.id, endpoint)
        : new CommsFault(error.message, this.device.id, { endpoint, transport: error.type });
    }
    if (error instanceof DecodeError) {
      return new CommsFault(`Undecodable reply from ${endpoint}: ${error.message}`, this.device.id, {
        endpoint,
        decode: error.type,
        line: error.line
      });
    }

    const message = error instanceof Error ? error.message : String(error);
    return new CommsFault(`Transport failure on ${endpoint}: ${message}`, this.device.id, { endpoint });
  }

  private remember(value: CommandValue): void {
    switch (value.verb) {
      case 'power':
        this.state.power = value.value;
        break;
      case 'mute':
        this.state.mute = value.value;
        break;
      case 'freeze':
        this.state.freeze = value.value;
        break;
      case 'lamp-hours':
        this.state.lamp = value.value;
        break;
      case 'input':
        this.state.input = value.value;
        break;
      case 'error-status':
        this.state.errorStatus = value.value;
        break;
    }
    this.state.updatedAt = new Date();
  }

  private success(command: CommandRequest, value: CommandValue, attempts: number): DeviceResult {
    return { ...value, ok: true, deviceId: this.device.id, command, attempts };
  }

  private failure(command: CommandRequest, error: DeviceError, attempts: number): DeviceResult {
    return { ok: false, deviceId: this.device.id, command, kind: error.kind, error, attempts };
  }
}
