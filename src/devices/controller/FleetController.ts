import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { DeviceError, ErrorKind } from '../../core/errors/DeviceError';
import { Logger, defaultLogger } from '../../core/logging/Logger';
import {
  DeviceState,
  ErrorStatus,
  FreezeState,
  InputSource,
  LampStatus,
  MuteState,
  PowerState
} from '../../core/types/DeviceState';
import { CommandRequest, StatusVerb, describeCommand } from '../protocol/PJLinkCommands';
import { DeviceDescriptor, DeviceRegistry } from '../registry/DeviceRegistry';
import { GroupResolver, TargetSpec, describeTarget } from '../registry/GroupResolver';
import { DeviceResult } from '../session/DeviceResult';
import { DeviceSession, DeviceSessionOptions, SessionTimeouts } from '../session/DeviceSession';
import { TransportFactory } from '../transport/LineTransport';
import { GroupReport } from './GroupReport';

export type DispatchMode = 'parallel' | 'sequential';

export interface FleetControllerOptions extends Partial<SessionTimeouts> {
  mode?: DispatchMode;
  retryDelayMs?: number;
  transportFactory?: TransportFactory;
  logger?: Logger;
}

export interface DispatchOptions {
  mode?: DispatchMode;
  timeouts?: Partial<SessionTimeouts>;
}

/**
 * One device's answers to a status sweep
 */
export interface DeviceStatus {
  deviceId: string;
  name: string;
  online: boolean;
  power?: PowerState;
  mute?: MuteState;
  freeze?: FreezeState;
  lamp?: LampStatus;
  input?: InputSource;
  errorStatus?: ErrorStatus;
  failures: DeviceError[];
}

export interface FleetStatus {
  target: TargetSpec;
  devices: DeviceStatus[];
}

const SWEEP: readonly CommandRequest[] = [
  { verb: 'power', action: 'query' },
  { verb: 'mute', action: 'query' },
  { verb: 'freeze', action: 'query' },
  ...(['lamp-hours', 'input', 'error-status'] as const).map((verb: StatusVerb): CommandRequest => ({ verb, action: 'query' }))
];

function isConnectionFault(result: DeviceResult): boolean {
  return !result.ok && (result.kind === ErrorKind.CONNECT_FAULT || result.kind === ErrorKind.COMMS_FAULT);
}

/**
 * Fleet Controller
 * Runs one logical command against a set of projectors and reports on
 * every one of them. A fault on one device never stops the others.
 */
export class FleetController extends EventEmitter {
  private readonly resolver: GroupResolver;
  private readonly sessions = new Map<string, DeviceSession>();
  private readonly mode: DispatchMode;
  private readonly sessionOptions: DeviceSessionOptions;
  private readonly logger: Logger;

  constructor(private readonly registry: DeviceRegistry, options: FleetControllerOptions = {}) {
    super();
    this.resolver = new GroupResolver(registry);
    this.mode = options.mode ?? 'parallel';
    this.logger = options.logger ?? defaultLogger;
    this.sessionOptions = {
      connectTimeoutMs: options.connectTimeoutMs,
      readTimeoutMs: options.readTimeoutMs,
      retryDelayMs: options.retryDelayMs,
      transportFactory: options.transportFactory,
      logger: this.logger
    };
  }

  /**
   * Resolve the target and run the command on every device in it.
   * Rejects only when the target cannot be resolved.
   */
  async dispatch(command: CommandRequest, target: TargetSpec, options: DispatchOptions = {}): Promise<GroupReport> {
    const devices = this.resolve(target);
    const dispatchId = uuidv4();
    const startedAt = new Date();
    const mode = options.mode ?? this.mode;

    this.logger.info(`Dispatching ${describeCommand(command)} to ${describeTarget(target)}`, {
      dispatchId,
      devices: devices.map(device => device.id),
      mode
    });

    const run = async (device: DeviceDescriptor): Promise<DeviceResult> => {
      const result = await this.sessionFor(device.id).send(command, options.timeouts, { dispatchId });
      this.emit('deviceResult', result, dispatchId);
      return result;
    };

    const results: DeviceResult[] = [];
    if (mode === 'parallel') {
      results.push(...await Promise.all(devices.map(run)));
    } else {
      for (const device of devices) {
        results.push(await run(device));
      }
    }

    const report = new GroupReport({ id: dispatchId, command, target, results, startedAt });
    const log = report.allSucceeded ? this.logger.info.bind(this.logger) : this.logger.warn.bind(this.logger);
    log(report.summary(), { dispatchId, durationMs: report.durationMs });

    this.emit('dispatched', report);
    return report;
  }

  /**
   * Query everything a device reports. Devices that cannot be reached on
   * the power query are marked offline and not queried further.
   */
  async status(target: TargetSpec, options: DispatchOptions = {}): Promise<FleetStatus> {
    const devices = this.resolve(target);
    const sweepId = uuidv4();

    const sweep = async (device: DeviceDescriptor): Promise<DeviceStatus> => {
      const session = this.sessionFor(device.id);
      const status: DeviceStatus = { deviceId: device.id, name: device.name, online: true, failures: [] };

      for (const command of SWEEP) {
        const result = await session.send(command, options.timeouts, { sweepId });
        if (!result.ok) {
          status.failures.push(result.error);
          if (command.verb === 'power' && isConnectionFault(result)) {
            status.online = false;
            break;
          }
          continue;
        }

        switch (result.verb) {
          case 'power':
            status.power = result.value;
            break;
          case 'mute':
            status.mute = result.value;
            break;
          case 'freeze':
            status.freeze = result.value;
            break;
          case 'lamp-hours':
            status.lamp = result.value;
            break;
          case 'input':
            status.input = result.value;
            break;
          case 'error-status':
            status.errorStatus = result.value;
            break;
        }
      }
      return status;
    };

    const mode = options.mode ?? this.mode;
    const statuses: DeviceStatus[] = [];
    if (mode === 'parallel') {
      statuses.push(...await Promise.all(devices.map(sweep)));
    } else {
      for (const device of devices) {
        statuses.push(await sweep(device));
      }
    }

    return { target, devices: statuses };
  }

  /**
   * Resolve without dispatching
   */
  resolve(target: TargetSpec): readonly DeviceDescriptor[] {
    try {
      return this.resolver.resolveTarget(target);
    } catch (error) {
      this.logger.warn(`Cannot resolve ${describeTarget(target)}`, {
        error: error instanceof Error ? error.message : String(error)
      });
      this.emit('resolutionFailed', error, target);
      throw error;
    }
  }

  /**
   * The one session for a device, created on first use
   */
  sessionFor(deviceId: string): DeviceSession {
    const device = this.registry.resolve(deviceId);
    let session = this.sessions.get(device.id);
    if (!session) {
      session = new DeviceSession(device, this.sessionOptions);
      this.sessions.set(device.id, session);
    }
    return session;
  }

  cachedState(deviceId: string): DeviceState {
    return this.sessionFor(deviceId).cachedState();
  }

  close(): void {
    for (const session of this.sessions.values()) {
      session.close();
    }
    this.sessions.clear();
  }
}
