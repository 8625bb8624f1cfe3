import { v4 as uuidv4 } from 'uuid';
import { CommandRequest, describeCommand } from '../protocol/PJLinkCommands';
import { TargetSpec, describeTarget } from '../registry/GroupResolver';
import { DeviceFailure, DeviceResult, DeviceSuccess, isFailure, isSuccess } from '../session/DeviceResult';

export interface GroupReportInit {
  command: CommandRequest;
  target: TargetSpec;
  results: readonly DeviceResult[];
  startedAt: Date;
  finishedAt?: Date;
  id?: string;
}

/**
 * Per-device outcomes of one dispatch. Frozen on construction.
 */
export class GroupReport {
  readonly id: string;
  readonly command: CommandRequest;
  readonly target: TargetSpec;
  readonly startedAt: Date;
  readonly finishedAt: Date;
  private readonly results: ReadonlyMap<string, DeviceResult>;

  constructor(init: GroupReportInit) {
    this.id = init.id ?? uuidv4();
    this.command = init.command;
    this.target = init.target;
    this.startedAt = init.startedAt;
    this.finishedAt = init.finishedAt ?? new Date();

    const results = new Map<string, DeviceResult>();
    for (const result of init.results) {
      if (results.has(result.deviceId)) {
        throw new Error(`Duplicate result for ${result.deviceId}`);
      }
      results.set(result.deviceId, Object.freeze(result));
    }
    this.results = results;
    Object.freeze(this);
  }

  get deviceIds(): string[] {
    return [...this.results.keys()];
  }

  get size(): number {
    return this.results.size;
  }

  get(deviceId: string): DeviceResult | undefined {
    return this.results.get(deviceId);
  }

  all(): DeviceResult[] {
    return [...this.results.values()];
  }

  get allSucceeded(): boolean {
    return this.all().every(isSuccess);
  }

  get anySucceeded(): boolean {
    return this.all().some(isSuccess);
  }

  get successes(): DeviceSuccess[] {
    return this.all().filter(isSuccess);
  }

  get failures(): DeviceFailure[] {
    return this.all().filter(isFailure);
  }

  get durationMs(): number {
    return this.finishedAt.getTime() - this.startedAt.getTime();
  }

  get label(): string {
    return `${describeCommand(this.command)} -> ${describeTarget(this.target)}`;
  }

  summary(): string {
    const failed = this.failures.length;
    return failed === 0
      ? `${this.label}: ${this.size}/${this.size} succeeded`
      : `${this.label}: ${this.size - failed}/${this.size} succeeded, ${failed} failed`;
  }

  toJSON() {
    return {
      id: this.id,
      command: this.command,
      target: this.target,
      startedAt: this.startedAt.toISOString(),
      finishedAt: this.finishedAt.toISOString(),
      allSucceeded: this.allSucceeded,
      results: this.all().map(result =>
        result.ok
          ? { deviceId: result.deviceId, ok: true, verb: result.verb, value: result.value, attempts: result.attempts }
          : { deviceId: result.deviceId, ok: false, kind: result.kind, error: result.error.message, attempts: result.attempts }
      )
    };
  }
}
