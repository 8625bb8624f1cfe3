import { EventEmitter } from 'events';
import * as readline from 'readline';
import { ConfigurationError, DeviceError, ResolutionError, describeError } from '../core/errors/DeviceError';
import { Logger, defaultLogger } from '../core/logging/Logger';
import { MacropadLayoutSize } from '../core/config/FleetConfig';
import { GroupReport } from '../devices/controller/GroupReport';
import { CommandRequest, describeCommand, isStatusVerb, isSwitchVerb } from '../devices/protocol/PJLinkCommands';
import { TargetSpec } from '../devices/registry/GroupResolver';

/**
 * Anything that emits `press` with a button number
 */
export type ButtonSource = EventEmitter;

export type ButtonBindings = ReadonlyMap<number, CommandRequest>;

function layout(entries: Array<[number, CommandRequest]>): ButtonBindings {
  return new Map(entries);
}

export const LAYOUTS: Record<MacropadLayoutSize, ButtonBindings> = {
  4: layout([
    [1, { verb: 'power', action: 'on' }],
    [2, { verb: 'power', action: 'off' }],
    [3, { verb: 'mute', action: 'toggle' }],
    [4, { verb: 'freeze', action: 'toggle' }]
  ]),
  9: layout([
    [1, { verb: 'mute', action: 'toggle' }],
    [2, { verb: 'power', action: 'toggle' }],
    [3, { verb: 'power', action: 'on' }],
    [4, { verb: 'power', action: 'query' }],
    [5, { verb: 'mute', action: 'on' }],
    [6, { verb: 'mute', action: 'off' }],
    [7, { verb: 'freeze', action: 'toggle' }],
    [8, { verb: 'power', action: 'off' }],
    [9, { verb: 'freeze', action: 'off' }]
  ])
};

/**
 * Parse a binding such as "mute toggle"
 */
export function parseBinding(text: string): CommandRequest {
  const [verb, action, ...rest] = text.trim().toLowerCase().split(/\s+/);

  if (rest.length === 0 && verb && action) {
    if (isSwitchVerb(verb) && (action === 'on' || action === 'off' || action === 'toggle' || action === 'query')) {
      return { verb, action };
    }
    if (isStatusVerb(verb) && action === 'query') {
      return { verb, action };
    }
  }
  throw new ConfigurationError(`Invalid button binding "${text}"`, [`binding: ${text}`]);
}

export interface MacropadFeedback {
  button: number;
  command: CommandRequest;
  ok: boolean;
  report?: GroupReport;
  error?: DeviceError;
}

/**
 * The part of the fleet controller the bridge drives
 */
export interface Dispatcher {
  dispatch(command: CommandRequest, target: TargetSpec): Promise<GroupReport>;
}

export interface MacropadBridgeOptions {
  layout: MacropadLayoutSize;
  target: TargetSpec;
  /** button number -> "verb action", on top of the layout */
  bindings?: Record<string, string>;
  logger?: Logger;
}

/**
 * Macropad Bridge
 * Turns button presses into fleet dispatches. Presses are handled one at a
 * time in the order they arrive.
 */
export class MacropadBridge extends EventEmitter {
  readonly bindings: ButtonBindings;
  private readonly target: TargetSpec;
  private readonly logger: Logger;
  private queue: Promise<void> = Promise.resolve();
  private source?: ButtonSource;
  private readonly onPress = (button: number) => {
    this.press(button).catch(error => {
      this.logger.error(`Button ${button} failed: ${describeError(error)}`);
    });
  };

  constructor(private readonly dispatcher: Dispatcher, options: MacropadBridgeOptions) {
    super();
    this.target = options.target;
    this.logger = (options.logger ?? defaultLogger).child({ component: 'macropad' });

    const bindings = new Map(LAYOUTS[options.layout]);
    for (const [key, text] of Object.entries(options.bindings ?? {})) {
      const button = Number(key);
      if (!Number.isInteger(button) || button < 1 || button > options.layout) {
        throw new ConfigurationError(`Button ${key} is not on a ${options.layout}-button layout`, [
          `bindings.${key}`
        ]);
      }
      bindings.set(button, parseBinding(text));
    }
    this.bindings = bindings;
  }

  attach(source: ButtonSource): void {
    this.detach();
    this.source = source;
    source.on('press', this.onPress);
  }

  detach(): void {
    if (this.source) {
      this.source.removeListener('press', this.onPress);
      this.source = undefined;
    }
  }

  /**
   * Queue a press. Resolves once its dispatch has finished, or with
   * undefined for an unbound button.
   */
  press(button: number): Promise<MacropadFeedback | undefined> {
    const run = this.queue.then(() => this.handle(button));
    this.queue = run.then(() => undefined, () => undefined);
    return run;
  }

  /**
   * Resolves when every queued press has been handled
   */
  idle(): Promise<void> {
    return this.queue;
  }

  private async handle(button: number): Promise<MacropadFeedback | undefined> {
    const command = this.bindings.get(button);
    if (!command) {
      this.logger.debug(`Button ${button} is not bound`);
      this.emit('ignored', button);
      return undefined;
    }

    this.logger.info(`Button ${button}: ${describeCommand(command)}`);

    let feedback: MacropadFeedback;
    try {
      const report = await this.dispatcher.dispatch(command, this.target);
      feedback = { button, command, ok: report.allSucceeded, report };
    } catch (error) {
      if (!(error instanceof ResolutionError)) {
        throw error;
      }
      feedback = { button, command, ok: false, error };
    }

    this.emit('feedback', feedback);
    return feedback;
  }
}

interface Keypress {
  name?: string;
  ctrl?: boolean;
}

/**
 * A terminal input stream; raw mode is used when it is a TTY
 */
export type KeyInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
};

/**
 * Number keys on a terminal act as buttons. Ctrl+C or q emits `exit`.
 */
export class KeypressButtonSource extends EventEmitter {
  private started = false;
  private readonly onKeypress = (text: string | undefined, key: Keypress | undefined) => {
    if ((key?.ctrl && key.name === 'c') || text === 'q') {
      this.emit('exit');
      return;
    }
    if (text !== undefined && /^[1-9]$/.test(text)) {
      this.emit('press', Number(text));
    }
  };

  constructor(private readonly input: KeyInput = process.stdin) {
    super();
  }

  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    readline.emitKeypressEvents(this.input);
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(true);
    }
    this.input.on('keypress', this.onKeypress);
    this.input.resume();
  }

  stop(): void {
    if (!this.started) {
      return;
    }
    this.started = false;
    this.input.removeListener('keypress', this.onKeypress);
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(false);
    }
    this.input.pause();
  }
}
