#!/usr/bin/env node
import dotenv from 'dotenv';
import { Argument, Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { LoadedConfig, loadConfig } from '../core/config/FleetConfig';
import { describeError } from '../core/errors/DeviceError';
import { Logger } from '../core/logging/Logger';
import { FleetController } from '../devices/controller/FleetController';
import { CommandRequest, StatusVerb, SwitchVerb, describeCommand } from '../devices/protocol/PJLinkCommands';
import { PJLINK_DEFAULT_PORT } from '../devices/protocol/PJLinkCodec';
import { describeTarget } from '../devices/registry/GroupResolver';
import { KeypressButtonSource, MacropadBridge, MacropadFeedback } from '../macropad/MacropadBridge';
import { startMockFleet } from '../testing/MockProjectorServer';
import {
  EXIT_OK,
  exitCodeFor,
  renderDeviceList,
  renderReport,
  renderStatus,
  reportExitCode,
  statusExitCode,
  switchActionFrom,
  targetFrom
} from './output';

dotenv.config();

interface GlobalOptions {
  config?: string;
  group?: string;
  sequential?: boolean;
  json?: boolean;
  debug?: boolean;
}

interface Context {
  loaded: LoadedConfig;
  controller: FleetController;
  logger: Logger;
}

const program = new Command();

program
  .name('pjfleet')
  .description('Control a fleet of PJLink projectors')
  .version('1.0.0')
  .option('-c, --config <path>', 'configuration file (default: $PJFLEET_CONFIG or ./pjfleet.yml)')
  .option('-g, --group <group>', 'target a device group instead of named devices')
  .option('--sequential', 'contact devices one at a time', false)
  .option('--json', 'print results as JSON', false)
  .option('-d, --debug', 'enable debug output', false);

function globals(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

async function setup(): Promise<Context> {
  const options = globals();
  const loaded = await loadConfig({ path: options.config });
  const { config } = loaded;

  const logger = new Logger({
    level: options.debug ? 'debug' : config.logging.level,
    filename: config.logging.file
  });

  const controller = new FleetController(loaded.registry, {
    mode: options.sequential ? 'sequential' : config.dispatch.mode,
    connectTimeoutMs: config.session.connectTimeoutMs,
    readTimeoutMs: config.session.readTimeoutMs,
    retryDelayMs: config.session.retryDelayMs,
    logger
  });

  return { loaded, controller, logger };
}

function finish(context: Context | undefined, code: number): never {
  context?.controller.close();
  context?.logger.close();
  process.exit(code);
}

type Spinner = ReturnType<typeof ora>;

function failed(spinner: Spinner | undefined, error: unknown): void {
  if (spinner) {
    spinner.fail(describeError(error));
  } else {
    console.error(chalk.red(describeError(error)));
  }
}

async function dispatchCommand(command: CommandRequest, devices: string[]): Promise<void> {
  const options = globals();
  const target = targetFrom(devices, options.group);
  const spinner = options.json ? undefined : ora(`${describeCommand(command)} -> ${describeTarget(target)}`).start();
  let context: Context | undefined;

  try {
    context = await setup();
    const report = await context.controller.dispatch(command, target);
    spinner?.stop();

    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      renderReport(report).forEach(line => console.log(line));
    }
    finish(context, reportExitCode(report));
  } catch (error) {
    failed(spinner, error);
    if (options.debug) {
      console.error(error);
    }
    finish(context, exitCodeFor(error));
  }
}

function switchCommand(verb: SwitchVerb): void {
  program
    .command(verb)
    .description(`Turn ${verb} on or off, toggle it, or query it`)
    .addArgument(new Argument('<action>', 'on, off, toggle or status').choices(['on', 'off', 'toggle', 'status']))
    .argument('[devices...]', 'device nicknames or aliases')
    .action(async (action: string, devices: string[]) => {
      await dispatchCommand({ verb, action: switchActionFrom(action) }, devices);
    });
}

function statusCommand(name: string, verb: StatusVerb, description: string): void {
  program
    .command(name)
    .description(description)
    .argument('[devices...]', 'device nicknames or aliases')
    .action(async (devices: string[]) => {
      await dispatchCommand({ verb, action: 'query' }, devices);
    });
}

switchCommand('power');
switchCommand('mute');
switchCommand('freeze');
statusCommand('lamp', 'lamp-hours', 'Show lamp hours');
statusCommand('input', 'input', 'Show the selected input');
statusCommand('errors', 'error-status', 'Show the error status');

/**
 * Full status sweep
 */
program
  .command('status')
  .description('Query everything each device reports')
  .argument('[devices...]', 'device nicknames or aliases')
  .action(async (devices: string[]) => {
    const options = globals();
    const target = targetFrom(devices, options.group);
    const spinner = options.json ? undefined : ora(`Querying ${describeTarget(target)}`).start();
    let context: Context | undefined;

    try {
      context = await setup();
      const status = await context.controller.status(target);
      spinner?.stop();

      if (options.json) {
        console.log(JSON.stringify(status, null, 2));
      } else {
        renderStatus(status.devices).forEach(line => console.log(line));
      }
      finish(context, statusExitCode(status.devices));
    } catch (error) {
      failed(spinner, error);
      finish(context, exitCodeFor(error));
    }
  });

/**
 * List devices
 */
program
  .command('list')
  .description('List configured devices, aliases and groups')
  .action(async () => {
    try {
      const { registry, path } = await loadConfig({ path: globals().config });
      if (globals().json) {
        console.log(JSON.stringify(registry.list().map(device => ({ ...device, groups: [...device.groups] })), null, 2));
      } else {
        console.log(chalk.bold(`Devices (${path}):`));
        renderDeviceList(registry).forEach(line => console.log(line));
      }
      process.exit(EXIT_OK);
    } catch (error) {
      console.error(chalk.red(describeError(error)));
      process.exit(exitCodeFor(error));
    }
  });

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

/**
 * Standalone mock projectors
 */
program
  .command('mock')
  .description('Run mock projectors on consecutive ports')
  .option('-p, --port <port>', 'first port (0 picks free ports)', parseInteger, PJLINK_DEFAULT_PORT)
  .option('-n, --count <count>', 'number of projectors', parseInteger, 1)
  .option('--host <host>', 'address to listen on', '127.0.0.1')
  .option('--transition <ms>', 'warm-up and cool-down time', parseInteger, 0)
  .action(async (options: { port: number; count: number; host: string; transition: number }) => {
    const logger = new Logger({ level: globals().debug ? 'debug' : 'info' });
    const spinner = ora(`Starting ${options.count} mock projector(s)`).start();

    try {
      const servers = await startMockFleet(options.count, {
        port: options.port,
        host: options.host,
        powerTransitionMs: options.transition,
        logger
      });
      spinner.succeed(`${servers.length} mock projector(s) running`);
      servers.forEach(server => console.log(`${server.name}: ${options.host}:${server.port}`));

      const shutdown = () => {
        Promise.all(servers.map(server => server.stop()))
          .then(() => process.exit(EXIT_OK))
          .catch(error => {
            console.error(chalk.red(describeError(error)));
            process.exit(1);
          });
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    } catch (error) {
      spinner.fail(describeError(error));
      process.exit(1);
    }
  });

/**
 * Macropad on the keyboard
 */
program
  .command('listen')
  .description('Drive the fleet from number keys using the macropad layout')
  .option('--layout <size>', 'button layout (4 or 9)')
  .action(async (options: { layout?: string }) => {
    let context: Context | undefined;

    try {
      context = await setup();
      const macropad = context.loaded.config.macropad;
      const layout = options.layout === '9' ? 9 : options.layout === '4' ? 4 : macropad?.layout ?? 4;

      const group = globals().group;
      const bridge = new MacropadBridge(context.controller, {
        layout,
        target: group ? { group } : macropad?.target ?? { group: 'all' },
        bindings: macropad?.bindings,
        logger: context.logger
      });

      bridge.on('feedback', (feedback: MacropadFeedback) => {
        if (feedback.report) {
          renderReport(feedback.report).forEach(line => console.log(line));
        } else if (feedback.error) {
          console.error(chalk.red(describeError(feedback.error)));
        }
      });
      bridge.on('ignored', (button: number) => console.log(chalk.gray(`Button ${button} is not bound`)));

      const source = new KeypressButtonSource();
      bridge.attach(source);
      source.start();

      console.log(chalk.bold(`Listening on ${layout} buttons; press 1-${layout}, q to quit`));
      for (const [button, command] of bridge.bindings) {
        console.log(`  ${button}: ${describeCommand(command)}`);
      }

      const active = context;
      source.once('exit', () => {
        source.stop();
        bridge.detach();
        bridge.idle()
          .then(() => finish(active, EXIT_OK))
          .catch(error => {
            console.error(chalk.red(describeError(error)));
            finish(active, 1);
          });
      });
    } catch (error) {
      console.error(chalk.red(describeError(error)));
      finish(context, exitCodeFor(error));
    }
  });

program.parseAsync(process.argv).catch(error => {
  console.error(chalk.red(describeError(error)));
  process.exit(1);
});
