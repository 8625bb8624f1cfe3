import fs from 'fs/promises';
import path from 'path';
import yaml from 'js-yaml';
import Ajv, { ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';
import { ConfigurationError, describeError } from '../errors/DeviceError';
import { DeviceDefinition, DeviceRegistry } from '../../devices/registry/DeviceRegistry';
import { DEFAULT_TIMEOUTS } from '../../devices/session/DeviceSession';
import { TargetSpec } from '../../devices/registry/GroupResolver';
import type { DispatchMode } from '../../devices/controller/FleetController';

export const DEFAULT_CONFIG_FILE = 'pjfleet.yml';

export type MacropadLayoutSize = 4 | 9;

export interface MacropadConfig {
  layout: MacropadLayoutSize;
  target: TargetSpec;
  /** button number -> "verb action" */
  bindings: Record<string, string>;
}

export interface SessionConfig {
  connectTimeoutMs: number;
  readTimeoutMs: number;
  retryDelayMs: number;
}

export interface LoggingConfig {
  level: string;
  file?: string;
}

/**
 * Configuration after defaults and environment overrides
 */
export interface FleetConfig {
  devices: DeviceDefinition[];
  aliases: Record<string, string>;
  session: SessionConfig;
  dispatch: { mode: DispatchMode };
  logging: LoggingConfig;
  macropad?: MacropadConfig;
}

/**
 * Configuration exactly as written in the file
 */
export interface FleetConfigFile {
  devices: DeviceDefinition[];
  aliases?: Record<string, string>;
  session?: Partial<SessionConfig>;
  dispatch?: { mode?: DispatchMode };
  logging?: Partial<LoggingConfig>;
  macropad?: {
    layout?: MacropadLayoutSize;
    group?: string;
    devices?: string[];
    bindings?: Record<string, string>;
  };
}

export type Environment = Record<string, string | undefined>;

const ajv = new Ajv({ allErrors: true });
addFormats(ajv);

const nameSchema = { type: 'string', minLength: 1 };

const deviceSchema = {
  type: 'object',
  required: ['id', 'host'],
  additionalProperties: false,
  properties: {
    id: nameSchema,
    host: { type: 'string', format: 'hostname' },
    port: { type: 'integer', minimum: 1, maximum: 65535 },
    name: { type: 'string' },
    groups: { type: 'array', items: nameSchema },
    aliases: { type: 'array', items: nameSchema },
    location: { type: 'string' }
  }
};

const timeoutSchema = { type: 'integer', minimum: 1 };

const configSchema = {
  type: 'object',
  required: ['devices'],
  additionalProperties: false,
  properties: {
    devices: { type: 'array', items: deviceSchema, minItems: 1 },
    aliases: {
      type: 'object',
      patternProperties: {
        '^.+$': nameSchema
      }
    },
    session: {
      type: 'object',
      additionalProperties: false,
      properties: {
        connectTimeoutMs: timeoutSchema,
        readTimeoutMs: timeoutSchema,
        retryDelayMs: { type: 'integer', minimum: 0 }
      }
    },
    dispatch: {
      type: 'object',
      additionalProperties: false,
      properties: {
        mode: { type: 'string', enum: ['parallel', 'sequential'] }
      }
    },
    logging: {
      type: 'object',
      additionalProperties: false,
      properties: {
        level: { type: 'string', enum: ['error', 'warn', 'info', 'debug'] },
        file: { type: 'string', minLength: 1 }
      }
    },
    macropad: {
      type: 'object',
      additionalProperties: false,
      properties: {
        layout: { type: 'integer', enum: [4, 9] },
        group: nameSchema,
        devices: { type: 'array', items: nameSchema, minItems: 1 },
        bindings: {
          type: 'object',
          patternProperties: {
            '^[1-9]$': {
              type: 'string',
              pattern: '^((power|mute|freeze) (on|off|toggle|query)|(lamp-hours|input|error-status) query)$'
            }
          },
          additionalProperties: false
        }
      }
    }
  }
};

const validateConfigFile = ajv.compile<FleetConfigFile>(configSchema);

function describeIssue(error: ErrorObject): string {
  const location = error.instancePath.replace(/^\//, '').replace(/\//g, '.');
  const where = location || 'config';

  switch (error.keyword) {
    case 'required':
      return `Missing required field: ${location ? location + '.' : ''}${String(error.params.missingProperty)}`;
    case 'type':
      return `Invalid type for ${where}: expected ${String(error.params.type)}`;
    case 'enum':
      return `Invalid value for ${where}: must be one of ${JSON.stringify(error.params.allowedValues)}`;
    case 'minimum':
    case 'maximum':
      return `Invalid value for ${where}: ${error.message ?? 'out of range'}`;
    case 'additionalProperties':
      return `Unknown field ${where}.${String(error.params.additionalProperty)}`;
    case 'format':
      return `Invalid format for ${where}: must be a valid ${String(error.params.format)}`;
    default:
      return `Validation error for ${where}: ${error.message ?? error.keyword}`;
  }
}

/**
 * Parse and validate configuration text (YAML or JSON)
 */
export function parseConfig(text: string, source = '<inline>'): FleetConfigFile {
  let document: unknown;
  try {
    document = yaml.load(text, { filename: source });
  } catch (error) {
    throw new ConfigurationError(`Cannot parse ${source}: ${describeError(error)}`, [describeError(error)]);
  }

  if (!validateConfigFile(document)) {
    const issues = (validateConfigFile.errors ?? []).map(describeIssue);
    throw new ConfigurationError(`Invalid configuration in ${source}: ${issues.join('; ')}`, issues);
  }
  return document;
}

function envInteger(env: Environment, name: string, minimum: number): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < minimum) {
    throw new ConfigurationError(`${name} must be an integer >= ${minimum}, got "${raw}"`, [`${name}: ${raw}`]);
  }
  return value;
}

function envMode(env: Environment): DispatchMode | undefined {
  const raw = env.PJFLEET_DISPATCH_MODE;
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const mode = raw.trim().toLowerCase();
  if (mode !== 'parallel' && mode !== 'sequential') {
    throw new ConfigurationError(`PJFLEET_DISPATCH_MODE must be parallel or sequential, got "${raw}"`, [
      `PJFLEET_DISPATCH_MODE: ${raw}`
    ]);
  }
  return mode;
}

/**
 * Fill in defaults, then let the environment override them
 */
export function resolveConfig(file: FleetConfigFile, env: Environment = process.env): FleetConfig {
  const session: SessionConfig = {
    connectTimeoutMs:
      envInteger(env, 'PJFLEET_CONNECT_TIMEOUT_MS', 1) ??
      file.session?.connectTimeoutMs ??
      DEFAULT_TIMEOUTS.connectTimeoutMs,
    readTimeoutMs:
      envInteger(env, 'PJFLEET_READ_TIMEOUT_MS', 1) ?? file.session?.readTimeoutMs ?? DEFAULT_TIMEOUTS.readTimeoutMs,
    retryDelayMs: envInteger(env, 'PJFLEET_RETRY_DELAY_MS', 0) ?? file.session?.retryDelayMs ?? 0
  };

  const logging: LoggingConfig = {
    level: env.LOG_LEVEL || file.logging?.level || 'info',
    file: env.PJFLEET_LOG_FILE || file.logging?.file
  };

  const config: FleetConfig = {
    devices: file.devices,
    aliases: file.aliases ?? {},
    session,
    dispatch: { mode: envMode(env) ?? file.dispatch?.mode ?? 'parallel' },
    logging
  };

  if (file.macropad) {
    const { layout, group, devices, bindings } = file.macropad;
    config.macropad = {
      layout: layout ?? 4,
      target: devices ? { devices } : { group: group ?? 'all' },
      bindings: bindings ?? {}
    };
  }

  return config;
}

/**
 * Where the configuration file is looked for: explicit path, then
 * PJFLEET_CONFIG, then ./pjfleet.yml
 */
export function configPath(explicit?: string, env: Environment = process.env): string {
  return path.resolve(explicit || env.PJFLEET_CONFIG || DEFAULT_CONFIG_FILE);
}

export interface LoadConfigOptions {
  path?: string;
  env?: Environment;
}

export interface LoadedConfig {
  path: string;
  config: FleetConfig;
  registry: DeviceRegistry;
}

/**
 * Read, validate and resolve the configuration, and build the registry
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const env = options.env ?? process.env;
  const file = configPath(options.path, env);

  let text: string;
  try {
    text = await fs.readFile(file, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read configuration ${file}: ${describeError(error)}`, [describeError(error)]);
  }

  const config = resolveConfig(parseConfig(text, file), env);
  return { path: file, config, registry: buildRegistry(config) };
}

export function buildRegistry(config: Pick<FleetConfig, 'devices' | 'aliases'>): DeviceRegistry {
  return DeviceRegistry.fromSource({ devices: config.devices, aliases: config.aliases });
}
