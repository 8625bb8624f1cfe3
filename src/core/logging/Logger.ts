import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

const { combine, timestamp, printf, colorize, errors, json } = winston.format;

export type LogMeta = Record<string, unknown>;

export interface LoggerConfig {
  level: string;
  filename?: string;
  maxSize?: string;
  maxFiles?: string;
  datePattern?: string;
  silent?: boolean;
  transports?: winston.transport[];
}

// Custom format for console output
const consoleFormat = printf(({ level, message, timestamp: time, ...meta }) => {
  const metaString = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${String(time)} [${level}]: ${String(message)}${metaString}`;
});

function createTransports(config: LoggerConfig): winston.transport[] {
  if (config.transports) {
    return config.transports;
  }

  // Console logs go to stderr; stdout carries command output
  const transportList: winston.transport[] = [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      format: combine(
        colorize(),
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        consoleFormat
      )
    })
  ];

  if (config.filename) {
    transportList.push(
      new DailyRotateFile({
        filename: config.filename,
        datePattern: config.datePattern || 'YYYY-MM-DD',
        maxSize: config.maxSize || '20m',
        maxFiles: config.maxFiles || '14d',
        format: combine(timestamp(), json())
      })
    );
  }

  return transportList;
}

export class Logger {
  private readonly logger: winston.Logger;
  private readonly context: LogMeta;

  constructor(
    config: LoggerConfig = { level: process.env.LOG_LEVEL || 'info' },
    context: LogMeta = {},
    parent?: winston.Logger
  ) {
    this.logger = parent ?? winston.createLogger({
      level: config.level,
      silent: config.silent,
      format: combine(errors({ stack: true }), json()),
      transports: createTransports(config)
    });
    this.context = context;
  }

  /**
   * Logger with no output, for tests and embedding
   */
  static silent(): Logger {
    return new Logger({ level: 'error', silent: true });
  }

  error(message: string, meta?: LogMeta): void {
    this.log('error', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log('warn', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log('info', message, meta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.log('debug', message, meta);
  }

  get level(): string {
    return this.logger.level;
  }

  set level(level: string) {
    this.logger.level = level;
  }

  /**
   * Child logger that adds context to every entry
   */
  child(context: LogMeta): Logger {
    return new Logger({ level: this.level }, { ...this.context, ...context }, this.logger);
  }

  close(): void {
    this.logger.close();
  }

  private log(level: string, message: string, meta: LogMeta = {}): void {
    this.logger.log(level, message, { ...this.context, ...meta });
  }
}

export const defaultLogger = new Logger();

export default Logger;
