import { Writable } from 'node:stream';
import { ConfigurationError, HookError } from './errors';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';
export type LogFormat = 'text' | 'json';

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  destination?: Writable;
  scope?: string;
}

const LEVEL_VALUES: Record<LogLevel, number> = {
  silent: 100,
  error: 40,
  warn: 30,
  info: 20,
  debug: 10,
};

// stdout belongs to the scheduler, so diagnostics only ever go to stderr
const DEFAULT_OPTIONS: Required<Omit<LoggerOptions, 'scope'>> = {
  level: 'warn',
  format: 'text',
  destination: process.stderr,
};

function formatScope(scope?: string): string {
  if (!scope) {
    return '';
  }
  return `[${scope}] `;
}

function serializeValue(value: unknown): unknown {
  if (value instanceof HookError) {
    return { name: value.name, message: value.message, ...value.details };
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

function serializeMetadata(metadata: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(metadata)) {
    result[key] = serializeValue(value);
  }
  return result;
}

interface LoggerSettings {
  level: LogLevel;
  format: LogFormat;
  destination: Writable;
}

export class Logger {
  // shared with every child, so configuring a parent reaches loggers already handed out
  private readonly settings: LoggerSettings;
  private scope?: string;

  constructor(options: LoggerOptions = {}, settings?: LoggerSettings) {
    this.settings = settings ?? {
      level: options.level ?? DEFAULT_OPTIONS.level,
      format: options.format ?? DEFAULT_OPTIONS.format,
      destination: options.destination ?? DEFAULT_OPTIONS.destination,
    };
    this.scope = options.scope;
  }

  child(scope: string): Logger {
    return new Logger({ scope: this.scope ? `${this.scope}:${scope}` : scope }, this.settings);
  }

  configure(options: LoggerOptions): void {
    if (options.level) {
      this.settings.level = options.level;
    }
    if (options.format) {
      this.settings.format = options.format;
    }
    if (options.destination) {
      this.settings.destination = options.destination;
    }
    if (options.scope !== undefined) {
      this.scope = options.scope;
    }
  }

  getLevel(): LogLevel {
    return this.settings.level;
  }

  debug(message: string, metadata: Record<string, unknown> = {}): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata: Record<string, unknown> = {}): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata: Record<string, unknown> = {}): void {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata: Record<string, unknown> = {}): void {
    this.write('error', message, metadata);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, metadata: Record<string, unknown>) {
    const { destination, format } = this.settings;
    if (LEVEL_VALUES[this.settings.level] > LEVEL_VALUES[level]) {
      return;
    }

    const timestamp = new Date().toISOString();
    const fields = serializeMetadata(metadata);
    if (format === 'json') {
      const payload = {
        level,
        time: timestamp,
        message,
        scope: this.scope,
        pid: process.pid,
        ...fields,
      };
      destination.write(`${JSON.stringify(payload)}\n`);
      return;
    }

    const prefix = `${timestamp} ${level.toUpperCase()} `;
    const strMetadata = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';
    destination.write(`${prefix}${formatScope(this.scope)}${message}${strMetadata}\n`);
  }
}

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function parseLogLevel(value?: string): LogLevel | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (isLogLevel(normalized)) {
    return normalized;
  }
  throw new ConfigurationError(`Unsupported log level "${value}". Use one of ${LOG_LEVELS.join(',')}.`);
}

export function parseLogFormat(value?: string): LogFormat | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (normalized === 'json' || normalized === 'text') {
    return normalized;
  }
  throw new ConfigurationError(`Unsupported log format "${value}". Use text or json.`);
}

const globalLogger = new Logger();

export function getLogger(scope?: string): Logger {
  return scope ? globalLogger.child(scope) : globalLogger;
}

export function configureLogger(options: LoggerOptions): void {
  globalLogger.configure(options);
}
