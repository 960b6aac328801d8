import pino, { type DestinationStream } from 'pino';

export interface LoggerLike {
  info(...args: unknown[]): void;
  error(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  trace(...args: unknown[]): void;
  fatal(...args: unknown[]): void;
  child(bindings: Record<string, unknown>): LoggerLike;
}

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerConfiguration {
  level?: LogLevel;
  service?: string;
  destination?: DestinationStream;
}

// Library callers stay quiet until the CLI (or an embedding app) picks a level.
const DEFAULT_LEVEL: LogLevel = 'silent';
const DEFAULT_SERVICE = 'trusted-sites-scraper';

let activeLogger: LoggerLike = createPinoInstance({});

export function configureLogger(config: LoggerConfiguration = {}): LoggerLike {
  activeLogger = createPinoInstance(config);
  return activeLogger;
}

export function getLogger(): LoggerLike {
  return activeLogger;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function createPinoInstance({
  level = DEFAULT_LEVEL,
  service = DEFAULT_SERVICE,
  destination,
}: LoggerConfiguration): LoggerLike {
  const options = { level, base: { service } };
  return destination ? pino(options, destination) : pino(options);
}
