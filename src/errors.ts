export type ErrorKind =
  | 'fetch'
  | 'http'
  | 'parse'
  | 'config'
  | 'output'
  | 'internal';

export type ErrorSeverity = 'recoverable' | 'fatal';

export interface ScraperErrorProps {
  message: string;
  kind: ErrorKind;
  severity?: ErrorSeverity;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class ScraperError extends Error {
  readonly kind: ErrorKind;
  readonly severity: ErrorSeverity;
  readonly details?: Record<string, unknown>;

  constructor({ message, kind, severity = 'recoverable', details, cause }: ScraperErrorProps) {
    super(message, cause ? { cause } : undefined);
    this.name = `${capitalize(kind)}Error`;
    this.kind = kind;
    this.severity = severity;
    this.details = details;
  }
}

export function isScraperError(value: unknown): value is ScraperError {
  return value instanceof ScraperError;
}

export function ensureScraperError(
  error: unknown,
  fallback: Partial<ScraperErrorProps> & Pick<ScraperErrorProps, 'kind'> = { kind: 'internal' },
): ScraperError {
  if (isScraperError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ScraperError({
    message,
    kind: fallback.kind,
    severity: fallback.severity ?? 'fatal',
    details: fallback.details,
    cause: error instanceof Error ? error : undefined,
  });
}

/**
 * Short, single-line description of a failure, used for the per-endpoint attempt record.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }

  return String(error);
}

export function createFetchError(
  message: string,
  details: Record<string, unknown> = {},
  options: { severity?: ErrorSeverity; cause?: unknown } = {},
): ScraperError {
  return new ScraperError({
    message,
    kind: 'fetch',
    severity: options.severity ?? 'recoverable',
    details,
    cause: options.cause,
  });
}

export function createHttpStatusError(
  status: number,
  statusText: string,
  details: Record<string, unknown> = {},
): ScraperError {
  const suffix = statusText ? ` ${statusText}` : '';
  return new ScraperError({
    message: `HTTP ${status}${suffix}`,
    kind: 'http',
    severity: 'recoverable',
    details: { ...details, status },
  });
}

export function createParseError(
  message: string,
  details: Record<string, unknown> = {},
  options: { severity?: ErrorSeverity; cause?: unknown } = {},
): ScraperError {
  return new ScraperError({
    message,
    kind: 'parse',
    severity: options.severity ?? 'recoverable',
    details,
    cause: options.cause,
  });
}

export function createConfigurationError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): ScraperError {
  return new ScraperError({
    message,
    kind: 'config',
    severity: 'fatal',
    details,
    cause: options.cause,
  });
}

export function createOutputError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): ScraperError {
  return new ScraperError({
    message,
    kind: 'output',
    severity: 'fatal',
    details,
    cause: options.cause,
  });
}

export function createInternalError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown; severity?: ErrorSeverity } = {},
): ScraperError {
  return new ScraperError({
    message,
    kind: 'internal',
    severity: options.severity ?? 'fatal',
    details,
    cause: options.cause,
  });
}

function capitalize(value: string): string {
  if (!value) {
    return value;
  }
  return value.charAt(0).toUpperCase() + value.slice(1);
}
