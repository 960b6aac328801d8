import {
  ScraperError,
  ensureScraperError,
  type ErrorKind,
  type ErrorSeverity,
} from '../errors.js';
import { getLogger, type LoggerLike } from '../logger.js';

export interface ErrorContext extends Record<string, unknown> {
  stage?: string;
  url?: string;
  attempt?: number;
}

export interface ErrorHandlingOptions {
  defaultKind?: ErrorKind;
  defaultSeverity?: ErrorSeverity;
  throwOnFatal?: boolean;
  logger?: LoggerLike;
}

export function reportScraperError(
  error: unknown,
  context: ErrorContext = {},
  options: ErrorHandlingOptions = {},
): ScraperError {
  const scraperError = ensureScraperError(error, {
    kind: options.defaultKind ?? 'internal',
    severity: options.defaultSeverity,
    details: context,
  });

  const mergedDetails: Record<string, unknown> = {
    ...(scraperError.details ?? {}),
    ...context,
  };

  const logger = options.logger ?? getLogger();
  const message = buildLogMessage(scraperError, mergedDetails);
  const shouldThrow = options.throwOnFatal ?? true;

  if (scraperError.severity === 'fatal') {
    logger.error({ err: scraperError, ...mergedDetails }, message);
    if (shouldThrow) {
      throw scraperError;
    }
  } else {
    logger.warn({ err: scraperError, ...mergedDetails }, message);
  }

  return scraperError;
}

function buildLogMessage(error: ScraperError, details: Record<string, unknown>): string {
  const parts = [`[${error.kind}/${error.severity}]`, error.message];
  const contextSuffix = serialiseDetails(details);

  if (contextSuffix) {
    parts.push(`(${contextSuffix})`);
  }

  return parts.join(' ');
}

function serialiseDetails(details: Record<string, unknown>): string | undefined {
  const entries = Object.entries(details).filter(([, value]) => value !== undefined);
  if (entries.length === 0) {
    return undefined;
  }

  entries.sort(([a], [b]) => a.localeCompare(b));
  return entries
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
    .join(' ');
}
