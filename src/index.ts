import { createConfigurationError, createInternalError } from './errors.js';
import { configureLogger, isLogLevel } from './logger.js';
import { DEFAULT_TARGET_URL, extractUrls } from './scraper/extractUrls.js';
import { DEFAULT_BACKOFF_FACTOR_MS } from './scraper/network/backoff.js';
import {
  DEFAULT_MAX_CONCURRENT,
  DEFAULT_SESSION_TIMEOUT_MS,
  DEFAULT_SETTLE_DELAY_MS,
  MAX_SESSION_TIMEOUT_MS,
} from './scraper/network/dispatch.js';
import { DEFAULT_MAX_RETRIES } from './scraper/network/fetchWithRetry.js';
import { DEFAULT_HEADERS } from './scraper/network/headers.js';
import { isAnchorLayout } from './scraper/parsing/parseAnchors.js';
import type { ScrapeRunResult, ScraperConfig, ScraperOptions } from './types.js';
import { formatUtcTimestamp, writeAllowlist } from './util/output.js';

export const DEFAULT_OPTIONS: ScraperOptions = {
  targetUrl: DEFAULT_TARGET_URL,
  outputFile: 'allowlist.txt',
  maxConcurrent: DEFAULT_MAX_CONCURRENT,
  maxRetries: DEFAULT_MAX_RETRIES,
  backoffFactorMs: DEFAULT_BACKOFF_FACTOR_MS,
  settleDelayMs: DEFAULT_SETTLE_DELAY_MS,
  sessionTimeoutMs: DEFAULT_SESSION_TIMEOUT_MS,
  layout: 'paragraph',
  logLevel: 'info',
  headers: { ...DEFAULT_HEADERS },
};

/**
 * Scrapes the listing and writes the allowlist file. An empty result is the one condition the
 * extraction layer leaves to the caller, and it is fatal here.
 */
export async function scrapeAllowlist(config: ScraperConfig = {}): Promise<ScrapeRunResult> {
  const options = resolveOptions(config);

  const logger = config.logger ?? configureLogger({ level: options.logLevel });

  const urls = await extractUrls({
    targetUrl: options.targetUrl,
    layout: options.layout,
    maxConcurrent: options.maxConcurrent,
    maxRetries: options.maxRetries,
    backoffFactorMs: options.backoffFactorMs,
    settleDelayMs: options.settleDelayMs,
    sessionTimeoutMs: options.sessionTimeoutMs,
    headers: options.headers,
    createTransport: config.createTransport,
    sleep: config.sleep,
    logger,
  });

  if (urls.size === 0) {
    throw createInternalError('Failed to scrape URLs', { targetUrl: options.targetUrl });
  }

  const timestamp = formatUtcTimestamp();
  const written = await writeAllowlist(options.outputFile, urls);
  logger.info(
    { count: written.length, outputFile: options.outputFile, timestamp },
    '%d URLs written to %s at %s',
    written.length,
    options.outputFile,
    timestamp,
  );

  return { urls: written, outputFile: options.outputFile, timestamp };
}

export function resolveOptions(config: ScraperConfig): ScraperOptions {
  const options: ScraperOptions = {
    targetUrl: validateTargetUrl(config.targetUrl ?? DEFAULT_OPTIONS.targetUrl),
    outputFile: config.outputFile ?? DEFAULT_OPTIONS.outputFile,
    maxConcurrent: coercePositiveInteger(
      config.maxConcurrent ?? DEFAULT_OPTIONS.maxConcurrent,
      'concurrency',
    ),
    maxRetries: coercePositiveInteger(config.maxRetries ?? DEFAULT_OPTIONS.maxRetries, 'max-retries'),
    backoffFactorMs: coerceNonNegative(
      config.backoffFactorMs ?? DEFAULT_OPTIONS.backoffFactorMs,
      'backoff-factor-ms',
    ),
    settleDelayMs: coerceNonNegative(
      config.settleDelayMs ?? DEFAULT_OPTIONS.settleDelayMs,
      'settle-delay-ms',
    ),
    sessionTimeoutMs: coerceTimeout(config.sessionTimeoutMs ?? DEFAULT_OPTIONS.sessionTimeoutMs),
    layout: config.layout ?? DEFAULT_OPTIONS.layout,
    logLevel: config.logLevel ?? DEFAULT_OPTIONS.logLevel,
    headers: { ...DEFAULT_OPTIONS.headers, ...(config.headers ?? {}) },
  };

  if (!options.outputFile.trim()) {
    throw createConfigurationError('output-file must not be empty.', { outputFile: options.outputFile });
  }

  if (!isAnchorLayout(options.layout)) {
    throw createConfigurationError(`Unsupported layout: ${options.layout}`, { layout: options.layout });
  }

  if (!isLogLevel(options.logLevel)) {
    throw createConfigurationError(`Unsupported log level: ${options.logLevel}`, {
      logLevel: options.logLevel,
    });
  }

  return options;
}

function validateTargetUrl(targetUrl: string): string {
  let url: URL;

  try {
    url = new URL(targetUrl);
  } catch {
    throw createConfigurationError(`Invalid URL: ${targetUrl}`, { targetUrl });
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw createConfigurationError('Target URL must use http or https protocol.', {
      protocol: url.protocol,
      targetUrl,
    });
  }

  return targetUrl;
}

function coercePositiveInteger(value: number, field: string): number {
  if (!Number.isFinite(value) || value < 1) {
    throw createConfigurationError(`${field} must be a positive integer.`, { value, field });
  }

  return Math.trunc(value);
}

function coerceTimeout(value: number): number {
  const timeoutMs = coercePositiveInteger(value, 'timeout-ms');
  if (timeoutMs > MAX_SESSION_TIMEOUT_MS) {
    throw createConfigurationError(`timeout-ms must not exceed ${MAX_SESSION_TIMEOUT_MS}.`, {
      value,
      field: 'timeout-ms',
    });
  }

  return timeoutMs;
}

function coerceNonNegative(value: number, field: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw createConfigurationError(`${field} must be zero or a positive number.`, { value, field });
  }

  return value;
}

export { extractUrls } from './scraper/extractUrls.js';
export { dispatchAll } from './scraper/network/dispatch.js';
export { fetchWithRetry } from './scraper/network/fetchWithRetry.js';
export { backoffDelayMs } from './scraper/network/backoff.js';
export { configureKeepAlive, createKeepAliveConnector } from './scraper/network/keepAlive.js';
export { createHttpTransport, type Transport } from './scraper/network/transport.js';
export { parseAnchors } from './scraper/parsing/parseAnchors.js';
export { cleanUrl } from './scraper/url/cleanUrl.js';
export type {
  AnchorLayout,
  DispatchStats,
  FetchOutcome,
  ResultMap,
  ScrapeRunResult,
  ScraperConfig,
  ScraperOptions,
} from './types.js';
