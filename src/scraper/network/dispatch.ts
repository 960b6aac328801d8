import pLimit from 'p-limit';

import { createConfigurationError, describeError } from '../../errors.js';
import { getLogger, type LoggerLike } from '../../logger.js';
import type {
  DispatchStats,
  FetchOutcome,
  RequestHeaders,
  ResultMap,
  SleepFn,
} from '../../types.js';
import { DEFAULT_BACKOFF_FACTOR_MS, sleep as defaultSleep } from './backoff.js';
import { DEFAULT_MAX_RETRIES, fetchWithRetry } from './fetchWithRetry.js';
import { DEFAULT_HEADERS } from './headers.js';
import { createHttpTransport, type Transport } from './transport.js';

export const DEFAULT_MAX_CONCURRENT = 5;
export const DEFAULT_SETTLE_DELAY_MS = 500;
export const DEFAULT_SESSION_TIMEOUT_MS = 300_000;
// Largest delay a Node timer honours; anything above fires after 1 ms.
export const MAX_SESSION_TIMEOUT_MS = 2_147_483_647;

export interface DispatchOptions {
  maxConcurrent?: number;
  headers?: RequestHeaders;
  maxRetries?: number;
  backoffFactorMs?: number;
  settleDelayMs?: number;
  sessionTimeoutMs?: number;
  createTransport?: () => Transport;
  sleep?: SleepFn;
  logger?: LoggerLike;
  onStats?: (stats: DispatchStats) => void;
}

/**
 * Fetches every distinct endpoint with at most `maxConcurrent` requests in flight and resolves
 * once each of them has a terminal outcome. The connection pool lives for exactly one call.
 */
export async function dispatchAll(
  endpoints: Iterable<string>,
  options: DispatchOptions = {},
): Promise<ResultMap> {
  const maxConcurrent = options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT;
  if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
    throw createConfigurationError('maxConcurrent must be a positive integer.', { maxConcurrent });
  }

  const sessionTimeoutMs = options.sessionTimeoutMs ?? DEFAULT_SESSION_TIMEOUT_MS;
  if (
    !Number.isInteger(sessionTimeoutMs) ||
    sessionTimeoutMs < 1 ||
    sessionTimeoutMs > MAX_SESSION_TIMEOUT_MS
  ) {
    throw createConfigurationError(
      `sessionTimeoutMs must be an integer between 1 and ${MAX_SESSION_TIMEOUT_MS}.`,
      { sessionTimeoutMs },
    );
  }

  const logger = options.logger ?? getLogger();
  const sleep = options.sleep ?? defaultSleep;
  const settleDelayMs = options.settleDelayMs ?? DEFAULT_SETTLE_DELAY_MS;
  const unique = new Set(endpoints);
  const results: ResultMap = new Map();
  const startTime = Date.now();
  const limit = pLimit(maxConcurrent);
  const signal = AbortSignal.timeout(sessionTimeoutMs);
  const transport = (options.createTransport ?? (() => createHttpTransport({ logger })))();

  let inFlight = 0;
  let peakInFlight = 0;

  const runOne = async (endpoint: string): Promise<void> => {
    inFlight += 1;
    peakInFlight = Math.max(peakInFlight, inFlight);

    let outcome: FetchOutcome;
    try {
      // Spread the initial burst over the shared pool.
      await sleep(settleDelayMs, signal);
      [, outcome] = await fetchWithRetry(endpoint, {
        transport,
        headers: options.headers ?? DEFAULT_HEADERS,
        maxRetries: options.maxRetries ?? DEFAULT_MAX_RETRIES,
        backoffFactorMs: options.backoffFactorMs ?? DEFAULT_BACKOFF_FACTOR_MS,
        signal,
        sleep,
        logger,
      });
    } catch (error) {
      const description = describeError(error);
      logger.error({ url: endpoint, error: description }, 'Fetch task aborted before completing');
      outcome = { ok: false, errors: [description], attempts: 0 };
    } finally {
      inFlight -= 1;
    }

    results.set(endpoint, outcome);
  };

  try {
    await Promise.all([...unique].map((endpoint) => limit(() => runOne(endpoint))));
  } finally {
    await transport.close();
  }

  const stats = summarise(results, peakInFlight, Date.now() - startTime);
  logger.debug({ ...stats }, 'Dispatch complete');
  options.onStats?.(stats);

  return results;
}

function summarise(results: ResultMap, peakInFlight: number, durationMs: number): DispatchStats {
  let succeeded = 0;
  for (const outcome of results.values()) {
    if (outcome.ok) {
      succeeded += 1;
    }
  }

  return {
    uniqueEndpoints: results.size,
    succeeded,
    failed: results.size - succeeded,
    peakInFlight,
    durationMs,
  };
}
