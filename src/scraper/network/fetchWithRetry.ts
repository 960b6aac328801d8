import { describeError } from '../../errors.js';
import { getLogger, type LoggerLike } from '../../logger.js';
import type { FetchOutcome, RequestHeaders, SleepFn } from '../../types.js';
import { backoffDelayMs, DEFAULT_BACKOFF_FACTOR_MS, sleep as defaultSleep } from './backoff.js';
import { DEFAULT_HEADERS } from './headers.js';
import type { Transport } from './transport.js';

export const DEFAULT_MAX_RETRIES = 5;

export interface FetchWithRetryOptions {
  transport: Transport;
  headers?: RequestHeaders;
  maxRetries?: number;
  backoffFactorMs?: number;
  /** Session-wide deadline shared by every request in a dispatch. */
  signal?: AbortSignal;
  sleep?: SleepFn;
  logger?: LoggerLike;
}

/**
 * One logical GET with up to `maxRetries` attempts. Always resolves; a request that never
 * succeeds resolves with a failure outcome carrying one description per attempt made.
 */
export async function fetchWithRetry(
  endpoint: string,
  options: FetchWithRetryOptions,
): Promise<[string, FetchOutcome]> {
  const {
    transport,
    headers = DEFAULT_HEADERS,
    maxRetries = DEFAULT_MAX_RETRIES,
    backoffFactorMs = DEFAULT_BACKOFF_FACTOR_MS,
    signal,
    sleep = defaultSleep,
    logger = getLogger(),
  } = options;

  const errors: string[] = [];
  let attempts = 0;

  try {
    for (let attempt = 0; attempt < maxRetries; attempt += 1) {
      attempts = attempt + 1;

      try {
        const body = await transport.get(endpoint, { headers, signal });
        return [endpoint, { ok: true, body, attempts }];
      } catch (error) {
        const description = describeError(error);
        errors.push(description);
        logger.warn({ url: endpoint, attempt: attempts }, '%s | Attempt %d failed', description, attempts);
      }

      if (attempts === maxRetries) {
        break;
      }

      if (signal?.aborted) {
        logger.warn({ url: endpoint, attempt: attempts }, 'Session deadline reached; no further attempts');
        break;
      }

      await sleep(backoffDelayMs(backoffFactorMs, attempts), signal);
    }
  } catch (error) {
    // The backoff wait was interrupted (session deadline) or a collaborator faulted.
    errors.push(describeError(error));
  }

  logger.error(
    { url: endpoint, attempts, errors },
    'URL: %s GET request failed! Errors: %s',
    endpoint,
    JSON.stringify(errors),
  );

  return [endpoint, { ok: false, errors, attempts }];
}
