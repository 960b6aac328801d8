import { setTimeout as delay } from 'node:timers/promises';

import { createConfigurationError } from '../../errors.js';

export const DEFAULT_BACKOFF_FACTOR_MS = 1_000;

/**
 * Exponential backoff: `backoffFactorMs * 2^(attemptIndex - 1)`.
 * Index 1 is the first retry; index 0 is accepted and yields half the factor.
 */
export function backoffDelayMs(backoffFactorMs: number, attemptIndex: number): number {
  if (!Number.isFinite(backoffFactorMs) || backoffFactorMs < 0) {
    throw createConfigurationError('backoff factor must be a non-negative finite number.', {
      backoffFactorMs,
    });
  }

  if (!Number.isInteger(attemptIndex) || attemptIndex < 0) {
    throw createConfigurationError('attempt index must be a non-negative integer.', {
      attemptIndex,
    });
  }

  return backoffFactorMs * 2 ** (attemptIndex - 1);
}

export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) {
    return;
  }

  await delay(ms, undefined, signal ? { signal } : undefined);
}
