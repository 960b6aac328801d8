import { Agent, fetch, type Response } from 'undici';

import {
  createFetchError,
  createHttpStatusError,
  isScraperError,
  type ScraperError,
} from '../../errors.js';
import type { LoggerLike } from '../../logger.js';
import type { RequestHeaders } from '../../types.js';
import {
  createKeepAliveConnector,
  DEFAULT_KEEP_ALIVE,
  type ConnectHook,
  type KeepAliveSettings,
} from './keepAlive.js';

export interface TransportRequest {
  headers: RequestHeaders;
  signal?: AbortSignal;
}

/**
 * A connection pool that can issue GET requests. Resolves with the full body on a 2xx response
 * and rejects with a ScraperError otherwise.
 */
export interface Transport {
  get(url: string, request: TransportRequest): Promise<Uint8Array>;
  close(): Promise<void>;
}

export interface HttpTransportOptions {
  keepAlive?: KeepAliveSettings;
  keepAliveTimeoutMs?: number;
  connectTimeoutMs?: number;
  logger?: LoggerLike;
  onConnect?: ConnectHook;
}

const DEFAULT_POOL_KEEP_ALIVE_TIMEOUT_MS = 60_000;

export function createHttpTransport(options: HttpTransportOptions = {}): Transport {
  const agent = new Agent({
    // No per-origin cap: admission control happens in the dispatcher.
    connections: null,
    keepAliveTimeout: options.keepAliveTimeoutMs ?? DEFAULT_POOL_KEEP_ALIVE_TIMEOUT_MS,
    connect: createKeepAliveConnector({
      keepAlive: options.keepAlive ?? DEFAULT_KEEP_ALIVE,
      connectTimeoutMs: options.connectTimeoutMs,
      logger: options.logger,
      onConnect: options.onConnect,
    }),
  });

  return {
    async get(url: string, request: TransportRequest): Promise<Uint8Array> {
      let response: Response;

      try {
        response = await fetch(url, {
          method: 'GET',
          redirect: 'follow',
          headers: request.headers,
          signal: request.signal,
          dispatcher: agent,
        });
      } catch (error) {
        throw toFetchError(error, url, request.signal);
      }

      if (!response.ok) {
        // Drain so the connection returns to the pool.
        await response.body?.cancel();
        throw createHttpStatusError(response.status, response.statusText, { url });
      }

      try {
        return new Uint8Array(await response.arrayBuffer());
      } catch (error) {
        throw toFetchError(error, url, request.signal);
      }
    },

    async close(): Promise<void> {
      await agent.close();
    },
  };
}

function toFetchError(error: unknown, url: string, signal: AbortSignal | undefined): ScraperError {
  if (isScraperError(error)) {
    return error;
  }

  const err = error instanceof Error ? error : new Error(String(error));
  const aborted = signal?.aborted === true;
  const code = extractErrorCode(err);
  const causeMessage = err.cause instanceof Error ? err.cause.message : undefined;

  let message: string;
  if (aborted) {
    message = 'Request aborted: session timeout elapsed';
  } else if (causeMessage && causeMessage !== err.message) {
    message = `${err.message}: ${causeMessage}`;
  } else {
    message = err.message || 'Request failed';
  }

  return createFetchError(
    message,
    {
      url,
      ...(typeof code === 'string' ? { code } : {}),
      ...(aborted ? { aborted } : {}),
    },
    { cause: err },
  );
}

export function extractErrorCode(error: Error): string | undefined {
  if (isScraperError(error)) {
    const detailsCode = error.details?.code;
    if (typeof detailsCode === 'string') {
      return detailsCode;
    }
  }

  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }

  if (error.cause instanceof Error) {
    return extractErrorCode(error.cause);
  }

  return undefined;
}
