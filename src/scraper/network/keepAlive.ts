import { buildConnector } from 'undici';

import { describeError } from '../../errors.js';
import type { LoggerLike } from '../../logger.js';

/**
 * TCP keep-alive applied to pooled sockets. A peer that disappears while a socket idles
 * surfaces as a socket error on the next request.
 */
export interface KeepAliveSettings {
  enabled: boolean;
  idleMs: number;
}

export const DEFAULT_KEEP_ALIVE: KeepAliveSettings = {
  enabled: true,
  idleMs: 60_000,
};

// Node 20 sockets expose the idle delay only. Probe interval and probe count come from the
// operating system (net.ipv4.tcp_keepalive_intvl / tcp_keepalive_probes on Linux).

// The slice of net.Socket the configurator touches.
export interface ConfigurableSocket {
  setKeepAlive(enable?: boolean, initialDelay?: number): unknown;
  setNoDelay(noDelay?: boolean): unknown;
}

export type ConnectHook = (socket: ConfigurableSocket) => void;

/**
 * Applies keep-alive probing to a freshly opened connection. Best-effort: returns false and logs
 * at debug level when the socket rejects the option.
 */
export function configureKeepAlive(
  socket: ConfigurableSocket,
  settings: KeepAliveSettings = DEFAULT_KEEP_ALIVE,
  logger?: LoggerLike,
): boolean {
  try {
    socket.setKeepAlive(settings.enabled, settings.idleMs);
    socket.setNoDelay(true);
    return true;
  } catch (error) {
    logger?.debug({ error: describeError(error) }, 'Unable to enable TCP keep-alive on socket');
    return false;
  }
}

export interface KeepAliveConnectorOptions {
  keepAlive?: KeepAliveSettings;
  connectTimeoutMs?: number;
  logger?: LoggerLike;
  onConnect?: ConnectHook;
}

/**
 * Builds an undici connector that configures every new physical connection before the pool
 * writes the first request to it.
 */
export function createKeepAliveConnector(
  options: KeepAliveConnectorOptions = {},
): buildConnector.connector {
  const settings = options.keepAlive ?? DEFAULT_KEEP_ALIVE;
  const baseConnector = buildConnector({
    // configureKeepAlive owns the socket options.
    keepAlive: false,
    ...(options.connectTimeoutMs !== undefined ? { timeout: options.connectTimeoutMs } : {}),
  });

  return (connectOptions: buildConnector.Options, callback: buildConnector.Callback): void => {
    baseConnector(connectOptions, (error, socket) => {
      if (error) {
        callback(error, null);
        return;
      }

      if (!socket) {
        callback(new Error(`No socket returned for ${connectOptions.hostname}`), null);
        return;
      }

      configureKeepAlive(socket, settings, options.logger);
      options.onConnect?.(socket);
      callback(null, socket);
    });
  };
}
