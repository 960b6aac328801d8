import type { LoggerLike, LogLevel } from './logger.js';
import type { Transport } from './scraper/network/transport.js';

export type AnchorLayout = 'paragraph' | 'table-body';

export type RequestHeaders = Record<string, string>;

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Terminal result of one logical GET. A failure is a value, never a thrown error.
 */
export type FetchOutcome =
  | { ok: true; body: Uint8Array; attempts: number }
  | { ok: false; errors: string[]; attempts: number };

export type ResultMap = Map<string, FetchOutcome>;

export interface DispatchStats {
  uniqueEndpoints: number;
  succeeded: number;
  failed: number;
  peakInFlight: number;
  durationMs: number;
}

export interface ScraperOptions {
  targetUrl: string;
  outputFile: string;
  maxConcurrent: number;
  maxRetries: number;
  backoffFactorMs: number;
  settleDelayMs: number;
  sessionTimeoutMs: number;
  layout: AnchorLayout;
  logLevel: LogLevel;
  headers: RequestHeaders;
}

export type ScraperConfig = Partial<ScraperOptions> & {
  logger?: LoggerLike;
  // Test seams; production runs use the undici transport and real timers.
  createTransport?: () => Transport;
  sleep?: SleepFn;
};

export interface ScrapeRunResult {
  urls: string[];
  outputFile: string;
  timestamp: string;
}
