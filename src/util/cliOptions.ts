import { createConfigurationError } from '../errors.js';
import { isLogLevel } from '../logger.js';
import { isAnchorLayout } from '../scraper/parsing/parseAnchors.js';
import type { ScraperConfig } from '../types.js';

/**
 * Turns commander's parsed option bag into a run configuration. Only options the user passed are
 * set; defaults and range checks are left to resolveOptions.
 */
export function buildConfig(rawOptions: Record<string, unknown>): ScraperConfig {
  const config: ScraperConfig = {};

  if (rawOptions.targetUrl !== undefined) {
    config.targetUrl = String(rawOptions.targetUrl);
  }

  if (rawOptions.outputFile !== undefined) {
    config.outputFile = String(rawOptions.outputFile);
  }

  if (rawOptions.concurrency !== undefined) {
    config.maxConcurrent = asNumber(rawOptions.concurrency, 'concurrency');
  }

  if (rawOptions.maxRetries !== undefined) {
    config.maxRetries = asNumber(rawOptions.maxRetries, 'max-retries');
  }

  if (rawOptions.timeoutMs !== undefined) {
    config.sessionTimeoutMs = asNumber(rawOptions.timeoutMs, 'timeout-ms');
  }

  if (rawOptions.layout !== undefined) {
    const layout = String(rawOptions.layout).toLowerCase();
    if (!isAnchorLayout(layout)) {
      throw createConfigurationError(`Unsupported layout: ${layout}`, { value: layout });
    }
    config.layout = layout;
  }

  if (rawOptions.logLevel !== undefined) {
    const level = String(rawOptions.logLevel).toLowerCase();
    if (!isLogLevel(level)) {
      throw createConfigurationError(`Unsupported log level: ${level}`, { value: level });
    }
    config.logLevel = level;
  }

  return config;
}

function asNumber(value: unknown, label: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw createConfigurationError(`${label} must be a finite number.`, { value });
  }

  return parsed;
}
