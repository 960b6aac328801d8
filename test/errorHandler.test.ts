import { describe, expect, it } from 'vitest';

import { createFetchError, createInternalError } from '../src/errors.js';
import { reportScraperError } from '../src/util/errorHandler.js';
import { createTestLogger } from './support/fakes.js';

describe('reportScraperError', () => {
  it('logs recoverable errors as warnings without throwing', () => {
    const logger = createTestLogger();
    const error = createFetchError('retry later', { url: 'https://example.com' });

    expect(() => {
      reportScraperError(error, { stage: 'fetch', attempt: 1 }, { logger });
    }).not.toThrow();

    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.error).not.toHaveBeenCalled();
    expect(logger.warn.mock.calls[0]?.[1]).toBe(
      '[fetch/recoverable] retry later (attempt=1 stage="fetch" url="https://example.com")',
    );
  });

  it('throws on fatal errors by default', () => {
    const logger = createTestLogger();
    const fatalError = createInternalError('boom');

    expect(() => reportScraperError(fatalError, { stage: 'run' }, { logger })).toThrowError(fatalError);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('can suppress throwing on fatal errors when requested', () => {
    const logger = createTestLogger();
    const fatalError = createInternalError('boom');

    expect(() =>
      reportScraperError(fatalError, { stage: 'run' }, { throwOnFatal: false, logger }),
    ).not.toThrow();
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('wraps unknown errors as fatal internal errors', () => {
    const logger = createTestLogger();

    const result = reportScraperError('oops', { stage: 'cli' }, { throwOnFatal: false, logger });

    expect(result.kind).toBe('internal');
    expect(result.severity).toBe('fatal');
    expect(result.name).toBe('InternalError');
    expect(logger.error.mock.calls[0]?.[1]).toBe('[internal/fatal] oops (stage="cli")');
  });

  it('passes the error and context to the logger as bindings', () => {
    const logger = createTestLogger();
    const error = createFetchError('reset', { code: 'ECONNRESET' });

    reportScraperError(error, { stage: 'fetch' }, { logger });

    expect(logger.warn.mock.calls[0]?.[0]).toEqual({ err: error, code: 'ECONNRESET', stage: 'fetch' });
  });
});
