import { describe, expect, it } from 'vitest';

import { resolveOptions } from '../src/index.js';
import { buildConfig } from '../src/util/cliOptions.js';

describe('buildConfig', () => {
  it('leaves options the user did not pass unset', () => {
    expect(buildConfig({})).toEqual({});
  });

  it('maps flags onto the run configuration', () => {
    expect(
      buildConfig({
        targetUrl: 'https://listing.example/sites',
        outputFile: 'out.txt',
        concurrency: '3',
        maxRetries: '2',
        timeoutMs: '60000',
        layout: 'TABLE-BODY',
        logLevel: 'Debug',
      }),
    ).toEqual({
      targetUrl: 'https://listing.example/sites',
      outputFile: 'out.txt',
      maxConcurrent: 3,
      maxRetries: 2,
      sessionTimeoutMs: 60_000,
      layout: 'table-body',
      logLevel: 'debug',
    });
  });

  it('rejects non-numeric counts', () => {
    expect(() => buildConfig({ concurrency: 'many' })).toThrow('concurrency must be a finite number.');
    expect(() => buildConfig({ timeoutMs: 'Infinity' })).toThrow('timeout-ms must be a finite number.');
  });

  it('rejects unknown layouts and log levels', () => {
    expect(() => buildConfig({ layout: 'grid' })).toThrow('Unsupported layout: grid');
    expect(() => buildConfig({ logLevel: 'verbose' })).toThrow('Unsupported log level: verbose');
  });

  it('leaves range checks to resolveOptions', () => {
    const config = buildConfig({ timeoutMs: '3000000000' });

    expect(config.sessionTimeoutMs).toBe(3_000_000_000);
    expect(() => resolveOptions(config)).toThrow('timeout-ms must not exceed 2147483647.');
  });
});
