#!/usr/bin/env node
import { createRequire } from 'node:module';
import { Command } from 'commander';

import { scrapeAllowlist } from './index.js';
import { ANCHOR_LAYOUTS } from './scraper/parsing/parseAnchors.js';
import { buildConfig } from './util/cliOptions.js';
import { reportScraperError } from './util/errorHandler.js';

const require = createRequire(import.meta.url);
// eslint-disable-next-line @typescript-eslint/no-var-requires -- package.json access for CLI metadata
const pkg = require('../package.json') as { version?: string };

const program = new Command();

program
  .name('trusted-sites-scraper')
  .description('Scrape the trusted-sites listing into a normalized URL allowlist.')
  .version(pkg.version ?? '0.0.0');

program
  .command('scrape', { isDefault: true })
  .description('Fetch the listing page and write the allowlist file.')
  .option('--target-url <url>', 'Listing page to scrape. (default: https://www.gov.sg/trusted-sites)')
  .option('--output-file <path>', 'Allowlist file to write. (default: allowlist.txt)')
  .option('--concurrency <number>', 'Maximum number of concurrent requests. (default: 5)')
  .option('--max-retries <number>', 'Attempts per request before giving up. (default: 5)')
  .option('--timeout-ms <number>', 'Ceiling for the whole fetch session in milliseconds. (default: 300000)')
  .option('--layout <layout>', `Listing layout to extract from (${ANCHOR_LAYOUTS.join('|')}).`)
  .option('--log-level <level>', 'Set log verbosity (pino levels: trace|debug|info|warn|error|fatal|silent).')
  .action(async (options: Record<string, unknown>) => {
    try {
      const config = buildConfig(options);
      await scrapeAllowlist(config);
    } catch (error) {
      reportCliError(error);
    }
  });

await program.parseAsync(process.argv);

function reportCliError(error: unknown): void {
  const scraperError = reportScraperError(error, { stage: 'cli' }, {
    defaultKind: 'config',
    defaultSeverity: 'fatal',
    throwOnFatal: false,
  });
  console.error(`Error: ${scraperError.message}`);
  process.exitCode = 1;
}
