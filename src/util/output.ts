import { writeFile } from 'node:fs/promises';

import { createOutputError } from '../errors.js';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

/**
 * UTC timestamp in the form `19_Oct_2026_08_05_09-UTC`.
 */
export function formatUtcTimestamp(date: Date = new Date()): string {
  const parts = [
    pad(date.getUTCDate()),
    MONTHS[date.getUTCMonth()],
    String(date.getUTCFullYear()),
    pad(date.getUTCHours()),
    pad(date.getUTCMinutes()),
    pad(date.getUTCSeconds()),
  ];

  return `${parts.join('_')}-UTC`;
}

export function renderAllowlist(sortedUrls: readonly string[]): string {
  return sortedUrls.length > 0 ? `${sortedUrls.join('\n')}\n` : '';
}

/**
 * Writes one URL per line in sorted order and returns the lines written.
 */
export async function writeAllowlist(path: string, urls: Iterable<string>): Promise<string[]> {
  const sorted = [...urls].sort();

  try {
    await writeFile(path, renderAllowlist(sorted), 'utf8');
  } catch (error) {
    throw createOutputError(`Unable to write allowlist to ${path}`, { path }, { cause: error });
  }

  return sorted;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}
