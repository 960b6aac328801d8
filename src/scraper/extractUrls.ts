import { getLogger, type LoggerLike } from '../logger.js';
import type { AnchorLayout } from '../types.js';
import { reportScraperError } from '../util/errorHandler.js';
import { dispatchAll, type DispatchOptions } from './network/dispatch.js';
import { parseAnchors } from './parsing/parseAnchors.js';
import { cleanUrl } from './url/cleanUrl.js';

export const DEFAULT_TARGET_URL = 'https://www.gov.sg/trusted-sites';

export interface ExtractUrlsOptions extends Omit<DispatchOptions, 'logger'> {
  targetUrl?: string;
  layout?: AnchorLayout;
  logger?: LoggerLike;
}

/**
 * Fetches the listing page and returns the unique cleaned hostnames it links to.
 * Never rejects: an unreachable page or any fault while extracting yields an empty set.
 */
export async function extractUrls(options: ExtractUrlsOptions = {}): Promise<Set<string>> {
  const { targetUrl = DEFAULT_TARGET_URL, layout = 'paragraph', logger = getLogger(), ...dispatchOptions } =
    options;

  try {
    const results = await dispatchAll([targetUrl], { ...dispatchOptions, logger });
    const outcome = results.get(targetUrl);

    if (!outcome?.ok) {
      logger.error({ url: targetUrl }, 'Trusted sites page content not accessible');
      return new Set();
    }

    const html = new TextDecoder().decode(outcome.body);
    const urls = new Set(parseAnchors(html, layout).map(cleanUrl));
    urls.delete('');

    if (urls.size === 0) {
      logger.warn({ url: targetUrl, layout }, 'No URLs extracted from target page');
    }

    return urls;
  } catch (error) {
    reportScraperError(error, { stage: 'extract', url: targetUrl }, { throwOnFatal: false, logger });
    return new Set();
  }
}
