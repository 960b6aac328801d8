import { load } from 'cheerio';
import type { AnyNode } from 'domhandler';

import { createParseError } from '../../errors.js';
import type { AnchorLayout } from '../../types.js';

// The listing has shipped in two layouts: links inline in paragraphs, and links in a table.
const LAYOUT_SELECTORS: Record<AnchorLayout, string> = {
  paragraph: 'p a[target="_self"], p a[target="_blank"]',
  'table-body': 'tbody a',
};

export const ANCHOR_LAYOUTS: readonly AnchorLayout[] = ['paragraph', 'table-body'];

export function isAnchorLayout(value: string): value is AnchorLayout {
  return ANCHOR_LAYOUTS.some((layout) => layout === value);
}

/**
 * Raw href values of the listing's anchors, in document order. Anchors without an href yield ''.
 */
export function parseAnchors(html: string, layout: AnchorLayout = 'paragraph'): string[] {
  try {
    const $ = load(html);
    const hrefs: string[] = [];

    $(LAYOUT_SELECTORS[layout]).each((_idx: number, element: AnyNode) => {
      hrefs.push($(element).attr('href') ?? '');
    });

    return hrefs;
  } catch (error) {
    throw createParseError('Failed to parse anchors from HTML', { htmlLength: html.length, layout }, { cause: error });
  }
}
