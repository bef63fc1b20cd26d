/**
 * Normalizer Module
 *
 * Turns the per-mode service results into NormalizedRecords:
 * - map and extract items are plain strings and become the content as-is
 * - page-shaped items take the first non-empty of markdown, html, rawHtml
 * - items whose content resolves to an empty string are dropped
 */

import type { ScrapeDocument, SearchDocument } from '../client/index.js';
import type { Metadata, NormalizedRecord } from '../types/index.js';

/**
 * Service results of one load, tagged by the mode that produced them
 */
export type ModeResults =
  | { mode: 'scrape'; items: ScrapeDocument[] }
  | { mode: 'crawl'; items: ScrapeDocument[] }
  | { mode: 'map'; items: string[] }
  | { mode: 'extract'; items: string[] }
  | { mode: 'search'; items: SearchDocument[] };

/**
 * First non-empty content field of a page, or ''
 */
export function resolvePageContent(page: ScrapeDocument): string {
  return page.markdown || page.html || page.rawHtml || '';
}

export function resolvePageMetadata(page: ScrapeDocument): Metadata {
  return page.metadata ?? {};
}

function toRecord(content: string, metadata: Metadata): NormalizedRecord | null {
  return content ? { content, metadata } : null;
}

/**
 * Normalize one item. Returns null when the item has no content.
 */
function normalizeItem(results: ModeResults, index: number): NormalizedRecord | null {
  switch (results.mode) {
    case 'map':
    case 'extract':
      return toRecord(results.items[index] ?? '', {});
    case 'scrape':
    case 'crawl':
    case 'search': {
      const page = results.items[index];
      if (!page) return null;
      return toRecord(resolvePageContent(page), resolvePageMetadata(page));
    }
  }
}

/**
 * Yield one record per item with content, in service order
 */
export function* normalizeResults(results: ModeResults): Generator<NormalizedRecord, void, undefined> {
  for (let index = 0; index < results.items.length; index++) {
    const record = normalizeItem(results, index);
    if (record) {
      yield record;
    }
  }
}

