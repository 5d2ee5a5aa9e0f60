import type Database from 'better-sqlite3';
import type { PageFetcher } from './types.js';
import { extractArticleText } from './extract.js';
import { findShortContentItems, getSource, touchItem, updateItemContent } from './sourceDb.js';
import { IngestError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { sleep } from '../shared/utils.js';

export interface RefreshOptions {
  /** Items whose stored body is shorter than this get the page text. */
  minLength: number;
  limit?: number;
  sourceId?: string;
  dryRun?: boolean;
  delayMs?: number;
}

export interface RefreshStats {
  checked: number;
  updated: number;
  failed: number;
  charsBefore: number;
  charsAfter: number;
  durationMs: number;
}

/**
 * Download the article page for stored items with a short body and keep the
 * extracted text when it is longer than what is stored.
 *
 * Items that could not be improved are touched so the next run starts with
 * others.
 */
export async function refreshShortContent(
  db: Database.Database,
  options: RefreshOptions,
  pageFetcher: PageFetcher,
): Promise<RefreshStats> {
  const startTime = Date.now();
  const stats: RefreshStats = { checked: 0, updated: 0, failed: 0, charsBefore: 0, charsAfter: 0, durationMs: 0 };

  if (options.sourceId && !getSource(db, options.sourceId)) {
    throw new IngestError(`Source not found: ${options.sourceId}`, { source_id: options.sourceId });
  }

  const items = findShortContentItems(db, options.minLength, {
    limit: options.limit,
    sourceId: options.sourceId,
  });
  if (items.length === 0) {
    logger.info({ minLength: options.minLength }, 'No items with short content');
    stats.durationMs = Date.now() - startTime;
    return stats;
  }

  for (const [index, item] of items.entries()) {
    stats.checked++;
    const before = item.content?.length ?? 0;
    const text = await extractArticleText(item.url, pageFetcher);

    if (!text || text.length <= before) {
      stats.failed++;
      logger.warn({ id: item.id, url: item.url, chars: before }, 'No longer text found for item');
      if (!options.dryRun) touchItem(db, item.id);
    } else if (options.dryRun || updateItemContent(db, item.id, text)) {
      stats.updated++;
      stats.charsBefore += before;
      stats.charsAfter += text.length;
      logger.info({ id: item.id, before, after: text.length }, 'Item content refreshed');
    } else {
      stats.failed++;
      logger.warn({ id: item.id }, 'Item was cleaned meanwhile, content not replaced');
    }

    if (options.delayMs && index < items.length - 1) {
      await sleep(options.delayMs);
    }
  }

  stats.durationMs = Date.now() - startTime;
  logger.info({ checked: stats.checked, updated: stats.updated, failed: stats.failed }, 'Content refresh complete');
  return stats;
}
