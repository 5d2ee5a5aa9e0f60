import type { EntrySkipReason, FeedEntry, NormalizedArticle } from './types.js';
import { collapseWhitespace, nowISO } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

export const DEFAULT_LANGUAGE = 'en';

export interface NormalizeContext {
  sourceName: string;
  sourceId: string | null;
  now?: Date;
}

/**
 * Source-independent article fields, as found in a feed entry or a page listing.
 */
export interface ArticleFields {
  url?: string | null;
  title?: string | null;
  publishedAt?: string | null;
  author?: string | null;
  description?: string | null;
  content?: string | null;
}

export type NormalizeOutcome =
  | { kind: 'ok'; article: NormalizedArticle }
  | { kind: 'skip'; reason: EntrySkipReason; url?: string };

/**
 * Parse a feed or page date string into ISO 8601. Unparseable input yields null.
 */
export function parseDate(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  if (!trimmed) return null;

  const date = new Date(trimmed);
  if (Number.isNaN(date.getTime())) {
    logger.debug({ value: trimmed }, 'Unparseable date');
    return null;
  }
  return date.toISOString();
}

function present(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  return value.trim().length > 0 ? value : null;
}

export function normalizeFields(fields: ArticleFields, ctx: NormalizeContext): NormalizeOutcome {
  const url = present(fields.url)?.trim();
  if (!url) {
    return { kind: 'skip', reason: 'missing_url' };
  }

  const title = collapseWhitespace(fields.title);
  if (!title) {
    return { kind: 'skip', reason: 'missing_title', url };
  }

  return {
    kind: 'ok',
    article: {
      url,
      title,
      published_at: parseDate(fields.publishedAt),
      source: ctx.sourceName,
      source_id: ctx.sourceId,
      author: collapseWhitespace(fields.author),
      description: collapseWhitespace(fields.description),
      content: present(fields.content),
      language: DEFAULT_LANGUAGE,
      is_translated: false,
      is_published: false,
      created_at: nowISO(ctx.now),
    },
  };
}

/**
 * Turn one feed entry into an article, or say why it was rejected.
 *
 * Date falls back from `published` to `updated`; author from `author` to
 * `authorDetail.name`; body from the full content field to the summary.
 */
export function normalizeFeedEntry(entry: FeedEntry, ctx: NormalizeContext): NormalizeOutcome {
  const published = parseDate(entry.published);

  return normalizeFields(
    {
      url: entry.link,
      title: entry.title,
      publishedAt: published ?? entry.updated,
      author: present(entry.author) ?? entry.authorDetail?.name,
      description: entry.summary,
      content: present(entry.content) ?? entry.summary,
    },
    ctx,
  );
}

/**
 * True when the entry itself carries a full body, so page extraction is unnecessary.
 */
export function hasFullContent(entry: FeedEntry): boolean {
  return present(entry.content) !== null;
}

export function isShortContent(content: string | null, minLength: number): boolean {
  return (content?.length ?? 0) < minLength;
}
