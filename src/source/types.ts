/**
 * Database row shape for the sources table.
 */
export interface SourceRow {
  id: string;
  name: string;
  url: string;
  feed_url: string | null;
  parser_type: string;
  selectors: string | null;
  is_active: number;
  last_fetch_at: string | null;
  fetch_interval_sec: number;
  created_at: string;
  updated_at: string;
}

/**
 * Database row shape for the items table.
 */
export interface ItemRow {
  id: string;
  url: string;
  title: string;
  published_at: string | null;
  source: string;
  source_id: string | null;
  author: string | null;
  description: string | null;
  content: string | null;
  language: string;
  is_cleaned: number;
  clean_content: string | null;
  rewritten_content: string | null;
  is_translated: number;
  translated_content: string | null;
  translated_title: string | null;
  translated_description: string | null;
  is_published: number;
  published_ref: string | null;
  last_error: string | null;
  last_error_stage: string | null;
  created_at: string;
  updated_at: string;
}

export type ParserKind = 'feed' | 'page';

/**
 * One raw record from a feed document, before normalization.
 */
export interface FeedEntry {
  link?: string;
  title?: string;
  published?: string;
  updated?: string;
  author?: string;
  authorDetail?: { name?: string };
  /** Full body, when the feed ships one (content:encoded, Atom content). */
  content?: string;
  summary?: string;
}

/**
 * A normalized article, ready to be upserted by url.
 */
export interface NormalizedArticle {
  url: string;
  title: string;
  published_at: string | null;
  source: string;
  source_id: string | null;
  author: string | null;
  description: string | null;
  content: string | null;
  language: string;
  is_translated: false;
  is_published: false;
  created_at: string;
}

export type EntrySkipReason = 'missing_url' | 'missing_title';

export interface EntrySkip {
  index: number;
  reason: EntrySkipReason;
  url?: string;
}

export interface EntryFailure {
  index: number;
  url?: string;
  error: string;
}

/**
 * Outcome of one parser pass over a source.
 * `fetchError` is set when the listing could not be retrieved at all.
 */
export interface ParseReport {
  articles: NormalizedArticle[];
  skipped: EntrySkip[];
  failed: EntryFailure[];
  malformed: boolean;
  fetchError: string | null;
}

export interface Parser {
  readonly kind: ParserKind;
  readonly sourceName: string;
  fetchArticles(): Promise<ParseReport>;
}

export interface FeedDocument {
  entries: FeedEntry[];
  malformed: boolean;
  malformedReason: string | null;
}

export interface FeedFetcher {
  parse(feedUrl: string): Promise<FeedDocument>;
}

export interface PageFetcher {
  get(url: string): Promise<string>;
}

export function emptyReport(): ParseReport {
  return { articles: [], skipped: [], failed: [], malformed: false, fetchError: null };
}
