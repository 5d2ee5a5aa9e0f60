import type Database from 'better-sqlite3';
import type { ItemRow, NormalizedArticle, SourceRow } from './types.js';
import { isDue } from './schedule.js';
import { generateId, nowISO } from '../shared/utils.js';
import { DbError, errorMessage } from '../shared/errors.js';

// ================================================================
// Sources
// ================================================================

export interface AddSourceInput {
  name: string;
  url: string;
  parserType: string;
  feedUrl?: string | null;
  selectors?: string | null;
  isActive?: boolean;
  fetchIntervalSec?: number;
}

/**
 * Insert a source. Returns null when a source with the same name exists.
 */
export function addSource(db: Database.Database, input: AddSourceInput): string | null {
  const id = generateId();
  const now = nowISO();
  try {
    db.prepare(
      `INSERT INTO sources
       (id, name, url, feed_url, parser_type, selectors, is_active, fetch_interval_sec, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    ).run(
      id,
      input.name.trim(),
      input.url.trim(),
      input.feedUrl?.trim() || null,
      input.parserType.trim().toLowerCase(),
      input.selectors ?? null,
      input.isActive === false ? 0 : 1,
      input.fetchIntervalSec ?? 86400,
      now,
      now,
    );
    return id;
  } catch (err) {
    if (err instanceof Error && err.message.includes('UNIQUE')) {
      return null;
    }
    throw new DbError(`Failed to add source: ${errorMessage(err)}`, { name: input.name });
  }
}

export function listSources(db: Database.Database, opts: { activeOnly?: boolean } = {}): SourceRow[] {
  const where = opts.activeOnly ? 'WHERE is_active = 1' : '';
  return db.prepare(`SELECT * FROM sources ${where} ORDER BY name`).all() as SourceRow[];
}

export function getSource(db: Database.Database, id: string): SourceRow | undefined {
  return db.prepare('SELECT * FROM sources WHERE id = ?').get(id) as SourceRow | undefined;
}

export function getSourceByName(db: Database.Database, name: string): SourceRow | undefined {
  return db.prepare('SELECT * FROM sources WHERE name = ?').get(name) as SourceRow | undefined;
}

export function setSourceActive(db: Database.Database, id: string, active: boolean): boolean {
  const result = db
    .prepare('UPDATE sources SET is_active = ?, updated_at = ? WHERE id = ?')
    .run(active ? 1 : 0, nowISO(), id);
  return result.changes > 0;
}

/**
 * Record a completed fetch pass. The only write the ingest run makes to a source.
 */
export function updateSourceLastFetch(db: Database.Database, id: string, at: Date): boolean {
  try {
    const result = db
      .prepare('UPDATE sources SET last_fetch_at = ?, updated_at = ? WHERE id = ?')
      .run(nowISO(at), nowISO(), id);
    return result.changes > 0;
  } catch (err) {
    throw new DbError(`Failed to update last fetch: ${errorMessage(err)}`, { source_id: id });
  }
}

export function findDueSources(db: Database.Database, now: Date, overrideAll = false): SourceRow[] {
  return listSources(db, { activeOnly: true }).filter((source) => isDue(source, now, { overrideAll }));
}

// ================================================================
// Items
// ================================================================

export type UpsertResult = 'inserted' | 'merged' | 'skipped';

/**
 * Insert an article unless its url is known. A known url only gets its
 * still-empty author, date, description or content filled in; nothing that
 * is already set, including any enrichment output, is overwritten.
 */
export function upsertArticle(db: Database.Database, article: NormalizedArticle): UpsertResult {
  const params = {
    author: article.author,
    published_at: article.published_at,
    description: article.description,
    content: article.content,
  };

  const run = db.transaction((): UpsertResult => {
    const existing = db.prepare('SELECT id FROM items WHERE url = ?').get(article.url) as
      | { id: string }
      | undefined;

    if (!existing) {
      db.prepare(
        `INSERT INTO items
         (id, url, title, published_at, source, source_id, author, description, content,
          language, is_translated, is_published, created_at, updated_at)
         VALUES (@id, @url, @title, @published_at, @source, @source_id, @author, @description, @content,
          @language, 0, 0, @created_at, @created_at)`,
      ).run({
        ...params,
        id: generateId(),
        url: article.url,
        title: article.title,
        source: article.source,
        source_id: article.source_id,
        language: article.language,
        created_at: article.created_at,
      });
      return 'inserted';
    }

    const result = db
      .prepare(
        `UPDATE items SET
           author = COALESCE(author, @author),
           published_at = COALESCE(published_at, @published_at),
           description = COALESCE(description, @description),
           content = COALESCE(content, @content),
           updated_at = @updated_at
         WHERE id = @id AND (
           (author IS NULL AND @author IS NOT NULL) OR
           (published_at IS NULL AND @published_at IS NOT NULL) OR
           (description IS NULL AND @description IS NOT NULL) OR
           (content IS NULL AND @content IS NOT NULL)
         )`,
      )
      .run({ ...params, id: existing.id, updated_at: nowISO() });
    return result.changes > 0 ? 'merged' : 'skipped';
  });

  try {
    return run();
  } catch (err) {
    throw new DbError(`Failed to upsert article: ${errorMessage(err)}`, { url: article.url });
  }
}

export function getItemByUrl(db: Database.Database, url: string): ItemRow | undefined {
  return db.prepare('SELECT * FROM items WHERE url = ?').get(url) as ItemRow | undefined;
}

export function countItems(db: Database.Database): number {
  const row = db.prepare('SELECT COUNT(*) AS count FROM items').get() as { count: number };
  return row.count;
}

export function getSourceItemCounts(db: Database.Database): Array<{ source: string; count: number }> {
  return db
    .prepare('SELECT source, COUNT(*) AS count FROM items GROUP BY source ORDER BY source')
    .all() as Array<{ source: string; count: number }>;
}

/**
 * Uncleaned items whose stored body is missing or shorter than `minLength`
 * characters, least recently touched first.
 */
export function findShortContentItems(
  db: Database.Database,
  minLength: number,
  opts: { limit?: number; sourceId?: string } = {},
): ItemRow[] {
  const conditions = ['is_cleaned = 0', '(content IS NULL OR length(content) < @minLength)'];
  const params: Record<string, string | number> = { minLength, limit: opts.limit ?? 10 };
  if (opts.sourceId) {
    conditions.push('source_id = @sourceId');
    params['sourceId'] = opts.sourceId;
  }
  return db
    .prepare(
      `SELECT * FROM items WHERE ${conditions.join(' AND ')}
       ORDER BY updated_at ASC, id ASC LIMIT @limit`,
    )
    .all(params) as ItemRow[];
}

/**
 * Replace the body of an item that has not been cleaned yet.
 */
export function updateItemContent(db: Database.Database, id: string, content: string): boolean {
  try {
    const result = db
      .prepare('UPDATE items SET content = ?, updated_at = ? WHERE id = ? AND is_cleaned = 0')
      .run(content, nowISO(), id);
    return result.changes > 0;
  } catch (err) {
    throw new DbError(`Failed to update item content: ${errorMessage(err)}`, { id });
  }
}

export function touchItem(db: Database.Database, id: string): void {
  try {
    db.prepare('UPDATE items SET updated_at = ? WHERE id = ?').run(nowISO(), id);
  } catch (err) {
    throw new DbError(`Failed to touch item: ${errorMessage(err)}`, { id });
  }
}
