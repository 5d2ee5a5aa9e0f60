import type Database from 'better-sqlite3';
import type { ItemRow } from '../source/types.js';
import type { ItemPatch, NextStage, Stage } from './stage.js';
import { DbError, errorMessage } from '../shared/errors.js';
import { nowISO } from '../shared/utils.js';

const TRANSLATED = '(is_translated = 1 OR translated_content IS NOT NULL)';

// Same decision table as nextStage(), in SQL.
const STAGE_GUARD: Record<Stage, string> = {
  clean: 'is_cleaned = 0',
  translate: `is_cleaned = 1 AND NOT ${TRANSLATED}`,
  publish: `is_cleaned = 1 AND ${TRANSLATED} AND is_published = 0`,
};

// Items with nothing to clean are left out of the clean queue.
const STAGE_QUERY: Record<Stage, string> = {
  ...STAGE_GUARD,
  clean: `${STAGE_GUARD.clean} AND COALESCE(content, description) IS NOT NULL`,
};

const PATCH_COLUMNS = [
  'is_cleaned',
  'clean_content',
  'rewritten_content',
  'is_translated',
  'translated_content',
  'translated_title',
  'translated_description',
  'is_published',
  'published_ref',
] as const satisfies readonly (keyof ItemPatch)[];

/**
 * Items waiting on `stage`. Untried items come first, oldest first; items
 * that already failed follow, least recently attempted first.
 */
export function queryItemsByStage(
  db: Database.Database,
  stage: Stage,
  opts: { limit?: number } = {},
): ItemRow[] {
  const limit = opts.limit ?? 50;
  return db
    .prepare(
      `SELECT * FROM items WHERE ${STAGE_QUERY[stage]}
       ORDER BY last_error IS NOT NULL,
                CASE WHEN last_error IS NULL THEN created_at ELSE updated_at END,
                id
       LIMIT ?`,
    )
    .all(limit) as ItemRow[];
}

/**
 * Write a stage patch, but only while the item is still at that stage.
 * Returns false when the guard no longer matches, so flags never regress.
 */
export function applyItemPatch(db: Database.Database, id: string, stage: Stage, patch: ItemPatch): boolean {
  const sets: string[] = [];
  const params: Record<string, string | number> = { id, updated_at: nowISO() };

  for (const column of PATCH_COLUMNS) {
    const value = patch[column];
    if (value === undefined) continue;
    sets.push(`${column} = @${column}`);
    params[column] = value;
  }

  if (sets.length === 0) return false;
  sets.push('last_error = NULL', 'last_error_stage = NULL', 'updated_at = @updated_at');

  try {
    const result = db
      .prepare(`UPDATE items SET ${sets.join(', ')} WHERE id = @id AND ${STAGE_GUARD[stage]}`)
      .run(params);
    return result.changes > 0;
  } catch (err) {
    throw new DbError(`Failed to update item: ${errorMessage(err)}`, { id, stage });
  }
}

export function recordItemError(db: Database.Database, id: string, stage: Stage, message: string): void {
  try {
    db.prepare('UPDATE items SET last_error = ?, last_error_stage = ?, updated_at = ? WHERE id = ?').run(
      message.slice(0, 1000),
      stage,
      nowISO(),
      id,
    );
  } catch (err) {
    throw new DbError(`Failed to record item error: ${errorMessage(err)}`, { id, stage });
  }
}

export function countItemsByStage(db: Database.Database): Record<NextStage, number> {
  const rows = db
    .prepare(
      `SELECT
         CASE
           WHEN ${STAGE_GUARD.clean} THEN 'clean'
           WHEN ${STAGE_GUARD.translate} THEN 'translate'
           WHEN ${STAGE_GUARD.publish} THEN 'publish'
           ELSE 'none'
         END AS stage,
         COUNT(*) AS count
       FROM items
       GROUP BY stage`,
    )
    .all() as Array<{ stage: NextStage; count: number }>;

  const counts: Record<NextStage, number> = { clean: 0, translate: 0, publish: 0, none: 0 };
  for (const row of rows) {
    counts[row.stage] = row.count;
  }
  return counts;
}

export function countFailedItems(db: Database.Database): number {
  const row = db.prepare('SELECT COUNT(*) AS count FROM items WHERE last_error IS NOT NULL').get() as {
    count: number;
  };
  return row.count;
}
