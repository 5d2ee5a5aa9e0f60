import type Database from 'better-sqlite3';
import type { ItemRow } from '../source/types.js';
import type { EnrichmentService } from './enrichment.js';
import type { Publisher } from './publisher.js';
import { STAGE_ORDER, applyStageResult, mergePatch, nextStage } from './stage.js';
import type { Stage, StageOutput } from './stage.js';
import { applyItemPatch, queryItemsByStage, recordItemError } from './itemDb.js';
import { DbError, StageError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { sleep } from '../shared/utils.js';

export interface ProcessDeps {
  enrichment: EnrichmentService;
  publisher: Publisher;
}

export interface ProcessOptions {
  targetLanguage: string;
  /** Stages this run may perform. Defaults to all of them. */
  stages?: Stage[];
  /** Max items picked up by one run. */
  limit?: number;
  rewrite?: boolean;
  itemDelayMs?: number;
  dryRun?: boolean;
}

export interface ProcessStats {
  items: number;
  completed: Record<Stage, number>;
  failed: Record<Stage, number>;
  conflicts: number;
  errors: Array<{ id: string; stage: Stage; error: string }>;
  durationMs: number;
}

function stageCounts(): Record<Stage, number> {
  return { clean: 0, translate: 0, publish: 0 };
}

/**
 * Items waiting on any of the given stages. Items that failed before go
 * after every untried one, whatever their stage.
 */
function pickItems(db: Database.Database, stages: Stage[], limit: number): ItemRow[] {
  const seen = new Set<string>();
  const items: ItemRow[] = [];
  for (const stage of STAGE_ORDER) {
    if (!stages.includes(stage)) continue;
    for (const item of queryItemsByStage(db, stage, { limit })) {
      if (seen.has(item.id)) continue;
      seen.add(item.id);
      items.push(item);
    }
  }
  const fresh = items.filter((item) => item.last_error === null);
  const retries = items.filter((item) => item.last_error !== null);
  return [...fresh, ...retries].slice(0, limit);
}

async function optionalTranslation(
  text: string | null,
  field: string,
  item: ItemRow,
  deps: ProcessDeps,
  language: string,
): Promise<string | null> {
  if (!text) return null;
  try {
    return await deps.enrichment.translate(text, language);
  } catch (err) {
    logger.warn({ id: item.id, field, error: errorMessage(err) }, 'Translation failed, keeping original');
    return null;
  }
}

async function runStage(
  item: ItemRow,
  stage: Stage,
  deps: ProcessDeps,
  options: ProcessOptions,
): Promise<StageOutput> {
  switch (stage) {
    case 'clean': {
      const raw = item.content ?? item.description;
      if (!raw) throw new StageError('Item has no content to clean', { id: item.id });
      const cleanContent = await deps.enrichment.clean(raw);
      if (!cleanContent) throw new StageError('Cleaning produced no text', { id: item.id });
      const rewrittenContent = options.rewrite ? await deps.enrichment.rewrite(cleanContent) : null;
      return { stage, cleanContent, rewrittenContent };
    }

    case 'translate': {
      const text = item.rewritten_content ?? item.clean_content;
      if (!text) throw new StageError('Item has no cleaned text to translate', { id: item.id });
      const translatedContent = await deps.enrichment.translate(text, options.targetLanguage);
      return {
        stage,
        translatedContent,
        translatedTitle: await optionalTranslation(item.title, 'title', item, deps, options.targetLanguage),
        translatedDescription: await optionalTranslation(
          item.description,
          'description',
          item,
          deps,
          options.targetLanguage,
        ),
      };
    }

    case 'publish': {
      if (options.dryRun) {
        logger.info({ id: item.id, title: item.title }, 'Dry run: item not published');
        return { stage, publishedRef: 'dry-run' };
      }
      return { stage, publishedRef: await deps.publisher.publish(item) };
    }
  }
}

/**
 * Advance one item through every allowed stage until it is done or a stage fails.
 */
async function advanceItem(
  db: Database.Database,
  item: ItemRow,
  stages: Stage[],
  deps: ProcessDeps,
  options: ProcessOptions,
  stats: ProcessStats,
): Promise<void> {
  let current = item;

  for (;;) {
    const stage = nextStage(current);
    if (stage === 'none' || !stages.includes(stage)) return;

    let output: StageOutput;
    try {
      output = await runStage(current, stage, deps, options);
    } catch (err) {
      if (err instanceof DbError) throw err;
      const error = errorMessage(err);
      logger.error({ id: current.id, stage, error }, 'Stage failed');
      stats.failed[stage]++;
      stats.errors.push({ id: current.id, stage, error });
      if (!options.dryRun) recordItemError(db, current.id, stage, error);
      return;
    }

    const patch = applyStageResult(current, output);
    if (!patch) return;

    if (!options.dryRun && !applyItemPatch(db, current.id, stage, patch)) {
      logger.warn({ id: current.id, stage }, 'Item already moved past this stage, skipping');
      stats.conflicts++;
      return;
    }

    current = mergePatch(current, patch);
    stats.completed[stage]++;
    logger.info({ id: current.id, stage }, 'Stage completed');
  }
}

export async function runProcess(
  db: Database.Database,
  deps: ProcessDeps,
  options: ProcessOptions,
): Promise<ProcessStats> {
  const startTime = Date.now();
  const stages = options.stages ?? [...STAGE_ORDER];
  const limit = options.limit ?? 5;

  const stats: ProcessStats = {
    items: 0,
    completed: stageCounts(),
    failed: stageCounts(),
    conflicts: 0,
    errors: [],
    durationMs: 0,
  };

  const items = pickItems(db, stages, limit);
  stats.items = items.length;

  if (items.length === 0) {
    logger.info({ stages }, 'No items waiting for processing');
    stats.durationMs = Date.now() - startTime;
    return stats;
  }

  logger.info({ items: items.length, stages, dryRun: options.dryRun ?? false }, 'Processing items');

  for (const [index, item] of items.entries()) {
    await advanceItem(db, item, stages, deps, options, stats);

    if (index < items.length - 1) {
      await sleep(options.itemDelayMs ?? 0);
    }
  }

  stats.durationMs = Date.now() - startTime;
  logger.info(
    { items: stats.items, completed: stats.completed, failed: stats.failed, durationMs: stats.durationMs },
    'Processing complete',
  );
  return stats;
}
