import type { ItemRow } from '../source/types.js';

export type Stage = 'clean' | 'translate' | 'publish';
export type NextStage = Stage | 'none';

export const STAGE_ORDER: readonly Stage[] = ['clean', 'translate', 'publish'];

/**
 * The stored fields the stage is derived from.
 */
export type StageState = Pick<ItemRow, 'is_cleaned' | 'is_translated' | 'translated_content' | 'is_published'>;

export function isStage(value: string): value is Stage {
  return STAGE_ORDER.some((stage) => stage === value);
}

export function isTranslated(item: StageState): boolean {
  return item.is_translated === 1 || item.translated_content !== null;
}

/**
 * Which derived artifact an item needs next. Reads only; calling it twice on
 * the same item gives the same answer.
 */
export function nextStage(item: StageState): NextStage {
  if (!item.is_cleaned) return 'clean';
  if (!isTranslated(item)) return 'translate';
  if (!item.is_published) return 'publish';
  return 'none';
}

export type StageOutput =
  | { stage: 'clean'; cleanContent: string; rewrittenContent: string | null }
  | {
      stage: 'translate';
      translatedContent: string;
      translatedTitle: string | null;
      translatedDescription: string | null;
    }
  | { stage: 'publish'; publishedRef: string };

/**
 * Column changes for one completed stage. Flags only ever go from 0 to 1.
 */
export interface ItemPatch {
  is_cleaned?: 1;
  clean_content?: string;
  rewritten_content?: string;
  is_translated?: 1;
  translated_content?: string;
  translated_title?: string;
  translated_description?: string;
  is_published?: 1;
  published_ref?: string;
}

/**
 * Patch for a finished stage, or null when that stage is not the item's
 * current one (already done, or an earlier stage is still pending).
 */
export function applyStageResult(item: StageState, output: StageOutput): ItemPatch | null {
  if (nextStage(item) !== output.stage) return null;

  switch (output.stage) {
    case 'clean': {
      const patch: ItemPatch = { is_cleaned: 1, clean_content: output.cleanContent };
      if (output.rewrittenContent) patch.rewritten_content = output.rewrittenContent;
      return patch;
    }
    case 'translate': {
      const patch: ItemPatch = { is_translated: 1, translated_content: output.translatedContent };
      if (output.translatedTitle) patch.translated_title = output.translatedTitle;
      if (output.translatedDescription) patch.translated_description = output.translatedDescription;
      return patch;
    }
    case 'publish':
      return { is_published: 1, published_ref: output.publishedRef };
  }
}

/**
 * Apply a patch to an in-memory item, as the store would.
 */
export function mergePatch<T extends StageState>(item: T, patch: ItemPatch): T {
  return { ...item, ...patch };
}
