import { describe, it, expect } from 'vitest';
import { applyStageResult, isStage, isTranslated, mergePatch, nextStage } from '../stage.js';
import type { StageState } from '../stage.js';

function state(overrides: Partial<StageState> = {}): StageState {
  return { is_cleaned: 0, is_translated: 0, translated_content: null, is_published: 0, ...overrides };
}

describe('nextStage', () => {
  it('starts with clean', () => {
    expect(nextStage(state())).toBe('clean');
  });

  it('moves to translate once cleaned', () => {
    expect(nextStage(state({ is_cleaned: 1 }))).toBe('translate');
  });

  it('moves to publish once translated', () => {
    expect(nextStage(state({ is_cleaned: 1, is_translated: 1 }))).toBe('publish');
  });

  it('counts translated content without the flag as translated', () => {
    expect(nextStage(state({ is_cleaned: 1, translated_content: 'текст' }))).toBe('publish');
  });

  it('is none when everything is done', () => {
    expect(nextStage(state({ is_cleaned: 1, is_translated: 1, is_published: 1 }))).toBe('none');
  });

  it('gives the same answer when asked twice', () => {
    const item = state({ is_cleaned: 1 });
    expect(nextStage(item)).toBe(nextStage(item));
    expect(item).toEqual(state({ is_cleaned: 1 }));
  });
});

describe('isTranslated', () => {
  it('accepts either the flag or stored content', () => {
    expect(isTranslated(state({ is_translated: 1 }))).toBe(true);
    expect(isTranslated(state({ translated_content: 'x' }))).toBe(true);
    expect(isTranslated(state())).toBe(false);
  });
});

describe('isStage', () => {
  it('recognises stage names only', () => {
    expect(isStage('translate')).toBe(true);
    expect(isStage('none')).toBe(false);
    expect(isStage('rewrite')).toBe(false);
  });
});

describe('applyStageResult', () => {
  it('advances a fresh item through clean and translate', () => {
    const fresh = state();

    const cleanPatch = applyStageResult(fresh, { stage: 'clean', cleanContent: 'plain', rewrittenContent: null });
    expect(cleanPatch).toEqual({ is_cleaned: 1, clean_content: 'plain' });
    const cleaned = mergePatch(fresh, cleanPatch ?? {});
    expect(nextStage(cleaned)).toBe('translate');

    const translatePatch = applyStageResult(cleaned, {
      stage: 'translate',
      translatedContent: 'перевод',
      translatedTitle: 'Заголовок',
      translatedDescription: null,
    });
    expect(translatePatch).toEqual({
      is_translated: 1,
      translated_content: 'перевод',
      translated_title: 'Заголовок',
    });
    expect(nextStage(mergePatch(cleaned, translatePatch ?? {}))).toBe('publish');
  });

  it('includes rewritten text in the clean patch', () => {
    expect(applyStageResult(state(), { stage: 'clean', cleanContent: 'c', rewrittenContent: '<p>r</p>' })).toEqual({
      is_cleaned: 1,
      clean_content: 'c',
      rewritten_content: '<p>r</p>',
    });
  });

  it('sets the published reference', () => {
    const translated = state({ is_cleaned: 1, is_translated: 1 });
    expect(applyStageResult(translated, { stage: 'publish', publishedRef: '/out/a.md' })).toEqual({
      is_published: 1,
      published_ref: '/out/a.md',
    });
  });

  it('ignores a stage that is already done', () => {
    const cleaned = state({ is_cleaned: 1 });
    expect(applyStageResult(cleaned, { stage: 'clean', cleanContent: 'again', rewrittenContent: null })).toBeNull();
  });

  it('ignores a stage whose predecessor is pending', () => {
    expect(applyStageResult(state(), { stage: 'publish', publishedRef: 'x' })).toBeNull();
  });
});
