import { describe, it, expect } from 'vitest';
import { hasFullContent, normalizeFeedEntry, normalizeFields, parseDate } from '../normalize.js';

const ctx = { sourceName: 'Example Blog', sourceId: null, now: new Date('2024-02-01T00:00:00.000Z') };

describe('parseDate', () => {
  it('parses ISO dates and RFC 822 dates', () => {
    expect(parseDate('2024-01-01')).toBe('2024-01-01T00:00:00.000Z');
    expect(parseDate('Mon, 01 Jan 2024 12:30:00 GMT')).toBe('2024-01-01T12:30:00.000Z');
  });

  it('returns null for garbage and blanks', () => {
    expect(parseDate('not a date')).toBeNull();
    expect(parseDate('  ')).toBeNull();
    expect(parseDate(undefined)).toBeNull();
  });
});

describe('normalizeFeedEntry', () => {
  it('maps a minimal entry', () => {
    const outcome = normalizeFeedEntry(
      { link: 'https://x/a', title: 'T', published: '2024-01-01', summary: 's' },
      ctx,
    );

    expect(outcome).toEqual({
      kind: 'ok',
      article: {
        url: 'https://x/a',
        title: 'T',
        published_at: '2024-01-01T00:00:00.000Z',
        source: 'Example Blog',
        source_id: null,
        author: null,
        description: 's',
        content: 's',
        language: 'en',
        is_translated: false,
        is_published: false,
        created_at: '2024-02-01T00:00:00.000Z',
      },
    });
  });

  it('falls back to updated, author detail and full content', () => {
    const outcome = normalizeFeedEntry(
      {
        link: ' https://x/b ',
        title: '  Big \n news ',
        updated: '2024-03-05T10:00:00Z',
        authorDetail: { name: 'Ann Lee' },
        content: '<p>full</p>',
        summary: 'short',
      },
      ctx,
    );

    expect(outcome.kind).toBe('ok');
    if (outcome.kind !== 'ok') return;
    expect(outcome.article.url).toBe('https://x/b');
    expect(outcome.article.title).toBe('Big news');
    expect(outcome.article.published_at).toBe('2024-03-05T10:00:00.000Z');
    expect(outcome.article.author).toBe('Ann Lee');
    expect(outcome.article.description).toBe('short');
    expect(outcome.article.content).toBe('<p>full</p>');
  });

  it('prefers author over author detail', () => {
    const outcome = normalizeFeedEntry(
      { link: 'https://x/c', title: 'C', author: 'Bob', authorDetail: { name: 'Ann' } },
      ctx,
    );
    expect(outcome.kind === 'ok' && outcome.article.author).toBe('Bob');
  });

  it('uses updated when published does not parse', () => {
    const outcome = normalizeFeedEntry(
      { link: 'https://x/d', title: 'D', published: 'yesterday-ish', updated: '2024-04-01T00:00:00Z' },
      ctx,
    );
    expect(outcome.kind === 'ok' && outcome.article.published_at).toBe('2024-04-01T00:00:00.000Z');
  });

  it('keeps an unparseable date as null', () => {
    const outcome = normalizeFeedEntry({ link: 'https://x/e', title: 'E', published: 'soon' }, ctx);
    expect(outcome.kind === 'ok' && outcome.article.published_at).toBeNull();
  });

  it('leaves content null without body or summary', () => {
    const outcome = normalizeFeedEntry({ link: 'https://x/f', title: 'F' }, ctx);
    expect(outcome.kind === 'ok' && outcome.article.content).toBeNull();
    expect(outcome.kind === 'ok' && outcome.article.description).toBeNull();
  });

  it('skips entries without a link', () => {
    expect(normalizeFeedEntry({ title: 'No link' }, ctx)).toEqual({ kind: 'skip', reason: 'missing_url' });
  });

  it('skips entries without a title, keeping the url', () => {
    expect(normalizeFeedEntry({ link: 'https://x/g', title: ' ' }, ctx)).toEqual({
      kind: 'skip',
      reason: 'missing_title',
      url: 'https://x/g',
    });
  });

  it('counts an entry missing both once, as missing url', () => {
    expect(normalizeFeedEntry({}, ctx)).toEqual({ kind: 'skip', reason: 'missing_url' });
  });
});

describe('normalizeFields', () => {
  it('records the source id', () => {
    const outcome = normalizeFields({ url: 'https://x/h', title: 'H' }, { ...ctx, sourceId: 'src-1' });
    expect(outcome.kind === 'ok' && outcome.article.source_id).toBe('src-1');
  });
});

describe('hasFullContent', () => {
  it('is true only for a non-blank content field', () => {
    expect(hasFullContent({ content: '<p>x</p>' })).toBe(true);
    expect(hasFullContent({ content: '  ', summary: 'x' })).toBe(false);
    expect(hasFullContent({ summary: 'x' })).toBe(false);
  });
});
