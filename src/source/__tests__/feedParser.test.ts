import { describe, it, expect, vi } from 'vitest';
import { FeedParser } from '../feedParser.js';
import type { FeedDocument, FeedEntry, FeedFetcher, PageFetcher } from '../types.js';
import { ConfigError } from '../../shared/errors.js';

const ARTICLE_HTML = `<html><body><article>
  <p>Full article text fetched from the page itself, long enough for the extractor to keep it.</p>
  <p>A second paragraph with more words so the page reads like a real article body.</p>
</article></body></html>`;

function feedOf(entries: FeedEntry[], malformed = false): FeedFetcher {
  const document: FeedDocument = { entries, malformed, malformedReason: malformed ? 'bad xml' : null };
  return { parse: vi.fn().mockResolvedValue(document) };
}

function pages(html = ARTICLE_HTML): PageFetcher {
  return { get: vi.fn().mockResolvedValue(html) };
}

function makeParser(feedFetcher: FeedFetcher, pageFetcher: PageFetcher = pages(), fetchFullContent = false): FeedParser {
  return new FeedParser({
    sourceId: null,
    sourceName: 'Example Feed',
    feedUrl: 'https://example.com/feed.xml',
    feedFetcher,
    pageFetcher,
    fetchFullContent,
    fullContentDelayMs: 0,
    now: () => new Date('2024-02-01T00:00:00.000Z'),
  });
}

describe('FeedParser', () => {
  it('rejects a source without a feed url', () => {
    expect(
      () =>
        new FeedParser({
          sourceId: null,
          sourceName: 'No Feed',
          feedUrl: '  ',
          feedFetcher: feedOf([]),
          pageFetcher: pages(),
        }),
    ).toThrow(ConfigError);
  });

  it('returns one article per valid entry', async () => {
    const feedFetcher = feedOf([
      { link: 'https://example.com/a', title: 'A', summary: 'first' },
      { link: 'https://example.com/b', title: 'B', summary: 'second' },
    ]);
    const report = await makeParser(feedFetcher).fetchArticles();

    expect(feedFetcher.parse).toHaveBeenCalledWith('https://example.com/feed.xml');
    expect(report.articles.map((a) => a.url)).toEqual(['https://example.com/a', 'https://example.com/b']);
    expect(report.articles[0]?.source).toBe('Example Feed');
    expect(report.fetchError).toBeNull();
    expect(report.malformed).toBe(false);
  });

  it('drops entries missing url or title without double counting', async () => {
    const report = await makeParser(
      feedOf([
        { link: 'https://example.com/ok', title: 'Ok' },
        { link: 'https://example.com/untitled' },
        { title: 'No link' },
        {},
      ]),
    ).fetchArticles();

    expect(report.articles).toHaveLength(1);
    expect(report.skipped).toEqual([
      { index: 1, reason: 'missing_title', url: 'https://example.com/untitled' },
      { index: 2, reason: 'missing_url', url: undefined },
      { index: 3, reason: 'missing_url', url: undefined },
    ]);
  });

  it('returns an empty report for an empty feed', async () => {
    const report = await makeParser(feedOf([])).fetchArticles();
    expect(report.articles).toEqual([]);
    expect(report.fetchError).toBeNull();
  });

  it('keeps going after an entry fails', async () => {
    const broken: FeedEntry = {
      link: 'https://example.com/broken',
      get title(): string {
        throw new Error('boom');
      },
    };
    const report = await makeParser(
      feedOf([broken, { link: 'https://example.com/fine', title: 'Fine' }]),
    ).fetchArticles();

    expect(report.failed).toEqual([{ index: 0, url: 'https://example.com/broken', error: 'boom' }]);
    expect(report.articles.map((a) => a.url)).toEqual(['https://example.com/fine']);
  });

  it('flags malformed feeds and keeps recovered entries', async () => {
    const report = await makeParser(feedOf([{ link: 'https://example.com/a', title: 'A' }], true)).fetchArticles();
    expect(report.malformed).toBe(true);
    expect(report.articles).toHaveLength(1);
  });

  it('reports a feed with nothing recoverable as a fetch error', async () => {
    const feedFetcher: FeedFetcher = {
      parse: vi.fn().mockResolvedValue({ entries: [], malformed: true, malformedReason: 'Unexpected close tag' }),
    };
    const report = await makeParser(feedFetcher).fetchArticles();

    expect(report.malformed).toBe(true);
    expect(report.fetchError).toBe('Feed could not be parsed: Unexpected close tag');
    expect(report.articles).toEqual([]);
  });

  it('reports a feed that cannot be retrieved', async () => {
    const feedFetcher: FeedFetcher = { parse: vi.fn().mockRejectedValue(new Error('Fetch failed: 503')) };
    const report = await makeParser(feedFetcher).fetchArticles();

    expect(report.fetchError).toBe('Fetch failed: 503');
    expect(report.articles).toEqual([]);
  });

  describe('full content', () => {
    it('replaces the summary with the extracted page text', async () => {
      const pageFetcher = pages();
      const report = await makeParser(
        feedOf([{ link: 'https://example.com/a', title: 'A', summary: 'teaser' }]),
        pageFetcher,
        true,
      ).fetchArticles();

      expect(pageFetcher.get).toHaveBeenCalledWith('https://example.com/a');
      expect(report.articles[0]?.content).toContain('Full article text fetched from the page itself');
      expect(report.articles[0]?.description).toBe('teaser');
    });

    it('skips the download when the entry carries a body', async () => {
      const pageFetcher = pages();
      const report = await makeParser(
        feedOf([{ link: 'https://example.com/a', title: 'A', content: '<p>body</p>', summary: 'teaser' }]),
        pageFetcher,
        true,
      ).fetchArticles();

      expect(pageFetcher.get).not.toHaveBeenCalled();
      expect(report.articles[0]?.content).toBe('<p>body</p>');
    });

    it('keeps the summary when the download fails', async () => {
      const pageFetcher: PageFetcher = { get: vi.fn().mockRejectedValue(new Error('timeout')) };
      const report = await makeParser(
        feedOf([{ link: 'https://example.com/a', title: 'A', summary: 'teaser' }]),
        pageFetcher,
        true,
      ).fetchArticles();

      expect(report.articles[0]?.content).toBe('teaser');
      expect(report.failed).toEqual([]);
    });

    it('downloads the page when the feed body is shorter than the minimum', async () => {
      const pageFetcher = pages();
      const parser = new FeedParser({
        sourceId: null,
        sourceName: 'Example Feed',
        feedUrl: 'https://example.com/feed.xml',
        feedFetcher: feedOf([
          { link: 'https://example.com/short', title: 'Short', content: '<p>Only a teaser.</p>' },
          { link: 'https://example.com/long', title: 'Long', content: `<p>${'word '.repeat(40)}</p>` },
        ]),
        pageFetcher,
        fetchFullContent: true,
        fullContentDelayMs: 0,
        minContentLength: 100,
      });
      const report = await parser.fetchArticles();

      expect(pageFetcher.get).toHaveBeenCalledTimes(1);
      expect(pageFetcher.get).toHaveBeenCalledWith('https://example.com/short');
      expect(report.articles[0]?.content).toContain('Full article text fetched from the page itself');
      expect(report.articles[1]?.content).toBe(`<p>${'word '.repeat(40)}</p>`);
    });

    it('does nothing when disabled', async () => {
      const pageFetcher = pages();
      await makeParser(feedOf([{ link: 'https://example.com/a', title: 'A' }]), pageFetcher, false).fetchArticles();
      expect(pageFetcher.get).not.toHaveBeenCalled();
    });
  });
});
