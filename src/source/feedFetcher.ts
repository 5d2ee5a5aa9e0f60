import Parser from 'rss-parser';
import type { FeedDocument, FeedEntry, FeedFetcher } from './types.js';
import { httpGetText, type HttpFetchOptions } from './pageFetcher.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

interface RssItemFields {
  contentEncoded?: string;
  description?: string;
  published?: string;
  updated?: string;
  author?: string;
}

type RssItem = RssItemFields & Parser.Item;

const parser = new Parser<Record<string, unknown>, RssItemFields>({
  customFields: {
    item: [['content:encoded', 'contentEncoded'], 'description', 'published', 'updated', 'author'],
  },
});

function text(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value : undefined;
}

/**
 * Map an rss-parser item (RSS 2.0 or Atom) to a FeedEntry.
 *
 * rss-parser copies an RSS <description> into `content`, so `content` only
 * counts as a full body when the item has no raw description (Atom).
 */
export function toFeedEntry(item: RssItem): FeedEntry {
  const description = text(item.description);
  const content = text(item.contentEncoded) ?? (description === undefined ? text(item.content) : undefined);
  const author = text(item.author);
  const creator = text(item.creator);

  return {
    link: text(item.link),
    title: text(item.title),
    published: text(item.published) ?? text(item.pubDate),
    updated: text(item.updated),
    author,
    authorDetail: creator && creator !== author ? { name: creator } : undefined,
    content,
    summary: text(item.summary) ?? description,
  };
}

/**
 * Escape bare ampersands and drop control characters that strict XML
 * parsing rejects.
 */
export function sanitizeXml(xml: string): string {
  return xml
    .replace(/&(?!(?:[a-zA-Z][a-zA-Z0-9]*|#\d+|#x[0-9a-fA-F]+);)/g, '&amp;')
    .replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g, '');
}

/**
 * Parse feed XML. A document that only parses after sanitizing is returned
 * flagged as malformed; one that never parses is malformed with no entries.
 */
export async function parseFeedXml(xml: string): Promise<FeedDocument> {
  try {
    const feed = await parser.parseString(xml);
    return { entries: feed.items.map(toFeedEntry), malformed: false, malformedReason: null };
  } catch (err) {
    const reason = errorMessage(err);
    try {
      const feed = await parser.parseString(sanitizeXml(xml));
      return { entries: feed.items.map(toFeedEntry), malformed: true, malformedReason: reason };
    } catch {
      return { entries: [], malformed: true, malformedReason: reason };
    }
  }
}

export class RssFeedFetcher implements FeedFetcher {
  constructor(private readonly options: HttpFetchOptions = {}) {}

  async parse(feedUrl: string): Promise<FeedDocument> {
    const xml = await httpGetText(
      feedUrl,
      'application/rss+xml, application/atom+xml, application/xml, text/xml, */*',
      this.options,
    );
    const document = await parseFeedXml(xml);
    logger.debug({ feedUrl, entries: document.entries.length, malformed: document.malformed }, 'Feed parsed');
    return document;
  }
}
