import type { FeedDocument, FeedFetcher, PageFetcher, ParseReport, Parser } from './types.js';
import { emptyReport } from './types.js';
import { hasFullContent, isShortContent, normalizeFeedEntry } from './normalize.js';
import { extractArticleText } from './extract.js';
import { ConfigError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { sleep } from '../shared/utils.js';

export interface FeedParserOptions {
  sourceId: string | null;
  sourceName: string;
  feedUrl: string | null;
  feedFetcher: FeedFetcher;
  pageFetcher: PageFetcher;
  fetchFullContent?: boolean;
  fullContentDelayMs?: number;
  /** Also fetch the page when the feed body is shorter than this many characters. */
  minContentLength?: number;
  now?: () => Date;
}

/**
 * Parser for RSS / Atom sources.
 */
export class FeedParser implements Parser {
  readonly kind = 'feed';
  readonly sourceName: string;
  readonly feedUrl: string;

  constructor(private readonly options: FeedParserOptions) {
    const feedUrl = options.feedUrl?.trim();
    if (!feedUrl) {
      throw new ConfigError(`Missing feed url for source ${options.sourceName}`, {
        source: options.sourceName,
      });
    }
    this.sourceName = options.sourceName;
    this.feedUrl = feedUrl;
  }

  async fetchArticles(): Promise<ParseReport> {
    const report = emptyReport();
    const { fetchFullContent = false, fullContentDelayMs = 500, minContentLength = 0 } = this.options;

    logger.info({ source: this.sourceName, feedUrl: this.feedUrl }, 'Fetching feed');

    let document: FeedDocument;
    try {
      document = await this.options.feedFetcher.parse(this.feedUrl);
    } catch (err) {
      report.fetchError = errorMessage(err);
      logger.warn({ source: this.sourceName, feedUrl: this.feedUrl, error: report.fetchError }, 'Feed fetch failed');
      return report;
    }

    if (document.malformed && document.entries.length === 0) {
      report.malformed = true;
      report.fetchError = `Feed could not be parsed: ${document.malformedReason ?? 'unknown error'}`;
      logger.warn({ source: this.sourceName, feedUrl: this.feedUrl, error: report.fetchError }, 'Feed unreadable');
      return report;
    }

    if (document.malformed) {
      report.malformed = true;
      logger.warn(
        { source: this.sourceName, feedUrl: this.feedUrl, reason: document.malformedReason },
        'Malformed feed, continuing with recovered entries',
      );
    }

    for (const [index, entry] of document.entries.entries()) {
      try {
        const outcome = normalizeFeedEntry(entry, {
          sourceName: this.sourceName,
          sourceId: this.options.sourceId,
          now: this.options.now?.(),
        });

        if (outcome.kind === 'skip') {
          report.skipped.push({ index, reason: outcome.reason, url: outcome.url });
          logger.warn({ source: this.sourceName, index, reason: outcome.reason, url: outcome.url }, 'Entry skipped');
          continue;
        }

        const article = outcome.article;
        if (fetchFullContent && (!hasFullContent(entry) || isShortContent(article.content, minContentLength))) {
          const fullText = await extractArticleText(article.url, this.options.pageFetcher);
          if (fullText) {
            article.content = fullText;
          }
          await sleep(fullContentDelayMs);
        }

        report.articles.push(article);
      } catch (err) {
        const error = errorMessage(err);
        report.failed.push({ index, url: entry.link, error });
        logger.error({ source: this.sourceName, index, url: entry.link, error }, 'Entry processing failed');
      }
    }

    logger.info(
      {
        source: this.sourceName,
        articles: report.articles.length,
        skipped: report.skipped.length,
        failed: report.failed.length,
      },
      'Feed processed',
    );
    return report;
  }
}
