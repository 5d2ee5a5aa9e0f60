import { JSDOM } from 'jsdom';
import type { PageFetcher, ParseReport, Parser } from './types.js';
import { emptyReport } from './types.js';
import type { PageSelectors } from './sourceSpec.js';
import { normalizeFields } from './normalize.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { collapseWhitespace, sleep } from '../shared/utils.js';

export interface PageParserOptions {
  sourceId: string | null;
  sourceName: string;
  pageUrl: string;
  selectors: PageSelectors;
  pageFetcher: PageFetcher;
  contentDelayMs?: number;
  now?: () => Date;
}

function selectText(root: ParentNode, selector: string | undefined): string | null {
  if (!selector) return null;
  return collapseWhitespace(root.querySelector(selector)?.textContent);
}

/**
 * Resolve an href against the listing page. Unusable hrefs yield null.
 */
export function resolveHref(href: string | null | undefined, base: string): string | null {
  const trimmed = href?.trim();
  if (!trimmed) return null;
  try {
    return new URL(trimmed, base).toString();
  } catch {
    return null;
  }
}

/**
 * Parser for HTML listing pages described by CSS selectors.
 */
export class PageParser implements Parser {
  readonly kind = 'page';
  readonly sourceName: string;

  constructor(private readonly options: PageParserOptions) {
    this.sourceName = options.sourceName;
  }

  async fetchArticles(): Promise<ParseReport> {
    const report = emptyReport();
    const { pageUrl, selectors, pageFetcher, contentDelayMs = 500 } = this.options;

    logger.info({ source: this.sourceName, pageUrl }, 'Fetching listing page');

    let html: string;
    try {
      html = await pageFetcher.get(pageUrl);
    } catch (err) {
      report.fetchError = errorMessage(err);
      logger.warn({ source: this.sourceName, pageUrl, error: report.fetchError }, 'Listing page fetch failed');
      return report;
    }

    const dom = new JSDOM(html, { url: pageUrl });
    try {
      const elements = Array.from(dom.window.document.querySelectorAll(selectors.list_item));
      logger.debug({ source: this.sourceName, count: elements.length }, 'Listing items found');

      for (const [index, element] of elements.entries()) {
        let url: string | undefined;
        try {
          url = resolveHref(element.querySelector(selectors.url)?.getAttribute('href'), pageUrl) ?? undefined;
          const outcome = normalizeFields(
            {
              url,
              title: selectText(element, selectors.title),
              publishedAt: selectText(element, selectors.date),
              author: selectText(element, selectors.author),
              description: selectText(element, selectors.description),
            },
            { sourceName: this.sourceName, sourceId: this.options.sourceId, now: this.options.now?.() },
          );

          if (outcome.kind === 'skip') {
            report.skipped.push({ index, reason: outcome.reason, url: outcome.url });
            logger.warn({ source: this.sourceName, index, reason: outcome.reason }, 'Listing item skipped');
            continue;
          }

          const article = outcome.article;
          if (selectors.content) {
            try {
              const body = await this.fetchBody(article.url, selectors);
              if (body.content) article.content = body.content;
              if (!article.description && body.description) article.description = body.description;
            } catch (err) {
              logger.warn({ url: article.url, error: errorMessage(err) }, 'Article body fetch failed');
            }
            await sleep(contentDelayMs);
          }

          report.articles.push(article);
        } catch (err) {
          const error = errorMessage(err);
          report.failed.push({ index, url, error });
          logger.error({ source: this.sourceName, index, url, error }, 'Listing item processing failed');
        }
      }
    } finally {
      dom.window.close();
    }

    logger.info(
      { source: this.sourceName, articles: report.articles.length, skipped: report.skipped.length },
      'Listing page processed',
    );
    return report;
  }

  private async fetchBody(
    url: string,
    selectors: PageSelectors,
  ): Promise<{ content: string | null; description: string | null }> {
    const html = await this.options.pageFetcher.get(url);
    const dom = new JSDOM(html, { url });
    try {
      const document = dom.window.document;
      const contentElement = selectors.content ? document.querySelector(selectors.content) : null;
      return {
        content: contentElement ? contentElement.outerHTML : null,
        description: selectText(document, selectors.meta_description),
      };
    } finally {
      dom.window.close();
    }
  }
}
