import { Readability } from '@mozilla/readability';
import { JSDOM } from 'jsdom';
import type { PageFetcher } from './types.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

/**
 * Run Readability over an HTML document and return its main text, or null
 * when nothing usable comes out.
 */
export function extractMainText(html: string, url: string): string | null {
  const dom = new JSDOM(html, { url });
  try {
    const article = new Readability(dom.window.document).parse();
    const text = article?.textContent?.replace(/[ \t]+/g, ' ').replace(/\s*\n\s*/g, '\n').trim();
    return text ? text : null;
  } finally {
    dom.window.close();
  }
}

/**
 * Download an article page and extract its body text.
 * Never throws: failures are logged and come back as null, meaning
 * "keep the summary".
 */
export async function extractArticleText(url: string, fetcher: PageFetcher): Promise<string | null> {
  try {
    const html = await fetcher.get(url);
    const text = extractMainText(html, url);
    if (!text) {
      logger.warn({ url }, 'No article text extracted');
      return null;
    }
    logger.debug({ url, chars: text.length }, 'Full content extracted');
    return text;
  } catch (err) {
    logger.warn({ url, error: errorMessage(err) }, 'Full content fetch failed, using summary');
    return null;
  }
}
