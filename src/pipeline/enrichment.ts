import { JSDOM } from 'jsdom';
import type { LlmClient } from '../llm/client.js';
import { buildRewriteMessages, buildTranslateMessages } from '../llm/prompts.js';

/**
 * Text transformations the processing run needs. Each call resolves to the
 * new text or rejects; it never returns an empty string.
 */
export interface EnrichmentService {
  clean(html: string): Promise<string>;
  rewrite(text: string): Promise<string>;
  translate(text: string, targetLanguage: string): Promise<string>;
}

/**
 * Strip markup from an article body: scripts and styles removed, one line per
 * text node, blank lines dropped.
 */
export function cleanHtml(html: string): string {
  const dom = new JSDOM(`<!DOCTYPE html><body>${html}</body>`);
  try {
    const { document, NodeFilter } = dom.window;
    for (const element of Array.from(document.querySelectorAll('script, style, noscript'))) {
      element.remove();
    }

    const parts: string[] = [];
    const walker = document.createTreeWalker(document.body, NodeFilter.SHOW_TEXT);
    for (let node = walker.nextNode(); node; node = walker.nextNode()) {
      if (node.nodeValue) parts.push(node.nodeValue);
    }

    return parts
      .join('\n')
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
      .join('\n');
  } finally {
    dom.window.close();
  }
}

export class LlmEnrichmentService implements EnrichmentService {
  constructor(private readonly client: LlmClient) {}

  async clean(html: string): Promise<string> {
    return cleanHtml(html);
  }

  async rewrite(text: string): Promise<string> {
    const response = await this.client.chat(buildRewriteMessages(text));
    return response.content;
  }

  async translate(text: string, targetLanguage: string): Promise<string> {
    const response = await this.client.chat(buildTranslateMessages(text, targetLanguage));
    return response.content;
  }
}
