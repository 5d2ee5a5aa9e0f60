import fs from 'node:fs/promises';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import type { ItemRow } from '../source/types.js';
import { slugify } from '../shared/utils.js';

export interface Publisher {
  /** Publish a translated item and return where it went. */
  publish(item: ItemRow): Promise<string>;
}

export function publishedFileName(item: Pick<ItemRow, 'id' | 'title' | 'published_at' | 'created_at'>): string {
  const date = (item.published_at ?? item.created_at).slice(0, 10);
  return `${date}-${slugify(item.title)}-${item.id.slice(0, 6)}.md`;
}

export function renderMarkdown(item: ItemRow, language: string): string {
  const frontMatter: Record<string, string> = {
    title: item.translated_title ?? item.title,
    original_title: item.title,
    source: item.source,
    url: item.url,
    language,
  };
  if (item.author) frontMatter['author'] = item.author;
  if (item.published_at) frontMatter['published_at'] = item.published_at;
  const description = item.translated_description ?? item.description;
  if (description) frontMatter['description'] = description;

  const body = item.translated_content ?? item.rewritten_content ?? item.clean_content ?? '';
  return `---\n${yamlStringify(frontMatter)}---\n\n${body.trim()}\n`;
}

/**
 * Writes each item as a markdown file with a YAML header under `outDir`.
 */
export class MarkdownPublisher implements Publisher {
  constructor(
    private readonly outDir: string,
    private readonly language: string,
  ) {}

  async publish(item: ItemRow): Promise<string> {
    await fs.mkdir(this.outDir, { recursive: true });
    const filePath = path.join(this.outDir, publishedFileName(item));
    await fs.writeFile(filePath, renderMarkdown(item, this.language), 'utf-8');
    return filePath;
  }
}
