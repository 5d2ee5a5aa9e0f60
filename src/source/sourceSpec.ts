import { z } from 'zod';
import type { ParserKind, SourceRow } from './types.js';
import { ConfigError } from '../shared/errors.js';
import { parseDuration } from '../shared/utils.js';

export const PageSelectorsSchema = z.object({
  list_item: z.string().min(1),
  url: z.string().min(1),
  title: z.string().min(1),
  description: z.string().min(1).optional(),
  date: z.string().min(1).optional(),
  author: z.string().min(1).optional(),
  content: z.string().min(1).optional(),
  meta_description: z.string().min(1).optional(),
});

export type PageSelectors = z.infer<typeof PageSelectorsSchema>;

const PARSER_KIND_ALIASES: Record<string, ParserKind> = {
  rss: 'feed',
  atom: 'feed',
  feed: 'feed',
  html: 'page',
  page: 'page',
};

/**
 * Read a declared parser type, ignoring case and surrounding whitespace.
 */
export function parseParserKind(raw: string | null | undefined): ParserKind | null {
  const key = (raw ?? '').trim().toLowerCase();
  return PARSER_KIND_ALIASES[key] ?? null;
}

/**
 * A source resolved to the parser variant it declares. Unknown declarations
 * are their own variant so callers must handle them explicitly.
 */
export type SourceSpec =
  | { kind: 'feed'; source: SourceRow; feedUrl: string | null }
  | { kind: 'page'; source: SourceRow; selectors: string | null }
  | { kind: 'unknown'; source: SourceRow; parserType: string };

export function resolveSourceSpec(source: SourceRow): SourceSpec {
  const kind = parseParserKind(source.parser_type);
  switch (kind) {
    case 'feed':
      return { kind: 'feed', source, feedUrl: source.feed_url };
    case 'page':
      return { kind: 'page', source, selectors: source.selectors };
    case null:
      return { kind: 'unknown', source, parserType: source.parser_type };
  }
}

/**
 * Decode and validate the JSON selector map of a page-based source.
 */
export function parseSelectors(raw: string | null, sourceName: string): PageSelectors {
  if (!raw || !raw.trim()) {
    throw new ConfigError(`Missing selectors for page source ${sourceName}`, { source: sourceName });
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch {
    throw new ConfigError(`Selectors for ${sourceName} are not valid JSON`, { source: sourceName });
  }

  const parsed = PageSelectorsSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new ConfigError(`Invalid selectors for ${sourceName}`, {
      source: sourceName,
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

export interface SourceInput {
  name?: string;
  url?: string;
  feedUrl?: string;
  parserType?: string;
  selectors?: string;
  interval?: string;
}

/**
 * Check a source definition before it is stored. Returns every problem found.
 */
export function validateSourceInput(input: SourceInput): string[] {
  const errors: string[] = [];

  if (!input.name?.trim()) errors.push('Missing required field: name');
  if (!input.url?.trim()) errors.push('Missing required field: url');
  if (!input.parserType?.trim()) errors.push('Missing required field: parser type');

  if (input.url?.trim() && !URL.canParse(input.url.trim())) {
    errors.push(`Invalid url: ${input.url}`);
  }

  if (input.parserType?.trim()) {
    const kind = parseParserKind(input.parserType);
    if (kind === null) {
      errors.push(`Unknown parser type: ${input.parserType}. Expected one of: ${Object.keys(PARSER_KIND_ALIASES).join(', ')}`);
    } else if (kind === 'feed' && !input.feedUrl?.trim()) {
      errors.push('A feed source needs a feed url');
    } else if (kind === 'page') {
      try {
        parseSelectors(input.selectors ?? null, input.name ?? 'source');
      } catch (err) {
        errors.push(err instanceof ConfigError ? err.message : String(err));
      }
    }
  }

  if (input.interval !== undefined && parseDuration(input.interval) === null) {
    errors.push(`Invalid fetch interval: ${input.interval}`);
  }

  return errors;
}
