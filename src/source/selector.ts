import type { Config } from '../shared/config.js';
import type { FeedFetcher, PageFetcher, Parser, SourceRow } from './types.js';
import { FeedParser } from './feedParser.js';
import { PageParser } from './pageParser.js';
import { parseSelectors, resolveSourceSpec } from './sourceSpec.js';
import { ConfigError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface ParserContext {
  ingest: Config['ingest'];
  feedFetcher: FeedFetcher;
  pageFetcher: PageFetcher;
  now?: () => Date;
}

export type ParserSelection =
  | { status: 'ready'; parser: Parser }
  | { status: 'unsupported'; reason: string }
  | { status: 'invalid'; error: ConfigError };

function assertNever(value: never): never {
  throw new ConfigError(`Unhandled source spec: ${JSON.stringify(value)}`);
}

function build(source: SourceRow, ctx: ParserContext): ParserSelection {
  const spec = resolveSourceSpec(source);

  switch (spec.kind) {
    case 'feed':
      return {
        status: 'ready',
        parser: new FeedParser({
          sourceId: source.id,
          sourceName: source.name,
          feedUrl: spec.feedUrl,
          feedFetcher: ctx.feedFetcher,
          pageFetcher: ctx.pageFetcher,
          fetchFullContent: ctx.ingest.fetch_full_content,
          fullContentDelayMs: ctx.ingest.full_content_delay_ms,
          minContentLength: ctx.ingest.min_content_length,
          now: ctx.now,
        }),
      };

    case 'page': {
      if (!ctx.ingest.page_parser_enabled) {
        const reason = `Page parser is not enabled for ${source.name}`;
        logger.warn({ source: source.name }, 'Page-based parsing not implemented, skipping source');
        return { status: 'unsupported', reason };
      }
      return {
        status: 'ready',
        parser: new PageParser({
          sourceId: source.id,
          sourceName: source.name,
          pageUrl: source.url,
          selectors: parseSelectors(spec.selectors, source.name),
          pageFetcher: ctx.pageFetcher,
          contentDelayMs: ctx.ingest.full_content_delay_ms,
          now: ctx.now,
        }),
      };
    }

    case 'unknown': {
      const error = new ConfigError(`Unknown parser type: "${spec.parserType}"`, {
        source: source.name,
        parser_type: spec.parserType,
      });
      logger.error({ source: source.name, parser_type: spec.parserType }, error.message);
      return { status: 'invalid', error };
    }

    default:
      return assertNever(spec);
  }
}

/**
 * Pick the parser a source declares. Never throws: a source that cannot be
 * parsed comes back as `unsupported` or `invalid` so the run can move on.
 */
export function selectParser(source: SourceRow, ctx: ParserContext): ParserSelection {
  try {
    return build(source, ctx);
  } catch (err) {
    const error =
      err instanceof ConfigError
        ? err
        : new ConfigError(`Failed to create parser: ${errorMessage(err)}`, { source: source.name });
    logger.error({ source: source.name, error: error.message }, 'Failed to create parser');
    return { status: 'invalid', error };
  }
}
