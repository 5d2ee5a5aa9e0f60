import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import type { FeedFetcher, NormalizedArticle, PageFetcher, ParseReport, SourceRow } from './types.js';
import { RssFeedFetcher } from './feedFetcher.js';
import { HttpPageFetcher } from './pageFetcher.js';
import { selectParser } from './selector.js';
import { findDueSources, getSource, updateSourceLastFetch, upsertArticle } from './sourceDb.js';
import { DbError, IngestError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { sleep } from '../shared/utils.js';

export interface IngestOptions {
  /** Fetch exactly this source, whether or not it is due or active. */
  sourceId?: string;
  /** Max articles stored per source. 0 or unset means no limit. */
  limit?: number;
  /** Drop articles older than this many days, and undated ones. 0 or unset means no age filter. */
  maxAgeDays?: number;
  /** Treat every active source as due. */
  allSources?: boolean;
  dryRun?: boolean;
  noDelay?: boolean;
  now?: () => Date;
}

export interface IngestDeps {
  feedFetcher?: FeedFetcher;
  pageFetcher?: PageFetcher;
}

export type SourceStatus = 'ok' | 'dry_run' | 'failed' | 'config_error' | 'unsupported';

export interface SourceReport {
  sourceId: string;
  sourceName: string;
  status: SourceStatus;
  found: number;
  filtered: number;
  inserted: number;
  merged: number;
  unchanged: number;
  skipped: number;
  failed: number;
  malformed: boolean;
  error: string | null;
}

export interface IngestStats {
  sourcesTotal: number;
  sourcesProcessed: number;
  sourcesFailed: number;
  sourcesSkipped: number;
  articlesFound: number;
  articlesInserted: number;
  articlesMerged: number;
  articlesUnchanged: number;
  entriesSkipped: number;
  entriesFailed: number;
  reports: SourceReport[];
  durationMs: number;
}

function newReport(source: SourceRow, status: SourceStatus): SourceReport {
  return {
    sourceId: source.id,
    sourceName: source.name,
    status,
    found: 0,
    filtered: 0,
    inserted: 0,
    merged: 0,
    unchanged: 0,
    skipped: 0,
    failed: 0,
    malformed: false,
    error: null,
  };
}

/**
 * Keep articles published within the last `maxAgeDays` days.
 */
export function filterByAge(articles: NormalizedArticle[], maxAgeDays: number, now: Date): NormalizedArticle[] {
  const cutoff = now.getTime() - maxAgeDays * 86400 * 1000;
  return articles.filter((article) => {
    if (!article.published_at) return false;
    const published = Date.parse(article.published_at);
    return !Number.isNaN(published) && published >= cutoff;
  });
}

function pickSources(db: Database.Database, options: IngestOptions, now: Date): SourceRow[] {
  if (options.sourceId) {
    const source = getSource(db, options.sourceId);
    if (!source) {
      throw new IngestError(`Source not found: ${options.sourceId}`, { source_id: options.sourceId });
    }
    return [source];
  }
  return findDueSources(db, now, options.allSources ?? false);
}

function storeArticles(db: Database.Database, articles: NormalizedArticle[], report: SourceReport): void {
  for (const article of articles) {
    const result = upsertArticle(db, article);
    if (result === 'inserted') report.inserted++;
    else if (result === 'merged') report.merged++;
    else report.unchanged++;
  }
}

async function ingestSource(
  db: Database.Database,
  source: SourceRow,
  config: Config,
  options: IngestOptions,
  fetchers: Required<IngestDeps>,
  now: () => Date,
): Promise<SourceReport> {
  const selection = selectParser(source, {
    ingest: config.ingest,
    feedFetcher: fetchers.feedFetcher,
    pageFetcher: fetchers.pageFetcher,
    now,
  });

  if (selection.status === 'unsupported') {
    const report = newReport(source, 'unsupported');
    report.error = selection.reason;
    return report;
  }
  if (selection.status === 'invalid') {
    const report = newReport(source, 'config_error');
    report.error = selection.error.message;
    return report;
  }

  const parseReport: ParseReport = await selection.parser.fetchArticles();
  const report = newReport(source, options.dryRun ? 'dry_run' : 'ok');
  report.skipped = parseReport.skipped.length;
  report.failed = parseReport.failed.length;
  report.malformed = parseReport.malformed;

  if (parseReport.fetchError !== null) {
    report.status = 'failed';
    report.error = parseReport.fetchError;
    return report;
  }

  report.found = parseReport.articles.length;
  let articles = parseReport.articles;
  if (options.maxAgeDays) {
    articles = filterByAge(articles, options.maxAgeDays, now());
  }
  if (options.limit && articles.length > options.limit) {
    logger.info({ source: source.name, limit: options.limit, found: articles.length }, 'Applying article limit');
    articles = articles.slice(0, options.limit);
  }
  report.filtered = report.found - articles.length;

  if (options.dryRun) {
    logger.info({ source: source.name, articles: articles.length }, 'Dry run: articles not stored');
    return report;
  }

  storeArticles(db, articles, report);
  updateSourceLastFetch(db, source.id, now());
  return report;
}

/**
 * Fetch every due source in turn and upsert what its parser finds.
 *
 * A source failing for any reason other than the store is reported and the
 * run moves on; a DbError aborts the run.
 */
export async function runIngest(
  db: Database.Database,
  config: Config,
  options: IngestOptions = {},
  deps: IngestDeps = {},
): Promise<IngestStats> {
  const startTime = Date.now();
  const now = options.now ?? (() => new Date());
  const httpOptions = { timeoutMs: config.ingest.fetch_timeout_ms, userAgent: config.ingest.user_agent };
  const fetchers: Required<IngestDeps> = {
    feedFetcher: deps.feedFetcher ?? new RssFeedFetcher(httpOptions),
    pageFetcher: deps.pageFetcher ?? new HttpPageFetcher(httpOptions),
  };

  const stats: IngestStats = {
    sourcesTotal: 0,
    sourcesProcessed: 0,
    sourcesFailed: 0,
    sourcesSkipped: 0,
    articlesFound: 0,
    articlesInserted: 0,
    articlesMerged: 0,
    articlesUnchanged: 0,
    entriesSkipped: 0,
    entriesFailed: 0,
    reports: [],
    durationMs: 0,
  };

  const sources = pickSources(db, options, now());
  stats.sourcesTotal = sources.length;

  if (sources.length === 0) {
    logger.info('No sources due for fetching');
    stats.durationMs = Date.now() - startTime;
    return stats;
  }

  if (options.dryRun) {
    logger.info('Dry run: nothing will be written');
  }

  for (const [index, source] of sources.entries()) {
    logger.info({ source: source.name, parser_type: source.parser_type }, 'Processing source');

    let report: SourceReport;
    try {
      report = await ingestSource(db, source, config, options, fetchers, now);
    } catch (err) {
      if (err instanceof DbError) throw err;
      report = newReport(source, 'failed');
      report.error = errorMessage(err);
      logger.error({ source: source.name, error: report.error }, 'Source processing failed');
    }

    stats.reports.push(report);
    stats.articlesFound += report.found;
    stats.articlesInserted += report.inserted;
    stats.articlesMerged += report.merged;
    stats.articlesUnchanged += report.unchanged;
    stats.entriesSkipped += report.skipped;
    stats.entriesFailed += report.failed;

    switch (report.status) {
      case 'ok':
      case 'dry_run':
        stats.sourcesProcessed++;
        logger.info(
          {
            source: source.name,
            found: report.found,
            inserted: report.inserted,
            merged: report.merged,
            skipped: report.skipped,
          },
          'Source done',
        );
        break;
      case 'failed':
      case 'config_error':
        stats.sourcesFailed++;
        break;
      case 'unsupported':
        stats.sourcesSkipped++;
        break;
    }

    const isLast = index === sources.length - 1;
    if (!options.noDelay && !isLast) {
      await sleep(config.ingest.source_delay_ms);
    }
  }

  stats.durationMs = Date.now() - startTime;
  logger.info(
    {
      sources: stats.sourcesTotal,
      processed: stats.sourcesProcessed,
      failed: stats.sourcesFailed,
      inserted: stats.articlesInserted,
      merged: stats.articlesMerged,
      durationMs: stats.durationMs,
    },
    'Ingest complete',
  );

  return stats;
}
