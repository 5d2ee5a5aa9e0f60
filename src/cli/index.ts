#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { defaultFetchIntervalSec, loadConfig, writeDefaultConfig } from '../shared/config.js';
import type { Config } from '../shared/config.js';
import { formatDuration, getFeedloomDir, parseDuration, resolvePath } from '../shared/utils.js';
import { ConfigError, FeedloomError, errorMessage } from '../shared/errors.js';
import { closeDb, initDb, openDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import {
  addSource,
  findDueSources,
  getSourceItemCounts,
  listSources,
  setSourceActive,
} from '../source/sourceDb.js';
import { validateSourceInput } from '../source/sourceSpec.js';
import { isDue, nextDueAt } from '../source/schedule.js';
import { runIngest } from '../source/ingest.js';
import { refreshShortContent } from '../source/refresh.js';
import { HttpPageFetcher } from '../source/pageFetcher.js';
import { LlmClient } from '../llm/client.js';
import { LlmEnrichmentService } from '../pipeline/enrichment.js';
import { MarkdownPublisher } from '../pipeline/publisher.js';
import { runProcess } from '../pipeline/process.js';
import type { Stage } from '../pipeline/stage.js';
import { countFailedItems, countItemsByStage } from '../pipeline/itemDb.js';
import { parseCount, parseStage } from './args.js';

const program = new Command();

program
  .name('feedloom')
  .description('Collect articles from feeds and pages, then clean, translate and publish them')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create the config file and the database')
  .action(async () => {
    const configPath = path.join(getFeedloomDir(), 'config.yaml');

    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    const config = await loadConfig(true);
    const dbPath = resolvePath(config.db.path);
    const db = initDb(dbPath);
    try {
      const { applied } = runMigrations(db);
      if (applied.length > 0) {
        log(`✓ ${dbPath} ready (${applied.length} migrations applied)`);
      } else {
        log(`✓ ${dbPath} already up to date`);
      }
    } finally {
      closeDb();
    }
  });

// === source ===
const sourceCmd = program.command('source').description('Manage sources');

sourceCmd
  .command('add <name>')
  .description('Add a feed or page source')
  .requiredOption('-u, --url <url>', 'Site or listing page url')
  .option('-f, --feed-url <url>', 'Feed url (feed sources)')
  .option('-t, --type <type>', 'Parser type: rss, atom, feed, html or page', 'rss')
  .option('-s, --selectors <json>', 'CSS selectors as JSON (page sources)')
  .option('-i, --interval <duration>', 'Fetch interval, e.g. 12h, 1d')
  .option('--inactive', 'Add the source disabled')
  .action(
    async (
      name: string,
      opts: { url: string; feedUrl?: string; type: string; selectors?: string; interval?: string; inactive?: boolean },
    ) => {
      const errors = validateSourceInput({
        name,
        url: opts.url,
        feedUrl: opts.feedUrl,
        parserType: opts.type,
        selectors: opts.selectors,
        interval: opts.interval,
      });
      if (errors.length > 0) {
        for (const error of errors) log(`✗ ${error}`);
        process.exitCode = 1;
        return;
      }

      await withDb(async (db, config) => {
        const id = addSource(db, {
          name,
          url: opts.url,
          feedUrl: opts.feedUrl,
          parserType: opts.type,
          selectors: opts.selectors,
          isActive: !opts.inactive,
          fetchIntervalSec: opts.interval ? parseDuration(opts.interval) ?? undefined : defaultFetchIntervalSec(config),
        });
        if (id === null) {
          log(`Source already exists: ${name}`);
          process.exitCode = 1;
        } else {
          log(`✓ Source added: ${name} (${id})`);
        }
      });
    },
  );

sourceCmd
  .command('list')
  .description('List all configured sources')
  .action(async () => {
    await withDb(async (db) => {
      const sources = listSources(db);
      if (sources.length === 0) {
        log('No sources configured. Use: feedloom source add <name> --url <url> --feed-url <feed>');
        return;
      }

      const countMap = new Map(getSourceItemCounts(db).map((c) => [c.source, c.count]));
      const now = new Date();
      for (const s of sources) {
        const status = s.is_active ? '●' : '○';
        const due = isDue(s, now) ? 'due' : `next ${nextDueAt(s)?.toISOString() ?? 'now'}`;
        log(
          `${status} ${s.id}  ${s.name.padEnd(24)} ${s.parser_type.padEnd(5)} every ${formatDuration(
            s.fetch_interval_sec,
          ).padEnd(4)} ${String(countMap.get(s.name) ?? 0).padStart(5)} items  last: ${
            s.last_fetch_at ?? 'never'
          }  ${due}`,
        );
      }
      log(`\n${sources.length} sources total`);
    });
  });

for (const [command, active] of [
  ['enable', true],
  ['disable', false],
] as const) {
  sourceCmd
    .command(`${command} <id>`)
    .description(`${active ? 'Enable' : 'Disable'} a source`)
    .action(async (id: string) => {
      await withDb(async (db) => {
        if (setSourceActive(db, id, active)) {
          log(`✓ Source ${id} ${command}d`);
        } else {
          log(`Source not found: ${id}`);
          process.exitCode = 1;
        }
      });
    });
}

// === fetch ===
program
  .command('fetch')
  .description('Fetch articles from every source that is due')
  .option('--source-id <id>', 'Fetch only this source, due or not')
  .option('-l, --limit <n>', 'Max articles stored per source', parseCount)
  .option('--max-age-days <n>', 'Skip articles older than this many days (0: no limit)', parseCount)
  .option('-a, --all-sources', 'Fetch every active source, due or not')
  .option('--no-delay', 'Do not pause between sources')
  .option('--dry-run', 'Fetch and parse, but store nothing')
  .action(
    async (opts: {
      sourceId?: string;
      limit?: number;
      maxAgeDays?: number;
      allSources?: boolean;
      delay: boolean;
      dryRun?: boolean;
    }) => {
      await withDb(async (db, config) => {
        const stats = await runIngest(db, config, {
          sourceId: opts.sourceId,
          limit: opts.limit,
          maxAgeDays: opts.maxAgeDays,
          allSources: opts.allSources,
          noDelay: !opts.delay,
          dryRun: opts.dryRun,
        });

        log('\nFetch complete:');
        log(`  Sources:           ${stats.sourcesTotal}`);
        log(`  Sources processed: ${stats.sourcesProcessed}`);
        log(`  Sources failed:    ${stats.sourcesFailed}`);
        log(`  Sources skipped:   ${stats.sourcesSkipped}`);
        log(`  Articles found:    ${stats.articlesFound}`);
        log(`  Articles new:      ${stats.articlesInserted}`);
        log(`  Articles merged:   ${stats.articlesMerged}`);
        log(`  Entries skipped:   ${stats.entriesSkipped}`);
        log(`  Duration:          ${stats.durationMs}ms`);

        const problems = stats.reports.filter((r) => r.error !== null);
        if (problems.length > 0) {
          log('\nProblems:');
          for (const r of problems) {
            log(`  ${r.sourceName} [${r.status}]: ${r.error}`);
          }
        }
      });
    },
  );

// === refresh ===
program
  .command('refresh')
  .description('Download the full text of stored articles whose body is short')
  .option('-l, --limit <n>', 'Max items to check', parseCount, 10)
  .option('--min-length <n>', 'Refresh bodies shorter than this many characters', parseCount)
  .option('--source-id <id>', 'Only items of this source')
  .option('--dry-run', 'Download and extract, but store nothing')
  .action(async (opts: { limit: number; minLength?: number; sourceId?: string; dryRun?: boolean }) => {
    await withDb(async (db, config) => {
      const stats = await refreshShortContent(
        db,
        {
          minLength: opts.minLength ?? config.ingest.min_content_length,
          limit: opts.limit,
          sourceId: opts.sourceId,
          dryRun: opts.dryRun,
          delayMs: config.ingest.full_content_delay_ms,
        },
        new HttpPageFetcher({ timeoutMs: config.ingest.fetch_timeout_ms, userAgent: config.ingest.user_agent }),
      );

      log('\nRefresh complete:');
      log(`  Checked: ${stats.checked}`);
      log(`  Updated: ${stats.updated}`);
      log(`  Failed:  ${stats.failed}`);
      if (stats.updated > 0) {
        log(`  Average length: ${Math.round(stats.charsBefore / stats.updated)} -> ${Math.round(stats.charsAfter / stats.updated)}`);
      }
    });
  });

// === process ===
program
  .command('process')
  .description('Clean, translate and publish stored articles')
  .option('--stage <stage>', 'Run only this stage (repeatable)', parseStage)
  .option('-l, --limit <n>', 'Max items to process', parseCount)
  .option('--language <code>', 'Target language code')
  .option('--no-rewrite', 'Skip the rewrite step of cleaning')
  .option('--dry-run', 'Run the stages, but store and publish nothing')
  .action(
    async (opts: { stage?: Stage[]; limit?: number; language?: string; rewrite: boolean; dryRun?: boolean }) => {
      await withDb(async (db, config) => {
        const stages = opts.stage;
        const rewrite = opts.rewrite && config.enrich.rewrite;
        const needsLlm = !stages || stages.includes('translate') || (rewrite && stages.includes('clean'));

        const client = new LlmClient(config.llm);
        if (needsLlm && !client.isConfigured()) {
          throw new ConfigError('LLM api_key is not configured. Set llm.api_key or FEEDLOOM_LLM_API_KEY.');
        }

        const language = opts.language ?? config.enrich.target_language;
        const stats = await runProcess(
          db,
          {
            enrichment: new LlmEnrichmentService(client),
            publisher: new MarkdownPublisher(resolvePath(config.publish.out_dir), language),
          },
          {
            targetLanguage: language,
            stages,
            limit: opts.limit ?? config.enrich.batch_limit,
            rewrite,
            itemDelayMs: config.enrich.item_delay_ms,
            dryRun: opts.dryRun,
          },
        );

        log('\nProcessing complete:');
        log(`  Items:      ${stats.items}`);
        log(`  Cleaned:    ${stats.completed.clean}`);
        log(`  Translated: ${stats.completed.translate}`);
        log(`  Published:  ${stats.completed.publish}`);
        if (stats.errors.length > 0) {
          log('\nErrors:');
          for (const e of stats.errors) {
            log(`  ${e.id} [${e.stage}]: ${e.error}`);
          }
        }
      });
    },
  );

// === status ===
program
  .command('status')
  .description('Show pipeline progress and sources due now')
  .action(async () => {
    await withDb(async (db) => {
      const counts = countItemsByStage(db);
      const due = findDueSources(db, new Date());

      log('Items by next stage:');
      log(`  clean:     ${counts.clean}`);
      log(`  translate: ${counts.translate}`);
      log(`  publish:   ${counts.publish}`);
      log(`  done:      ${counts.none}`);
      log(`  with errors: ${countFailedItems(db)}`);

      log(`\nSources due now: ${due.length}`);
      for (const s of due) {
        log(`  ${s.name} (last: ${s.last_fetch_at ?? 'never'})`);
      }
    });
  });

// === Helper to get DB connection ===
async function withDb(fn: (db: ReturnType<typeof openDb>, config: Config) => Promise<void>): Promise<void> {
  const config = await loadConfig();
  const dbPath = resolvePath(config.db.path);

  if (!fs.existsSync(dbPath)) {
    throw new ConfigError('Database not found. Run feedloom init first.', { path: dbPath });
  }

  const db = openDb(dbPath);
  try {
    await fn(db, config);
  } finally {
    closeDb();
  }
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  const code = err instanceof FeedloomError ? ` [${err.code}]` : '';
  log(`✗ Error${code}: ${errorMessage(err)}`);
  process.exitCode = 1;
});
