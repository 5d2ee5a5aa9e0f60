import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getFeedloomDir, parseDuration } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

const durationString = z
  .string()
  .refine((value) => parseDuration(value) !== null, { message: 'Expected a duration like 30m, 12h or 1d' });

export const ConfigSchema = z.object({
  llm: z
    .object({
      base_url: z.string().default(''),
      api_key: z.string().default(''),
      model: z.string().default('gpt-4.1-mini'),
      max_tokens: z.number().default(4000),
      temperature: z.number().default(0.3),
      timeout_ms: z.number().default(60000),
    })
    .default({}),

  ingest: z
    .object({
      fetch_timeout_ms: z.number().default(15000),
      user_agent: z.string().default('Feedloom/0.1'),
      fetch_full_content: z.boolean().default(true),
      full_content_delay_ms: z.number().min(0).default(500),
      min_content_length: z.number().int().min(0).default(500),
      source_delay_ms: z.number().min(0).default(1000),
      page_parser_enabled: z.boolean().default(false),
      default_fetch_interval: durationString.default('1d'),
    })
    .default({}),

  enrich: z
    .object({
      rewrite: z.boolean().default(true),
      target_language: z.string().default('ru'),
      item_delay_ms: z.number().min(0).default(2000),
      batch_limit: z.number().int().positive().default(5),
    })
    .default({}),

  publish: z
    .object({
      out_dir: z.string().default('~/.feedloom/published'),
    })
    .default({}),

  db: z
    .object({
      path: z.string().default('~/.feedloom/feedloom.db'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function sectionOf(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const section = raw[key];
  return isRecord(section) ? { ...section } : {};
}

/**
 * Apply FEEDLOOM_* environment overrides on top of the file config.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const result = { ...rawConfig };

  const envApiKey = env['FEEDLOOM_LLM_API_KEY'];
  const envBaseUrl = env['FEEDLOOM_LLM_BASE_URL'];
  const envModel = env['FEEDLOOM_LLM_MODEL'];
  if (envApiKey || envBaseUrl || envModel) {
    const llm = sectionOf(result, 'llm');
    if (envApiKey) llm['api_key'] = envApiKey;
    if (envBaseUrl) llm['base_url'] = envBaseUrl;
    if (envModel) llm['model'] = envModel;
    result['llm'] = llm;
  }

  const envDbPath = env['FEEDLOOM_DB_PATH'];
  if (envDbPath) {
    const db = sectionOf(result, 'db');
    db['path'] = envDbPath;
    result['db'] = db;
  }

  return result;
}

export function parseConfig(rawConfig: unknown): Config {
  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('feedloom', {
    searchPlaces: ['feedloom.config.yaml', 'feedloom.config.yml', '.feedloomrc.yaml', '.feedloomrc.yml'],
  });

  const envConfigPath = process.env['FEEDLOOM_CONFIG'];
  const defaultConfigPath = path.join(getFeedloomDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const loaded: unknown = (await explorer.load(resolved))?.config;
    rawConfig = isRecord(loaded) ? loaded : {};
  } else if (fs.existsSync(defaultConfigPath)) {
    const loaded: unknown = (await explorer.load(defaultConfigPath))?.config;
    rawConfig = isRecord(loaded) ? loaded : {};
  } else {
    logger.debug('No config file found, using defaults');
  }

  cachedConfig = parseConfig(applyEnvOverrides(rawConfig));
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

/**
 * Default fetch interval for new sources, in seconds.
 */
export function defaultFetchIntervalSec(config: Config): number {
  return parseDuration(config.ingest.default_fetch_interval) ?? 86400;
}
