import { fileURLToPath } from 'node:url';
import fs from 'node:fs';
import path from 'node:path';
import { homedir } from 'node:os';
import { nanoid } from 'nanoid';

export function generateId(size = 21): string {
  return nanoid(size);
}

export function resolvePath(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return path.join(homedir(), p.slice(1));
  }
  return path.resolve(p);
}

export function nowISO(date: Date = new Date()): string {
  return date.toISOString();
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Collapse runs of whitespace to single spaces. Empty results become null.
 */
export function collapseWhitespace(text: string | null | undefined): string | null {
  if (!text) return null;
  const collapsed = text.replace(/\s+/g, ' ').trim();
  return collapsed.length > 0 ? collapsed : null;
}

const DURATION_UNITS: Record<string, number> = {
  s: 1,
  m: 60,
  h: 3600,
  d: 86400,
  w: 604800,
};

/**
 * Parse "90", "30m", "12h", "1d", "1w" (or a combination like "1d12h") into seconds.
 * Returns null for anything else.
 */
export function parseDuration(input: string): number | null {
  const value = input.replace(/\s+/g, '').toLowerCase();
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  if (!/^(\d+[smhdw])+$/.test(value)) return null;

  let total = 0;
  for (const match of value.matchAll(/(\d+)([smhdw])/g)) {
    total += parseInt(match[1] ?? '0', 10) * (DURATION_UNITS[match[2] ?? ''] ?? 0);
  }
  return total;
}

export function formatDuration(seconds: number): string {
  if (seconds > 0 && seconds % 86400 === 0) return `${seconds / 86400}d`;
  if (seconds > 0 && seconds % 3600 === 0) return `${seconds / 3600}h`;
  if (seconds > 0 && seconds % 60 === 0) return `${seconds / 60}m`;
  return `${seconds}s`;
}

export function slugify(text: string, maxLength = 60): string {
  const slug = text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, '-')
    .replace(/^-+|-+$/g, '');
  return slug.slice(0, maxLength).replace(/-+$/, '') || 'untitled';
}

export function getPackageRoot(): string {
  // Walk up from the current file to the directory holding package.json.
  // Works both from src/shared/utils.ts (tsx, vitest) and dist/shared/utils.js.
  let dir = path.dirname(fileURLToPath(import.meta.url));
  while (true) {
    if (fs.existsSync(path.join(dir, 'package.json'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');
}

export function getFeedloomDir(): string {
  return resolvePath('~/.feedloom');
}
