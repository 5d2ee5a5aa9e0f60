import { describe, it, expect } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { homedir } from 'node:os';
import {
  collapseWhitespace,
  formatDuration,
  generateId,
  getPackageRoot,
  nowISO,
  parseDuration,
  resolvePath,
  slugify,
} from '../utils.js';

describe('resolvePath', () => {
  it('expands ~ to home directory', () => {
    expect(resolvePath('~/test')).toBe(path.join(homedir(), 'test'));
  });

  it('resolves relative paths', () => {
    expect(path.isAbsolute(resolvePath('./foo/bar'))).toBe(true);
  });

  it('returns absolute paths as-is', () => {
    expect(resolvePath('/absolute/path')).toBe('/absolute/path');
  });
});

describe('generateId', () => {
  it('generates string of default length', () => {
    expect(generateId()).toHaveLength(21);
  });

  it('generates unique IDs', () => {
    expect(generateId()).not.toBe(generateId());
  });
});

describe('nowISO', () => {
  it('formats the given date as ISO 8601', () => {
    expect(nowISO(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toBe('2024-01-02T03:04:05.000Z');
  });
});

describe('collapseWhitespace', () => {
  it('collapses inner runs and trims', () => {
    expect(collapseWhitespace('  Big\n\n  news\there ')).toBe('Big news here');
  });

  it('returns null for blank input', () => {
    expect(collapseWhitespace(' \n ')).toBeNull();
    expect(collapseWhitespace(undefined)).toBeNull();
  });
});

describe('parseDuration', () => {
  it('parses single units', () => {
    expect(parseDuration('30m')).toBe(1800);
    expect(parseDuration('12h')).toBe(43200);
    expect(parseDuration('1d')).toBe(86400);
    expect(parseDuration('1w')).toBe(604800);
  });

  it('treats bare numbers as seconds', () => {
    expect(parseDuration('90')).toBe(90);
  });

  it('sums combined units, ignoring case and spaces', () => {
    expect(parseDuration('1D 12H')).toBe(129600);
  });

  it('rejects anything else', () => {
    expect(parseDuration('daily')).toBeNull();
    expect(parseDuration('1x')).toBeNull();
    expect(parseDuration('')).toBeNull();
  });
});

describe('formatDuration', () => {
  it('picks the largest whole unit', () => {
    expect(formatDuration(86400)).toBe('1d');
    expect(formatDuration(7200)).toBe('2h');
    expect(formatDuration(1800)).toBe('30m');
    expect(formatDuration(45)).toBe('45s');
  });
});

describe('slugify', () => {
  it('lowercases and dashes', () => {
    expect(slugify('Hello, World: Part 2!')).toBe('hello-world-part-2');
  });

  it('strips accents', () => {
    expect(slugify('Café déjà vu')).toBe('cafe-deja-vu');
  });

  it('falls back for empty titles', () => {
    expect(slugify('!!!')).toBe('untitled');
  });

  it('truncates without a trailing dash', () => {
    expect(slugify('abc def', 4)).toBe('abc');
  });
});

describe('getPackageRoot', () => {
  it('returns the directory holding package.json', () => {
    expect(fs.existsSync(path.join(getPackageRoot(), 'package.json'))).toBe(true);
  });
});
