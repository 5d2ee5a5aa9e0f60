import { InvalidArgumentError } from 'commander';
import { isStage } from '../pipeline/stage.js';
import type { Stage } from '../pipeline/stage.js';

export function parseCount(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parseInt(trimmed, 10);
}

/**
 * Collects repeated --stage options.
 */
export function parseStage(value: string, previous: Stage[] = []): Stage[] {
  const stage = value.trim().toLowerCase();
  if (!isStage(stage)) {
    throw new InvalidArgumentError('Expected one of: clean, translate, publish.');
  }
  return [...previous, stage];
}
