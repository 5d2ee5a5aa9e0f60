import type { SourceRow } from './types.js';

export type ScheduleFields = Pick<SourceRow, 'is_active' | 'last_fetch_at' | 'fetch_interval_sec'>;

export interface DueOptions {
  /** Treat every active source as due (forced full refresh). */
  overrideAll?: boolean;
}

function lastFetchMs(source: ScheduleFields): number | null {
  if (!source.last_fetch_at) return null;
  const ms = Date.parse(source.last_fetch_at);
  return Number.isNaN(ms) ? null : ms;
}

/**
 * Whether a source should be fetched now. Pure: no clock reads, no writes.
 */
export function isDue(source: ScheduleFields, now: Date, options: DueOptions = {}): boolean {
  if (!source.is_active) return false;
  if (options.overrideAll) return true;

  const last = lastFetchMs(source);
  if (last === null) return true;

  return now.getTime() - last >= source.fetch_interval_sec * 1000;
}

/**
 * When the source next becomes due. Null when it has never been fetched.
 */
export function nextDueAt(source: ScheduleFields): Date | null {
  const last = lastFetchMs(source);
  if (last === null) return null;
  return new Date(last + source.fetch_interval_sec * 1000);
}
