import { describe, it, expect } from 'vitest';
import { isDue, nextDueAt } from '../schedule.js';
import type { ScheduleFields } from '../schedule.js';

const DAY = 86400;

function source(overrides: Partial<ScheduleFields> = {}): ScheduleFields {
  return { is_active: 1, last_fetch_at: null, fetch_interval_sec: DAY, ...overrides };
}

describe('isDue', () => {
  const now = new Date('2024-06-02T12:00:00.000Z');

  it('is due when never fetched', () => {
    expect(isDue(source(), now)).toBe(true);
  });

  it('is not due 23 hours after the last fetch with a daily interval', () => {
    expect(isDue(source({ last_fetch_at: '2024-06-01T13:00:00.000Z' }), now)).toBe(false);
  });

  it('is due exactly one interval after the last fetch', () => {
    expect(isDue(source({ last_fetch_at: '2024-06-01T12:00:00.000Z' }), now)).toBe(true);
  });

  it('is due when forced, regardless of the interval', () => {
    expect(isDue(source({ last_fetch_at: '2024-06-02T11:59:00.000Z' }), now, { overrideAll: true })).toBe(true);
  });

  it('is never due while inactive', () => {
    expect(isDue(source({ is_active: 0 }), now)).toBe(false);
    expect(isDue(source({ is_active: 0 }), now, { overrideAll: true })).toBe(false);
  });

  it('treats an unparseable timestamp as never fetched', () => {
    expect(isDue(source({ last_fetch_at: 'yesterday' }), now)).toBe(true);
  });

  it('honours per-source intervals', () => {
    const hourly = source({ last_fetch_at: '2024-06-02T10:30:00.000Z', fetch_interval_sec: 3600 });
    expect(isDue(hourly, now)).toBe(true);
  });
});

describe('nextDueAt', () => {
  it('adds the interval to the last fetch', () => {
    expect(nextDueAt(source({ last_fetch_at: '2024-06-01T12:00:00.000Z' }))?.toISOString()).toBe(
      '2024-06-02T12:00:00.000Z',
    );
  });

  it('is null before the first fetch', () => {
    expect(nextDueAt(source())).toBeNull();
  });
});
