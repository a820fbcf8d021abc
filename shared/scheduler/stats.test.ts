import { describe, it, expect } from 'vitest';
import { computeStats, calendarDay, isValidTimeZone, type ReviewRecord } from './index';

const now = new Date('2024-01-15T23:30:00.000Z');

const createRecord = (overrides: Partial<ReviewRecord>): ReviewRecord => ({
  item_id: 'card-1',
  owner_id: 'user-1',
  due_at: '2024-01-20T00:00:00.000Z',
  ease_factor: 2.5,
  interval_days: 1,
  repetitions: 1,
  last_grade: 2,
  last_reviewed_at: null,
  ...overrides,
});

describe('computeStats', () => {
  it('returns zeros for an empty collection', () => {
    expect(computeStats([], now)).toEqual({
      total: 0,
      due: 0,
      reviewedToday: 0,
      learning: 0,
      mature: 0,
    });
  });

  it('counts due, reviewed today and maturity bands', () => {
    const records = [
      createRecord({
        item_id: 'due-learning',
        due_at: '2024-01-15T12:00:00.000Z',
        interval_days: 1,
        last_reviewed_at: '2024-01-15T01:00:00.000Z',
      }),
      createRecord({
        item_id: 'reviewing',
        interval_days: 10,
        last_reviewed_at: '2024-01-14T22:00:00.000Z',
      }),
      createRecord({ item_id: 'mature', interval_days: 30 }),
      createRecord({
        item_id: 'relearning',
        due_at: '2024-01-15T23:10:00.000Z',
        interval_days: 0,
        last_grade: 0,
        last_reviewed_at: '2024-01-15T23:00:00.000Z',
      }),
    ];

    expect(computeStats(records, now)).toEqual({
      total: 4,
      due: 2,
      reviewedToday: 2,
      learning: 2,
      mature: 1,
    });
  });

  it('compares calendar days in the configured time zone', () => {
    const records = [
      createRecord({ item_id: 'early', last_reviewed_at: '2024-01-15T01:00:00.000Z' }),
      createRecord({ item_id: 'late', last_reviewed_at: '2024-01-15T23:00:00.000Z' }),
    ];

    expect(computeStats(records, now, 'UTC').reviewedToday).toBe(2);
    // New York: now is Jan 15 18:30, "early" was Jan 14 20:00
    expect(computeStats(records, now, 'America/New_York').reviewedToday).toBe(1);
    // Tokyo: now is Jan 16 08:30, "early" was Jan 15 10:00
    expect(computeStats(records, now, 'Asia/Tokyo').reviewedToday).toBe(1);
  });

  it('does not count unreadable review timestamps as today', () => {
    const records = [createRecord({ last_reviewed_at: 'yesterday-ish' })];
    expect(computeStats(records, now).reviewedToday).toBe(0);
  });
});

describe('calendarDay', () => {
  it('formats the day in the given zone', () => {
    expect(calendarDay(now)).toBe('2024-01-15');
    expect(calendarDay(now, 'Asia/Tokyo')).toBe('2024-01-16');
  });
});

describe('isValidTimeZone', () => {
  it('accepts IANA zones and rejects unknown names', () => {
    expect(isValidTimeZone('Europe/Berlin')).toBe(true);
    expect(isValidTimeZone('Mars/Olympus_Mons')).toBe(false);
  });
});
