/**
 * Tests for the SM-2 scheduling engine
 *
 * The engine is pure: the same input, grade and time always give the same record.
 */

import { describe, it, expect } from 'vitest';
import {
  computeNext,
  nextEaseFactor,
  schedulingInputFor,
  classifyMaturity,
  isDue,
  GRADES,
  MAXIMUM_INTERVAL_DAYS,
  type Grade,
  type ReviewRecord,
  type SchedulingInput,
} from './index';

const baseTime = new Date('2024-01-15T10:00:00.000Z');

const addMinutes = (date: Date, minutes: number): Date => {
  return new Date(date.getTime() + minutes * 60 * 1000);
};

const addDays = (date: Date, days: number): Date => {
  return new Date(date.getTime() + days * 24 * 60 * 60 * 1000);
};

const newItem: SchedulingInput = { kind: 'new', item_id: 'card-1', owner_id: 'user-1' };

const scheduled = (record: ReviewRecord): SchedulingInput => ({ kind: 'scheduled', record });

const createRecord = (overrides: Partial<ReviewRecord> = {}): ReviewRecord => ({
  item_id: 'card-1',
  owner_id: 'user-1',
  due_at: baseTime.toISOString(),
  ease_factor: 2.5,
  interval_days: 1,
  repetitions: 1,
  last_grade: 2,
  last_reviewed_at: addDays(baseTime, -1).toISOString(),
  ...overrides,
});

describe('computeNext - new items', () => {
  it('Good schedules the first review one day out', () => {
    const record = computeNext(newItem, 2, baseTime);

    expect(record).toEqual({
      item_id: 'card-1',
      owner_id: 'user-1',
      due_at: addDays(baseTime, 1).toISOString(),
      ease_factor: 2.5,
      interval_days: 1,
      repetitions: 1,
      last_grade: 2,
      last_reviewed_at: baseTime.toISOString(),
    });
  });

  it('Again brings the item back in 10 minutes with a zero interval', () => {
    const record = computeNext(newItem, 0, baseTime);

    expect(record.interval_days).toBe(0);
    expect(record.repetitions).toBe(1);
    expect(record.ease_factor).toBe(2.5);
    expect(record.due_at).toBe(addMinutes(baseTime, 10).toISOString());
  });

  it('Hard schedules one day out', () => {
    const record = computeNext(newItem, 1, baseTime);

    expect(record.interval_days).toBe(1);
    expect(record.due_at).toBe(addDays(baseTime, 1).toISOString());
  });

  it('Easy schedules three days out', () => {
    const record = computeNext(newItem, 3, baseTime);

    expect(record.interval_days).toBe(3);
    expect(record.due_at).toBe(addDays(baseTime, 3).toISOString());
  });
});

describe('computeNext - scheduled items', () => {
  it('follows Good, Good, Again', () => {
    const first = computeNext(newItem, 2, baseTime);

    const secondAt = addDays(baseTime, 1);
    const second = computeNext(scheduled(first), 2, secondAt);
    expect(second.repetitions).toBe(2);
    expect(second.ease_factor).toBe(2.5);
    expect(second.interval_days).toBe(3);
    expect(second.due_at).toBe(addDays(secondAt, 3).toISOString());

    const thirdAt = addDays(secondAt, 3);
    const third = computeNext(scheduled(second), 0, thirdAt);
    expect(third.repetitions).toBe(3);
    expect(third.interval_days).toBe(0);
    expect(third.due_at).toBe(addMinutes(thirdAt, 10).toISOString());
    expect(third.ease_factor).toBe(2.18);
    expect(third.last_grade).toBe(0);
    expect(third.last_reviewed_at).toBe(thirdAt.toISOString());
  });

  it('recovers to a one day interval after a failure', () => {
    const failed = createRecord({ interval_days: 0, ease_factor: 2.18, last_grade: 0 });
    const record = computeNext(scheduled(failed), 2, baseTime);

    expect(record.interval_days).toBe(1);
    expect(record.ease_factor).toBe(2.18);
    expect(record.due_at).toBe(addDays(baseTime, 1).toISOString());
  });

  it('Easy grows the interval from the raised ease', () => {
    const record = computeNext(scheduled(createRecord({ interval_days: 10 })), 3, baseTime);

    expect(record.ease_factor).toBe(2.6);
    expect(record.interval_days).toBe(26);
  });

  it('Hard grows the interval from the lowered ease', () => {
    const record = computeNext(scheduled(createRecord({ interval_days: 10 })), 1, baseTime);

    expect(record.ease_factor).toBe(2.36);
    expect(record.interval_days).toBe(24);
  });

  it('caps the interval at the maximum', () => {
    const record = computeNext(scheduled(createRecord({ interval_days: 30000 })), 3, baseTime);

    expect(record.interval_days).toBe(MAXIMUM_INTERVAL_DAYS);
    expect(record.due_at).toBe(addDays(baseTime, MAXIMUM_INTERVAL_DAYS).toISOString());
  });

  it('Again ignores a long previous interval', () => {
    const record = computeNext(scheduled(createRecord({ interval_days: 180 })), 0, baseTime);

    expect(record.interval_days).toBe(0);
    expect(record.due_at).toBe(addMinutes(baseTime, 10).toISOString());
  });

  it('keeps the ease factor at the 1.3 floor', () => {
    const floored = createRecord({ ease_factor: 1.3, interval_days: 4 });

    expect(computeNext(scheduled(floored), 0, baseTime).ease_factor).toBe(1.3);
    expect(computeNext(scheduled(floored), 1, baseTime).ease_factor).toBe(1.3);
    expect(computeNext(scheduled(floored), 1, baseTime).interval_days).toBe(5);
  });
});

describe('computeNext - invariants over long histories', () => {
  // Deterministic pseudo-random grade sequence
  function gradeSequence(length: number, seed: number): Grade[] {
    const grades: Grade[] = [];
    let state = seed;
    for (let i = 0; i < length; i++) {
      state = (state * 48271) % 2147483647;
      grades.push(GRADES[state % 4]);
    }
    return grades;
  }

  it.each([1, 7, 42, 1234])('holds ease and interval bounds for seed %i', (seed) => {
    let input: SchedulingInput = newItem;
    let now = baseTime;

    for (const grade of gradeSequence(300, seed)) {
      const record = computeNext(input, grade, now);

      expect(record.ease_factor).toBeGreaterThanOrEqual(1.3);
      if (grade === 0) {
        expect(record.interval_days).toBe(0);
        expect(record.due_at).toBe(addMinutes(now, 10).toISOString());
      } else {
        expect(record.interval_days).toBeGreaterThanOrEqual(1);
      }

      expect(record.interval_days).toBeLessThanOrEqual(MAXIMUM_INTERVAL_DAYS);

      input = scheduled(record);
      now = addDays(now, 1);
    }
  });

  it('gives strictly increasing due dates for repeated Good', () => {
    let input: SchedulingInput = newItem;
    let now = baseTime;
    let previousDue = 0;

    for (let i = 0; i < 8; i++) {
      const record = computeNext(input, 2, now);
      const due = Date.parse(record.due_at);
      expect(due).toBeGreaterThan(previousDue);
      previousDue = due;
      input = scheduled(record);
      now = new Date(record.due_at);
    }

    if (input.kind === 'scheduled') {
      // 1, 3, 8, 20, 50, 125, 313, 783
      expect(input.record.interval_days).toBe(783);
    }
  });
});

describe('nextEaseFactor', () => {
  it('applies the SM-2 adjustment per grade', () => {
    expect(nextEaseFactor(2.5, 0)).toBe(2.18);
    expect(nextEaseFactor(2.5, 1)).toBe(2.36);
    expect(nextEaseFactor(2.5, 2)).toBe(2.5);
    expect(nextEaseFactor(2.5, 3)).toBe(2.6);
  });

  it('never goes below 1.3', () => {
    expect(nextEaseFactor(1.4, 0)).toBe(1.3);
  });
});

describe('schedulingInputFor', () => {
  it('wraps a missing record as a new item', () => {
    expect(schedulingInputFor('card-2', 'user-1', undefined)).toEqual({
      kind: 'new',
      item_id: 'card-2',
      owner_id: 'user-1',
    });
  });

  it('wraps an existing record as scheduled', () => {
    const record = createRecord();
    expect(schedulingInputFor('card-1', 'user-1', record)).toEqual({ kind: 'scheduled', record });
  });
});

describe('classifyMaturity', () => {
  it('uses the 7 and 21 day thresholds', () => {
    expect(classifyMaturity(createRecord({ interval_days: 0 }))).toBe('learning');
    expect(classifyMaturity(createRecord({ interval_days: 6 }))).toBe('learning');
    expect(classifyMaturity(createRecord({ interval_days: 7 }))).toBe('reviewing');
    expect(classifyMaturity(createRecord({ interval_days: 20 }))).toBe('reviewing');
    expect(classifyMaturity(createRecord({ interval_days: 21 }))).toBe('mature');
  });
});

describe('isDue', () => {
  it('is due exactly at the due instant', () => {
    const record = createRecord({ due_at: baseTime.toISOString() });
    expect(isDue(record, baseTime)).toBe(true);
    expect(isDue(record, addMinutes(baseTime, -1))).toBe(false);
  });

  it('treats an unparseable due date as not due', () => {
    expect(isDue(createRecord({ due_at: 'not-a-date' }), baseTime)).toBe(false);
  });
});
