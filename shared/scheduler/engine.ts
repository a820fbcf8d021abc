/**
 * SM-2 Scheduling Engine
 *
 * Pure, deterministic state transition: (previous state, grade, now) → next
 * record. Based on the SuperMemo 2 algorithm, with a short re-learning step
 * for failed items: an Again grading penalizes the ease factor but brings the
 * item back after ten minutes instead of growing the interval from the
 * penalized ease.
 */

import type { Grade, Maturity, ReviewRecord, SchedulingInput } from './types';

// ============ Constants ============

export const DEFAULT_EASE_FACTOR = 2.5;
export const MINIMUM_EASE_FACTOR = 1.3;

/** Delay before a failed item comes back */
export const RELEARN_DELAY_MINUTES = 10;

/** First interval for a never-graded item, by grade (0 = re-learning step) */
export const INITIAL_INTERVAL_DAYS: Record<Grade, number> = {
  0: 0,
  1: 1,
  2: 1,
  3: 3,
};

/** Upper bound on any interval (~100 years) */
export const MAXIMUM_INTERVAL_DAYS = 36500;

export const LEARNING_THRESHOLD_DAYS = 7;
export const MATURE_THRESHOLD_DAYS = 21;

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

// ============ Helpers ============

function roundEase(ease: number): number {
  return Math.round(ease * 100) / 100;
}

function addMs(now: Date, ms: number): string {
  return new Date(now.getTime() + ms).toISOString();
}

/**
 * Ease update: EF' = EF + (0.1 - (3-q) * (0.08 + (3-q) * 0.02)), floored at 1.3.
 * Easy raises the ease by 0.1, Good leaves it unchanged, Hard and Again lower it.
 */
export function nextEaseFactor(easeFactor: number, grade: Grade): number {
  const miss = 3 - grade;
  const updated = easeFactor + (0.1 - miss * (0.08 + miss * 0.02));
  return Math.max(MINIMUM_EASE_FACTOR, roundEase(updated));
}

function dueAfter(now: Date, intervalDays: number): string {
  return intervalDays === 0
    ? addMs(now, RELEARN_DELAY_MINUTES * MINUTE_MS)
    : addMs(now, intervalDays * DAY_MS);
}

// ============ Transition ============

/**
 * Compute the record that results from grading an item.
 *
 * @param input The item's current scheduling state
 * @param grade The learner's recall quality
 * @param now When the grading happened
 */
export function computeNext(input: SchedulingInput, grade: Grade, now: Date): ReviewRecord {
  const reviewedAt = now.toISOString();

  switch (input.kind) {
    case 'new': {
      const intervalDays = INITIAL_INTERVAL_DAYS[grade];
      return {
        item_id: input.item_id,
        owner_id: input.owner_id,
        due_at: dueAfter(now, intervalDays),
        ease_factor: DEFAULT_EASE_FACTOR,
        interval_days: intervalDays,
        repetitions: 1,
        last_grade: grade,
        last_reviewed_at: reviewedAt,
      };
    }
    case 'scheduled': {
      const previous = input.record;
      const easeFactor = nextEaseFactor(previous.ease_factor, grade);
      const intervalDays = grade === 0
        ? 0
        : Math.min(MAXIMUM_INTERVAL_DAYS, Math.max(1, Math.round(previous.interval_days * easeFactor)));

      return {
        item_id: previous.item_id,
        owner_id: previous.owner_id,
        due_at: dueAfter(now, intervalDays),
        ease_factor: easeFactor,
        interval_days: intervalDays,
        repetitions: previous.repetitions + 1,
        last_grade: grade,
        last_reviewed_at: reviewedAt,
      };
    }
    default: {
      const unreachable: never = input;
      return unreachable;
    }
  }
}

/**
 * Wrap an optional stored record as engine input.
 */
export function schedulingInputFor(
  itemId: string,
  ownerId: string,
  record: ReviewRecord | undefined
): SchedulingInput {
  return record
    ? { kind: 'scheduled', record }
    : { kind: 'new', item_id: itemId, owner_id: ownerId };
}

// ============ Classification ============

export function classifyMaturity(record: ReviewRecord): Maturity {
  if (record.interval_days < LEARNING_THRESHOLD_DAYS) return 'learning';
  if (record.interval_days >= MATURE_THRESHOLD_DAYS) return 'mature';
  return 'reviewing';
}

/**
 * A record is due once its due instant has passed.
 * An unparseable due_at is never due.
 */
export function isDue(record: ReviewRecord, now: Date): boolean {
  const dueMs = Date.parse(record.due_at);
  return !Number.isNaN(dueMs) && dueMs <= now.getTime();
}
