import { computeNext } from './engine';
import { GRADES, type Grade, type ReviewRecord, type SchedulingInput } from './types';

/**
 * What a grade would do to an item, for display on rating buttons.
 */
export interface IntervalPreview {
  grade: Grade;
  intervalMinutes: number;
  intervalText: string;
  next: ReviewRecord;
}

/**
 * Get interval previews for all grades.
 */
export function previewIntervals(input: SchedulingInput, now: Date): IntervalPreview[] {
  return GRADES.map((grade) => {
    const next = computeNext(input, grade, now);
    const intervalMinutes = (Date.parse(next.due_at) - now.getTime()) / (60 * 1000);
    return {
      grade,
      intervalMinutes,
      intervalText: formatInterval(intervalMinutes),
      next,
    };
  });
}

const MINUTES_PER_DAY = 1440;

// Day-based display units, smallest first
const DAY_UNITS: ReadonlyArray<{ below: number; days: number; suffix: string }> = [
  { below: 7, days: 1, suffix: 'd' },
  { below: 30, days: 7, suffix: 'w' },
  { below: 365, days: 30, suffix: 'mo' },
  { below: Number.POSITIVE_INFINITY, days: 365, suffix: 'y' },
];

/**
 * Compact label for an interval: `10m`, `3h`, `4d`, `2.1w`, `1.5mo`, `2y`.
 * With `useLessThan`, anything under ten minutes reads `<10m`.
 */
export function formatInterval(minutes: number, useLessThan: boolean = false): string {
  if (useLessThan && minutes < 10) return '<10m';
  if (minutes < 60) return `${Math.round(minutes)}m`;
  if (minutes < MINUTES_PER_DAY) return `${Math.round(minutes / 60)}h`;

  const days = Math.round(minutes / MINUTES_PER_DAY);
  const unit = DAY_UNITS.find((u) => days < u.below) ?? DAY_UNITS[DAY_UNITS.length - 1];
  const amount = days / unit.days;
  return Number.isInteger(amount) ? `${amount}${unit.suffix}` : `${amount.toFixed(1)}${unit.suffix}`;
}
