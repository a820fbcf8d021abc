import { classifyMaturity, isDue } from './engine';
import type { ReviewRecord, ReviewStats } from './types';

export const DEFAULT_TIME_ZONE = 'UTC';

const dayFormatters = new Map<string, Intl.DateTimeFormat>();

function dayFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = dayFormatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-CA', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
    });
    dayFormatters.set(timeZone, formatter);
  }
  return formatter;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    dayFormatter(timeZone);
    return true;
  } catch {
    return false;
  }
}

/**
 * Calendar day (YYYY-MM-DD) of an instant as seen in `timeZone`.
 */
export function calendarDay(date: Date, timeZone: string = DEFAULT_TIME_ZONE): string {
  return dayFormatter(timeZone).format(date);
}

function reviewedOn(record: ReviewRecord, day: string, timeZone: string): boolean {
  if (!record.last_reviewed_at) return false;
  const reviewedMs = Date.parse(record.last_reviewed_at);
  if (Number.isNaN(reviewedMs)) return false;
  return calendarDay(new Date(reviewedMs), timeZone) === day;
}

/**
 * Summary counters over a learner's review records.
 * "Reviewed today" compares calendar days in a single time zone.
 */
export function computeStats(
  records: Iterable<ReviewRecord>,
  now: Date,
  timeZone: string = DEFAULT_TIME_ZONE
): ReviewStats {
  const today = calendarDay(now, timeZone);
  const stats: ReviewStats = {
    total: 0,
    due: 0,
    reviewedToday: 0,
    learning: 0,
    mature: 0,
  };

  for (const record of records) {
    stats.total++;
    if (isDue(record, now)) stats.due++;
    if (reviewedOn(record, today, timeZone)) stats.reviewedToday++;

    const maturity = classifyMaturity(record);
    if (maturity === 'learning') stats.learning++;
    else if (maturity === 'mature') stats.mature++;
  }

  return stats;
}
