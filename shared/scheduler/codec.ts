/**
 * Storage/wire form of review records.
 *
 * Documents carry the grade by name and timestamps as ISO strings with
 * millisecond precision. Parsing is lenient about `last_reviewed_at`: a
 * missing or unreadable value becomes null, which loses every
 * last-write-wins comparison.
 */

import { z } from 'zod';
import { createLogger } from '../logger';
import { MINIMUM_EASE_FACTOR } from './engine';
import { GRADE_NAMES, type Grade, type GradeName, type ReviewRecord } from './types';

const log = createLogger('codec');

export interface ReviewDocument {
  item_id: string;
  owner_id: string;
  due_at: string;
  ease_factor: number;
  interval_days: number;
  repetitions: number;
  last_grade: GradeName;
  last_reviewed_at: string | null;
}

const GRADE_BY_NAME: Record<GradeName, Grade> = {
  again: 0,
  hard: 1,
  good: 2,
  easy: 3,
};

function toIsoOrNull(value: unknown): string | null {
  if (typeof value !== 'string' && !(value instanceof Date)) return null;
  const ms = value instanceof Date ? value.getTime() : Date.parse(value);
  return Number.isNaN(ms) ? null : new Date(ms).toISOString();
}

const GradeSchema = z.union([
  z.enum(['again', 'hard', 'good', 'easy']).transform((name) => GRADE_BY_NAME[name]),
  z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3)]),
]);

const TimestampSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), 'Invalid timestamp')
  .transform((value) => new Date(Date.parse(value)).toISOString());

/**
 * Validates an untrusted document and normalizes it into a ReviewRecord.
 */
export const ReviewDocumentSchema = z.object({
  item_id: z.string().min(1),
  owner_id: z.string().min(1),
  due_at: TimestampSchema,
  ease_factor: z.number().finite().min(MINIMUM_EASE_FACTOR),
  interval_days: z.number().int().min(0),
  repetitions: z.number().int().min(1),
  last_grade: GradeSchema,
  last_reviewed_at: z.unknown().transform(toIsoOrNull),
});

export function formatZodErrors(error: z.ZodError): string[] {
  return error.issues.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function serializeReview(record: ReviewRecord): ReviewDocument {
  return {
    item_id: record.item_id,
    owner_id: record.owner_id,
    due_at: record.due_at,
    ease_factor: record.ease_factor,
    interval_days: record.interval_days,
    repetitions: record.repetitions,
    last_grade: GRADE_NAMES[record.last_grade],
    last_reviewed_at: record.last_reviewed_at,
  };
}

/**
 * Parse a document from storage or the network.
 * Returns null (and logs why) when the document cannot be scheduled from.
 */
export function parseReview(raw: unknown): ReviewRecord | null {
  const result = ReviewDocumentSchema.safeParse(raw);
  if (!result.success) {
    log.warn('Discarding malformed review document:', formatZodErrors(result.error).join('; '));
    return null;
  }
  return result.data;
}

/**
 * Milliseconds of the last grading, or -Infinity when unknown so that the
 * record is older than anything with a real timestamp.
 */
export function reviewedAtMs(record: ReviewRecord): number {
  if (!record.last_reviewed_at) return Number.NEGATIVE_INFINITY;
  const ms = Date.parse(record.last_reviewed_at);
  return Number.isNaN(ms) ? Number.NEGATIVE_INFINITY : ms;
}
