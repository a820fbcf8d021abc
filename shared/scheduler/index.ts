/**
 * Shared Scheduler Module - SM-2 Implementation
 *
 * Pure review scheduling used by the client store (offline) and the review
 * API server.
 */

export {
  // Types
  type Grade,
  type GradeName,
  type ReviewRecord,
  type SchedulingInput,
  type Maturity,
  type ReviewStats,
  GRADES,
  GRADE_NAMES,
  Grades,
  getGradeLabel,
  gradeFromName,
} from './types';

export {
  // Constants
  DEFAULT_EASE_FACTOR,
  MINIMUM_EASE_FACTOR,
  RELEARN_DELAY_MINUTES,
  INITIAL_INTERVAL_DAYS,
  MAXIMUM_INTERVAL_DAYS,
  LEARNING_THRESHOLD_DAYS,
  MATURE_THRESHOLD_DAYS,

  // Core functions
  computeNext,
  nextEaseFactor,
  schedulingInputFor,
  classifyMaturity,
  isDue,
} from './engine';

export { dueItems, dueCount, filterDue } from './due';

export {
  DEFAULT_TIME_ZONE,
  computeStats,
  calendarDay,
  isValidTimeZone,
} from './stats';

export { type IntervalPreview, previewIntervals, formatInterval } from './preview';

export {
  type ReviewDocument,
  ReviewDocumentSchema,
  serializeReview,
  parseReview,
  reviewedAtMs,
  formatZodErrors,
} from './codec';
