// ============ Grades ============

// 0=again, 1=hard, 2=good, 3=easy
export type Grade = 0 | 1 | 2 | 3;

export const GRADES: readonly Grade[] = [0, 1, 2, 3];

export const Grades = {
  AGAIN: 0,
  HARD: 1,
  GOOD: 2,
  EASY: 3,
} as const satisfies Record<string, Grade>;

export type GradeName = 'again' | 'hard' | 'good' | 'easy';

export const GRADE_NAMES: Record<Grade, GradeName> = {
  0: 'again',
  1: 'hard',
  2: 'good',
  3: 'easy',
};

/**
 * Get the grade label for display
 */
export function getGradeLabel(grade: Grade): string {
  const labels: Record<Grade, string> = {
    0: 'Again',
    1: 'Hard',
    2: 'Good',
    3: 'Easy',
  };
  return labels[grade];
}

export function gradeFromName(name: string): Grade | null {
  for (const grade of GRADES) {
    if (GRADE_NAMES[grade] === name) return grade;
  }
  return null;
}

// ============ Records ============

/**
 * Scheduling state of one item for one learner.
 * Timestamps are ISO-8601 UTC strings.
 */
export interface ReviewRecord {
  item_id: string;
  owner_id: string;
  due_at: string;
  ease_factor: number;
  interval_days: number;       // 0 only right after an Again
  repetitions: number;
  last_grade: Grade;
  last_reviewed_at: string | null;
}

/**
 * What the engine is scheduling from: an item that was never graded, or the
 * record left by its previous grading.
 */
export type SchedulingInput =
  | { kind: 'new'; item_id: string; owner_id: string }
  | { kind: 'scheduled'; record: ReviewRecord };

export type Maturity = 'learning' | 'reviewing' | 'mature';

export interface ReviewStats {
  total: number;
  due: number;
  reviewedToday: number;
  learning: number;
  mature: number;
}
