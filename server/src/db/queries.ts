import Database from 'better-sqlite3';
import { parseReview, type ReviewRecord } from '@recall-scheduler/shared/scheduler';
import { createLogger } from '@recall-scheduler/shared/logger';

const log = createLogger('db');

export type ReviewDatabase = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS reviews (
    owner_id TEXT NOT NULL,
    item_id TEXT NOT NULL,
    due_at TEXT NOT NULL,
    ease_factor REAL NOT NULL,
    interval_days INTEGER NOT NULL,
    repetitions INTEGER NOT NULL,
    last_grade INTEGER NOT NULL,
    last_reviewed_at TEXT,
    updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    PRIMARY KEY (owner_id, item_id)
  );
  CREATE INDEX IF NOT EXISTS idx_reviews_owner_due ON reviews (owner_id, due_at);
`;

/**
 * Open (or create) the review database and apply the schema.
 */
export function openDatabase(path: string): ReviewDatabase {
  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  migrate(db);
  log.info('Opened review database at', path);
  return db;
}

export function migrate(db: ReviewDatabase): void {
  db.exec(SCHEMA);
}

// Rows go back through the codec so a corrupted row is skipped, not served
function toRecord(row: unknown): ReviewRecord | null {
  return row === undefined ? null : parseReview(row);
}

// ============ Reviews ============

export function getReviewsByOwner(db: ReviewDatabase, ownerId: string): ReviewRecord[] {
  const rows = db
    .prepare('SELECT * FROM reviews WHERE owner_id = ? ORDER BY due_at, item_id')
    .all(ownerId);

  const records: ReviewRecord[] = [];
  for (const row of rows) {
    const record = toRecord(row);
    if (record) records.push(record);
  }
  return records;
}

export function getReview(db: ReviewDatabase, ownerId: string, itemId: string): ReviewRecord | null {
  return toRecord(
    db.prepare('SELECT * FROM reviews WHERE owner_id = ? AND item_id = ?').get(ownerId, itemId)
  );
}

export interface UpsertResult {
  /** Whatever is stored for the item afterwards */
  stored: ReviewRecord;
  /** False when the stored record was newer and was kept */
  applied: boolean;
}

/**
 * Store a review unless the stored one was graded later (last write wins on
 * last_reviewed_at). A record without a grading time never replaces one that
 * has it.
 */
export function upsertReview(db: ReviewDatabase, record: ReviewRecord): UpsertResult {
  const upsert = db.prepare(`
    INSERT INTO reviews (
      owner_id, item_id, due_at, ease_factor, interval_days, repetitions, last_grade, last_reviewed_at
    )
    VALUES (@owner_id, @item_id, @due_at, @ease_factor, @interval_days, @repetitions, @last_grade, @last_reviewed_at)
    ON CONFLICT (owner_id, item_id) DO UPDATE SET
      due_at = excluded.due_at,
      ease_factor = excluded.ease_factor,
      interval_days = excluded.interval_days,
      repetitions = excluded.repetitions,
      last_grade = excluded.last_grade,
      last_reviewed_at = excluded.last_reviewed_at,
      updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
    WHERE reviews.last_reviewed_at IS NULL
      OR (excluded.last_reviewed_at IS NOT NULL AND excluded.last_reviewed_at >= reviews.last_reviewed_at)
  `);

  return db.transaction((): UpsertResult => {
    const { changes } = upsert.run({
      owner_id: record.owner_id,
      item_id: record.item_id,
      due_at: record.due_at,
      ease_factor: record.ease_factor,
      interval_days: record.interval_days,
      repetitions: record.repetitions,
      last_grade: record.last_grade,
      last_reviewed_at: record.last_reviewed_at,
    });

    const stored = getReview(db, record.owner_id, record.item_id);
    if (!stored) {
      throw new Error(`Review ${record.owner_id}/${record.item_id} unreadable after write`);
    }
    return { stored, applied: changes > 0 };
  })();
}

export function deleteReview(db: ReviewDatabase, ownerId: string, itemId: string): boolean {
  const { changes } = db
    .prepare('DELETE FROM reviews WHERE owner_id = ? AND item_id = ?')
    .run(ownerId, itemId);
  return changes > 0;
}
