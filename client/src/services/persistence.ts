import type { ReviewRecord } from '@recall-scheduler/shared/scheduler';

/**
 * Durable storage for a learner's review records.
 *
 * The review store is the only caller. Implementations may retry internally;
 * a rejected promise means the operation did not take effect remotely.
 */
export interface ReviewPersistence {
  fetchReviews(ownerId: string): Promise<ReviewRecord[]>;
  saveReview(record: ReviewRecord): Promise<ReviewRecord>;
  deleteReview(ownerId: string, itemId: string): Promise<boolean>;
  /** Records changed elsewhere (e.g. on another device), until `signal` aborts */
  streamUpdates(ownerId: string, signal: AbortSignal): AsyncIterable<ReviewRecord>;
}

export type PersistenceOperation = 'fetch' | 'save' | 'delete' | 'stream';

export class PersistenceError extends Error {
  readonly operation: PersistenceOperation;
  readonly status: number | null;

  constructor(operation: PersistenceOperation, message: string, status: number | null = null) {
    super(message);
    this.name = 'PersistenceError';
    this.operation = operation;
    this.status = status;
  }
}
