import type { ReviewRecord } from '@recall-scheduler/shared/scheduler';
import { createLogger, errorMessage } from '@recall-scheduler/shared/logger';

const log = createLogger('review-hub');

export type ReviewListener = (record: ReviewRecord) => void;

/**
 * In-process fan-out of accepted review writes to the open update streams
 * of the same learner.
 */
export class ReviewHub {
  private listeners = new Map<string, Set<ReviewListener>>();

  subscribe(ownerId: string, listener: ReviewListener): () => void {
    let ownerListeners = this.listeners.get(ownerId);
    if (!ownerListeners) {
      ownerListeners = new Set();
      this.listeners.set(ownerId, ownerListeners);
    }
    ownerListeners.add(listener);

    return () => {
      const current = this.listeners.get(ownerId);
      if (!current) return;
      current.delete(listener);
      if (current.size === 0) this.listeners.delete(ownerId);
    };
  }

  publish(record: ReviewRecord): void {
    this.listeners.get(record.owner_id)?.forEach((listener) => {
      try {
        listener(record);
      } catch (err) {
        log.error('Stream listener failed:', errorMessage(err));
      }
    });
  }

  listenerCount(ownerId: string): number {
    return this.listeners.get(ownerId)?.size ?? 0;
  }
}
