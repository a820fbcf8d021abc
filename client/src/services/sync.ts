import { reviewedAtMs, type ReviewRecord } from '@recall-scheduler/shared/scheduler';
import { createLogger, errorMessage } from '@recall-scheduler/shared/logger';
import {
  ReviewMirrorDB,
  type OutboxEntry,
  getLocalReviews,
  putLocalReview,
  replaceLocalReviews,
  deleteLocalReview,
  getSyncMeta,
  queueOutboxEntry,
  getOutboxEntries,
  markOutboxFailure,
  clearOutboxEntry,
} from '../db/database';
import { PersistenceError, type ReviewPersistence } from './persistence';

const log = createLogger('sync');

/**
 * Offline-first persistence.
 *
 * Wraps a remote collaborator with an IndexedDB mirror. Every write lands in
 * the mirror and in an outbox before the remote call; writes the remote
 * rejects stay in the outbox until `flushOutbox` replays them. Reads fall
 * back to the mirror while the remote is unreachable.
 */
export class OfflineReviewPersistence implements ReviewPersistence {
  private isSyncing = false;
  private syncListeners: Set<(syncing: boolean) => void> = new Set();

  constructor(
    private readonly remote: ReviewPersistence,
    private readonly db: ReviewMirrorDB
  ) {}

  addSyncListener(listener: (syncing: boolean) => void) {
    this.syncListeners.add(listener);
    return () => this.syncListeners.delete(listener);
  }

  private notifySyncListeners(syncing: boolean) {
    this.isSyncing = syncing;
    this.syncListeners.forEach(listener => listener(syncing));
  }

  get isSyncingNow(): boolean {
    return this.isSyncing;
  }

  /**
   * Fetch from the remote and refresh the mirror. A pending save is laid over
   * the remote copy only when it was reviewed later; a pending delete applies
   * only when the remote copy was not reviewed after it was queued. Pending
   * writes that lost are dropped from the outbox. Falls back to the mirror
   * when the remote fails and the learner was synced at least once.
   */
  async fetchReviews(ownerId: string): Promise<ReviewRecord[]> {
    const pending = await getOutboxEntries(this.db, ownerId);

    let remoteRecords: ReviewRecord[];
    try {
      remoteRecords = await this.remote.fetchReviews(ownerId);
    } catch (err) {
      const syncMeta = await getSyncMeta(this.db, ownerId);
      if (!syncMeta?.last_full_sync) {
        throw err;
      }
      log.warn('Remote fetch failed, serving mirrored reviews:', errorMessage(err));
      return (await getLocalReviews(this.db, ownerId)).map(stripSyncMeta);
    }

    await replaceLocalReviews(this.db, ownerId, remoteRecords);

    const byItem = new Map(remoteRecords.map((r) => [r.item_id, r]));
    let superseded = 0;
    for (const entry of pending) {
      const remote = byItem.get(entry.item_id);

      if (entry.kind === 'delete') {
        if (remote && reviewedAtMs(remote) > Date.parse(entry.queued_at)) {
          await clearOutboxEntry(this.db, entry);
          superseded++;
          continue;
        }
        byItem.delete(entry.item_id);
        await deleteLocalReview(this.db, ownerId, entry.item_id);
      } else if (entry.record) {
        if (remote && reviewedAtMs(entry.record) <= reviewedAtMs(remote)) {
          await clearOutboxEntry(this.db, entry);
          superseded++;
          continue;
        }
        byItem.set(entry.item_id, entry.record);
        await putLocalReview(this.db, entry.record, null);
      }
    }

    log.info(
      `Fetched ${remoteRecords.length} reviews for ${ownerId} ` +
        `(${pending.length - superseded} pending, ${superseded} superseded)`
    );
    return Array.from(byItem.values());
  }

  async saveReview(record: ReviewRecord): Promise<ReviewRecord> {
    await putLocalReview(this.db, record, null);
    const entry = await queueOutboxEntry(this.db, {
      owner_id: record.owner_id,
      item_id: record.item_id,
      kind: 'save',
      record,
      queued_at: new Date().toISOString(),
    });

    try {
      const stored = await this.remote.saveReview(record);
      await clearOutboxEntry(this.db, entry);
      await putLocalReview(this.db, stored, Date.now());
      return stored;
    } catch (err) {
      await markOutboxFailure(this.db, entry, errorMessage(err));
      throw err;
    }
  }

  async deleteReview(ownerId: string, itemId: string): Promise<boolean> {
    await deleteLocalReview(this.db, ownerId, itemId);
    const entry = await queueOutboxEntry(this.db, {
      owner_id: ownerId,
      item_id: itemId,
      kind: 'delete',
      record: null,
      queued_at: new Date().toISOString(),
    });

    try {
      const deleted = await this.remote.deleteReview(ownerId, itemId);
      await clearOutboxEntry(this.db, entry);
      return deleted;
    } catch (err) {
      await markOutboxFailure(this.db, entry, errorMessage(err));
      throw err;
    }
  }

  async *streamUpdates(ownerId: string, signal: AbortSignal): AsyncIterable<ReviewRecord> {
    for await (const record of this.remote.streamUpdates(ownerId, signal)) {
      const mirrored = await this.db.reviews.get([record.owner_id, record.item_id]);
      if (!mirrored || reviewedAtMs(record) > reviewedAtMs(mirrored)) {
        await putLocalReview(this.db, record, Date.now());
      }
      yield record;
    }
  }

  /**
   * Replay queued writes in the order they were made.
   */
  async flushOutbox(ownerId?: string): Promise<{ synced: number; failed: number }> {
    if (this.isSyncing) return { synced: 0, failed: 0 };
    this.notifySyncListeners(true);

    let synced = 0;
    let failed = 0;

    try {
      const pending = await getOutboxEntries(this.db, ownerId);
      log.debug('Flushing', pending.length, 'queued writes');

      for (const entry of pending) {
        try {
          await this.replay(entry);
          await clearOutboxEntry(this.db, entry);
          synced++;
        } catch (err) {
          await markOutboxFailure(this.db, entry, errorMessage(err));
          failed++;
        }
      }
    } finally {
      this.notifySyncListeners(false);
    }

    if (synced > 0 || failed > 0) {
      log.info(`Outbox flush: ${synced} synced, ${failed} failed`);
    }
    return { synced, failed };
  }

  private async replay(entry: OutboxEntry): Promise<void> {
    if (entry.kind === 'delete') {
      await this.remote.deleteReview(entry.owner_id, entry.item_id);
      return;
    }
    if (!entry.record) {
      throw new PersistenceError('save', `Outbox entry ${entry.id} has no record`);
    }
    const stored = await this.remote.saveReview(entry.record);
    await putLocalReview(this.db, stored, Date.now());
  }

  async pendingCount(ownerId?: string): Promise<number> {
    return (await getOutboxEntries(this.db, ownerId)).length;
  }
}

function stripSyncMeta(review: ReviewRecord): ReviewRecord {
  return {
    item_id: review.item_id,
    owner_id: review.owner_id,
    due_at: review.due_at,
    ease_factor: review.ease_factor,
    interval_days: review.interval_days,
    repetitions: review.repetitions,
    last_grade: review.last_grade,
    last_reviewed_at: review.last_reviewed_at,
  };
}
