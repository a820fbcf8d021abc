import Dexie, { type DexieOptions, type Table } from 'dexie';
import type { ReviewRecord } from '@recall-scheduler/shared/scheduler';

// Local mirror of review records with sync metadata
export interface LocalReview extends ReviewRecord {
  _synced_at: number | null;
}

/**
 * A remote write that has not been accepted yet.
 * One entry per item: a newer write for the same item replaces the older one.
 */
export interface OutboxEntry {
  id: string; // owner_id:item_id
  owner_id: string;
  item_id: string;
  kind: 'save' | 'delete';
  record: ReviewRecord | null;
  queued_at: string;
  token: string; // distinguishes writes queued in the same millisecond
  _retries: number;
  _last_error: string | null;
}

export interface SyncMeta {
  id: string; // owner_id
  last_full_sync: number | null;
}

// Dexie database class
export class ReviewMirrorDB extends Dexie {
  reviews!: Table<LocalReview, [string, string]>;
  outbox!: Table<OutboxEntry, string>;
  syncMeta!: Table<SyncMeta, string>;

  constructor(name: string, options?: DexieOptions) {
    super(name, options);

    this.version(1).stores({
      reviews: '[owner_id+item_id], owner_id, due_at',
      outbox: 'id, owner_id, queued_at',
      syncMeta: 'id',
    });
  }
}

export function outboxId(ownerId: string, itemId: string): string {
  return `${ownerId}:${itemId}`;
}

function generateToken(): string {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
}

// ============ Reviews ============

export async function getLocalReviews(db: ReviewMirrorDB, ownerId: string): Promise<LocalReview[]> {
  return db.reviews.where('owner_id').equals(ownerId).toArray();
}

export async function putLocalReview(
  db: ReviewMirrorDB,
  record: ReviewRecord,
  syncedAt: number | null
): Promise<void> {
  await db.reviews.put({ ...record, _synced_at: syncedAt });
}

/**
 * Replace every mirrored review of a learner with a fresh remote copy.
 */
export async function replaceLocalReviews(
  db: ReviewMirrorDB,
  ownerId: string,
  records: ReviewRecord[]
): Promise<void> {
  const syncedAt = Date.now();
  await db.transaction('rw', [db.reviews, db.syncMeta], async () => {
    await db.reviews.where('owner_id').equals(ownerId).delete();
    await db.reviews.bulkPut(records.map((r) => ({ ...r, _synced_at: syncedAt })));
    await db.syncMeta.put({ id: ownerId, last_full_sync: syncedAt });
  });
}

export async function deleteLocalReview(db: ReviewMirrorDB, ownerId: string, itemId: string): Promise<void> {
  await db.reviews.delete([ownerId, itemId]);
}

export async function getSyncMeta(db: ReviewMirrorDB, ownerId: string): Promise<SyncMeta | undefined> {
  return db.syncMeta.get(ownerId);
}

// ============ Outbox ============

export async function queueOutboxEntry(
  db: ReviewMirrorDB,
  entry: Omit<OutboxEntry, 'id' | 'token' | '_retries' | '_last_error'>
): Promise<OutboxEntry> {
  const queued: OutboxEntry = {
    ...entry,
    id: outboxId(entry.owner_id, entry.item_id),
    token: generateToken(),
    _retries: 0,
    _last_error: null,
  };
  await db.outbox.put(queued);
  return queued;
}

export async function getOutboxEntries(db: ReviewMirrorDB, ownerId?: string): Promise<OutboxEntry[]> {
  const entries = ownerId
    ? await db.outbox.where('owner_id').equals(ownerId).toArray()
    : await db.outbox.toArray();
  // Chronological order keeps replays in the order the learner graded
  return entries.sort((a, b) => Date.parse(a.queued_at) - Date.parse(b.queued_at));
}

export async function markOutboxFailure(db: ReviewMirrorDB, entry: OutboxEntry, error: string): Promise<void> {
  await db.transaction('rw', db.outbox, async () => {
    const current = await db.outbox.get(entry.id);
    if (current && current.token === entry.token) {
      await db.outbox.update(entry.id, {
        _retries: current._retries + 1,
        _last_error: error,
      });
    }
  });
}

/**
 * Remove an outbox entry once its write is accepted, unless a newer write for
 * the same item replaced it in the meantime.
 */
export async function clearOutboxEntry(db: ReviewMirrorDB, entry: OutboxEntry): Promise<void> {
  await db.transaction('rw', db.outbox, async () => {
    const current = await db.outbox.get(entry.id);
    if (current && current.token === entry.token) {
      await db.outbox.delete(entry.id);
    }
  });
}
