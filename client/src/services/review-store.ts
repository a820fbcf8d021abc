import {
  DEFAULT_TIME_ZONE,
  computeNext,
  computeStats,
  dueCount,
  dueItems,
  filterDue,
  previewIntervals,
  reviewedAtMs,
  schedulingInputFor,
  type Grade,
  type IntervalPreview,
  type ReviewRecord,
  type ReviewStats,
} from '@recall-scheduler/shared/scheduler';
import { createLogger, errorMessage } from '@recall-scheduler/shared/logger';
import type { ReviewPersistence } from './persistence';

const log = createLogger('review-store');

// ============ Events ============

export type ChangeSource = 'local' | 'remote';

export type ReviewStoreEvent =
  | { type: 'upserted'; record: ReviewRecord; source: ChangeSource }
  | { type: 'removed'; itemId: string }
  | { type: 'loaded'; count: number }
  | { type: 'persist-failed'; ownerId: string; itemId: string; operation: 'save' | 'delete'; error: string }
  | { type: 'error'; operation: 'fetch' | 'stream'; error: string };

export type ReviewStoreListener = (event: ReviewStoreEvent) => void;

export interface ReviewStoreStatus {
  isLoading: boolean;
  loadError: string | null;
  /** Items whose last remote write failed */
  failedItemIds: readonly string[];
}

export interface ReviewStoreOptions {
  persistence: ReviewPersistence;
  ownerId: string;
  /** IANA zone used for "reviewed today" */
  timeZone?: string;
  now?: () => Date;
}

// ============ Remote operation queue ============

type PendingOperation =
  | { kind: 'save'; record: ReviewRecord }
  | { kind: 'delete'; waiters: Array<(deleted: boolean) => void> };

/**
 * Remote operations for one learner's item. `drain` is set while an
 * operation is in flight; everything else waits in `queue`.
 */
interface ItemChannel {
  ownerId: string;
  itemId: string;
  queue: PendingOperation[];
  drain: Promise<void> | null;
}

/**
 * In-memory review records of one learner.
 *
 * Gradings are committed locally and synchronously; remote writes trail
 * behind with at most one in flight per item. Remote data enters only
 * through `load` and `reconcile`.
 */
export class ReviewStore {
  private readonly persistence: ReviewPersistence;
  private readonly timeZone: string;
  private readonly now: () => Date;
  private ownerId: string;

  private records = new Map<string, ReviewRecord>();
  // item_id -> instant of the last local reset (ms)
  private tombstones = new Map<string, number>();
  // Resets the remote has confirmed; their tombstones go at the next load
  private confirmedResets = new Set<string>();
  // owner_id:item_id -> remote operations
  private channels = new Map<string, ItemChannel>();
  private failedItemIds = new Set<string>();
  // Items written locally while a load is in progress
  private touchedDuringLoad = new Set<string>();
  private listeners = new Set<ReviewStoreListener>();
  private connection: Promise<void> | null = null;
  private connectionController: AbortController | null = null;

  private isLoading = false;
  private loadError: string | null = null;
  private loadGeneration = 0;

  constructor(options: ReviewStoreOptions) {
    this.persistence = options.persistence;
    this.ownerId = options.ownerId;
    this.timeZone = options.timeZone ?? DEFAULT_TIME_ZONE;
    this.now = options.now ?? (() => new Date());
  }

  get owner(): string {
    return this.ownerId;
  }

  get status(): ReviewStoreStatus {
    return {
      isLoading: this.isLoading,
      loadError: this.loadError,
      failedItemIds: Array.from(this.failedItemIds).sort(),
    };
  }

  // ============ Subscriptions ============

  subscribe(listener: ReviewStoreListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(event: ReviewStoreEvent) {
    this.listeners.forEach((listener) => {
      try {
        listener(event);
      } catch (err) {
        log.error('Listener failed on', event.type, errorMessage(err));
      }
    });
  }

  // ============ Commands ============

  /**
   * Grade an item and commit the result locally. The remote write is queued
   * and never blocks the caller.
   */
  recordGrading(itemId: string, grade: Grade): ReviewRecord {
    const input = schedulingInputFor(itemId, this.ownerId, this.records.get(itemId));
    const next = computeNext(input, grade, this.now());

    // A fresh grading supersedes the reset
    this.tombstones.delete(itemId);
    this.confirmedResets.delete(itemId);
    this.records.set(itemId, next);
    if (this.isLoading) this.touchedDuringLoad.add(itemId);
    this.emit({ type: 'upserted', record: next, source: 'local' });

    this.enqueue(this.ownerId, itemId, { kind: 'save', record: next });
    return next;
  }

  /**
   * Forget an item's schedule. Local removal is immediate; the promise
   * reports whether the remote deletion succeeded.
   */
  resetItem(itemId: string): Promise<boolean> {
    this.tombstones.set(itemId, this.now().getTime());
    this.confirmedResets.delete(itemId);
    if (this.isLoading) this.touchedDuringLoad.add(itemId);

    if (this.records.delete(itemId)) {
      this.emit({ type: 'removed', itemId });
    }

    return new Promise<boolean>((resolve) => {
      this.enqueue(this.ownerId, itemId, { kind: 'delete', waiters: [resolve] });
    });
  }

  /**
   * Replace the collection with the learner's stored records. Never throws;
   * a failure leaves the collection empty and sets `status.loadError`.
   */
  async load(ownerId: string = this.ownerId): Promise<void> {
    if (ownerId !== this.ownerId) {
      this.ownerId = ownerId;
      this.records.clear();
      this.tombstones.clear();
      this.confirmedResets.clear();
      this.failedItemIds.clear();
    }

    const generation = ++this.loadGeneration;
    // Confirmed before the fetch went out, so the fetch cannot hold them
    const prunable = Array.from(this.confirmedResets);
    this.isLoading = true;
    this.loadError = null;
    this.touchedDuringLoad.clear();

    let fetched: ReviewRecord[];
    try {
      fetched = await this.persistence.fetchReviews(ownerId);
    } catch (err) {
      if (generation !== this.loadGeneration) return;
      const message = errorMessage(err);
      log.error('Failed to load reviews for', ownerId, message);
      this.records.clear();
      this.isLoading = false;
      this.loadError = message;
      this.emit({ type: 'error', operation: 'fetch', error: message });
      return;
    }

    // A newer load owns the collection now
    if (generation !== this.loadGeneration) return;

    const next = new Map<string, ReviewRecord>();
    for (const record of fetched) {
      if (record.owner_id !== ownerId) continue;
      if (this.olderThanReset(record)) continue;
      next.set(record.item_id, record);
    }

    for (const [itemId, local] of this.records) {
      if (!this.hasUnconfirmedWrite(itemId)) continue;
      const remote = next.get(itemId);
      if (!remote || reviewedAtMs(local) > reviewedAtMs(remote)) {
        next.set(itemId, local);
      }
    }

    for (const itemId of prunable) {
      if (!this.confirmedResets.has(itemId) || this.channels.has(channelKey(ownerId, itemId))) continue;
      this.tombstones.delete(itemId);
      this.confirmedResets.delete(itemId);
    }

    this.records = next;
    this.isLoading = false;
    this.touchedDuringLoad.clear();
    log.info(`Loaded ${next.size} reviews for ${ownerId}`);
    this.emit({ type: 'loaded', count: next.size });
  }

  /**
   * Merge a record that changed elsewhere. Last write wins on
   * `last_reviewed_at`; returns whether the record was applied.
   */
  reconcile(remote: ReviewRecord): boolean {
    if (remote.owner_id !== this.ownerId) return false;
    if (this.olderThanReset(remote)) return false;

    const local = this.records.get(remote.item_id);
    if (local && !(reviewedAtMs(remote) > reviewedAtMs(local))) return false;

    this.records.set(remote.item_id, remote);

    // Unsent local saves are older than this record
    const channel = this.channels.get(channelKey(remote.owner_id, remote.item_id));
    if (channel) {
      channel.queue = channel.queue.filter((op) => op.kind !== 'save');
    }

    this.emit({ type: 'upserted', record: remote, source: 'remote' });
    return true;
  }

  /**
   * Follow remote changes until the returned function is called or `signal`
   * aborts. A new connection replaces the previous one.
   */
  connect(signal?: AbortSignal): () => void {
    this.connectionController?.abort();
    const controller = new AbortController();
    this.connectionController = controller;
    if (signal) {
      if (signal.aborted) controller.abort();
      else signal.addEventListener('abort', () => controller.abort(), { once: true });
    }

    this.connection = this.follow(this.ownerId, controller.signal);
    return () => controller.abort();
  }

  private async follow(ownerId: string, signal: AbortSignal): Promise<void> {
    try {
      for await (const record of this.persistence.streamUpdates(ownerId, signal)) {
        if (signal.aborted) break;
        this.reconcile(record);
      }
    } catch (err) {
      if (signal.aborted) return;
      const message = errorMessage(err);
      log.warn('Update stream ended:', message);
      this.emit({ type: 'error', operation: 'stream', error: message });
    }
  }

  /**
   * Resolves once every queued remote operation has finished.
   */
  async settled(): Promise<void> {
    let drains = this.activeDrains();
    while (drains.length > 0) {
      await Promise.all(drains);
      drains = this.activeDrains();
    }
  }

  /** Resolves when the update stream started by `connect` has stopped */
  async disconnected(): Promise<void> {
    if (this.connection) await this.connection;
  }

  // ============ Queries ============

  get(itemId: string): ReviewRecord | undefined {
    return this.records.get(itemId);
  }

  getAll(): ReviewRecord[] {
    return Array.from(this.records.values());
  }

  get size(): number {
    return this.records.size;
  }

  dueItems(now: Date = this.now()): ReviewRecord[] {
    return dueItems(this.records.values(), now);
  }

  dueCount(now: Date = this.now()): number {
    return dueCount(this.records.values(), now);
  }

  filterDue<T>(items: readonly T[], getId: (item: T) => string, now: Date = this.now()): T[] {
    return filterDue(items, this.records.values(), now, getId);
  }

  stats(now: Date = this.now()): ReviewStats {
    return computeStats(this.records.values(), now, this.timeZone);
  }

  previewIntervals(itemId: string, now: Date = this.now()): IntervalPreview[] {
    return previewIntervals(schedulingInputFor(itemId, this.ownerId, this.records.get(itemId)), now);
  }

  // ============ Internals ============

  private olderThanReset(record: ReviewRecord): boolean {
    const resetAt = this.tombstones.get(record.item_id);
    return resetAt !== undefined && reviewedAtMs(record) <= resetAt;
  }

  private hasUnconfirmedWrite(itemId: string): boolean {
    return this.channels.has(channelKey(this.ownerId, itemId))
      || this.failedItemIds.has(itemId)
      || this.touchedDuringLoad.has(itemId);
  }

  private activeDrains(): Promise<void>[] {
    const drains: Promise<void>[] = [];
    for (const channel of this.channels.values()) {
      if (channel.drain) drains.push(channel.drain);
    }
    return drains;
  }

  /**
   * Queue a remote operation. A save replaces a queued save; a delete drops
   * every queued save and joins a queued delete.
   */
  private enqueue(ownerId: string, itemId: string, op: PendingOperation) {
    const key = channelKey(ownerId, itemId);
    let channel = this.channels.get(key);
    if (!channel) {
      channel = { ownerId, itemId, queue: [], drain: null };
      this.channels.set(key, channel);
    }

    if (op.kind === 'save') {
      const last = channel.queue[channel.queue.length - 1];
      if (last?.kind === 'save') channel.queue[channel.queue.length - 1] = op;
      else channel.queue.push(op);
    } else {
      const queued = channel.queue.find((pending) => pending.kind === 'delete');
      channel.queue = channel.queue.filter((pending) => pending.kind !== 'save');
      if (queued?.kind === 'delete') {
        queued.waiters.push(...op.waiters);
      } else {
        channel.queue.push(op);
      }
    }

    if (!channel.drain) {
      channel.drain = this.drain(key, channel);
    }
  }

  private async drain(key: string, channel: ItemChannel): Promise<void> {
    try {
      let op = channel.queue.shift();
      while (op) {
        await this.perform(channel, op);
        op = channel.queue.shift();
      }
    } finally {
      channel.drain = null;
      if (this.channels.get(key) === channel) {
        this.channels.delete(key);
      }
    }
  }

  private async perform(channel: ItemChannel, op: PendingOperation): Promise<void> {
    const { ownerId, itemId } = channel;

    if (op.kind === 'save') {
      try {
        const stored = await this.persistence.saveReview(op.record);
        if (ownerId === this.ownerId) this.failedItemIds.delete(itemId);
        // The remote may hold a newer write from another device
        this.reconcile(stored);
      } catch (err) {
        this.reportFailure(channel, 'save', err);
      }
      return;
    }

    let deleted = false;
    try {
      deleted = await this.persistence.deleteReview(ownerId, itemId);
      if (ownerId === this.ownerId) {
        this.failedItemIds.delete(itemId);
        if (this.tombstones.has(itemId)) this.confirmedResets.add(itemId);
      }
    } catch (err) {
      this.reportFailure(channel, 'delete', err);
    }
    op.waiters.forEach((resolve) => resolve(deleted));
  }

  private reportFailure(channel: ItemChannel, operation: 'save' | 'delete', err: unknown) {
    const { ownerId, itemId } = channel;
    const message = errorMessage(err);
    log.warn(`Remote ${operation} failed for ${ownerId}/${itemId}:`, message);
    // Failures of a previous learner do not flag the current collection
    if (ownerId === this.ownerId) this.failedItemIds.add(itemId);
    this.emit({ type: 'persist-failed', ownerId, itemId, operation, error: message });
  }
}

function channelKey(ownerId: string, itemId: string): string {
  return `${ownerId}:${itemId}`;
}
