import {
  parseReview,
  serializeReview,
  type ReviewDocument,
  type ReviewRecord,
} from '@recall-scheduler/shared/scheduler';
import { createLogger } from '@recall-scheduler/shared/logger';
import { PersistenceError, type PersistenceOperation, type ReviewPersistence } from '../services/persistence';
import { readServerSentEvents } from './sse';

const log = createLogger('api');

export interface HttpReviewPersistenceOptions {
  /** Origin of the review API, '' for same-origin */
  apiBase: string;
  fetch?: typeof fetch;
}

/**
 * Review persistence backed by the review API server.
 */
export class HttpReviewPersistence implements ReviewPersistence {
  private readonly apiPath: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpReviewPersistenceOptions) {
    this.apiPath = `${options.apiBase}/api`;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  private async fetchJSON(
    operation: PersistenceOperation,
    url: string,
    options: { method?: string; body?: string } = {}
  ): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.apiPath}${url}`, {
        ...options,
        headers: { 'Content-Type': 'application/json' },
      });
    } catch (err) {
      throw new PersistenceError(operation, err instanceof Error ? err.message : 'Network error');
    }

    if (!response.ok) {
      const error: unknown = await response.json().catch(() => null);
      const message = typeof error === 'object' && error !== null && 'error' in error && typeof error.error === 'string'
        ? error.error
        : `HTTP ${response.status}`;
      throw new PersistenceError(operation, message, response.status);
    }

    return response.json();
  }

  async fetchReviews(ownerId: string): Promise<ReviewRecord[]> {
    const body = await this.fetchJSON('fetch', `/reviews?owner_id=${encodeURIComponent(ownerId)}`);
    const documents = typeof body === 'object' && body !== null && 'reviews' in body && Array.isArray(body.reviews)
      ? body.reviews
      : null;
    if (!documents) {
      throw new PersistenceError('fetch', 'Malformed review list');
    }

    const records: ReviewRecord[] = [];
    for (const document of documents) {
      const record = parseReview(document);
      if (record) records.push(record);
    }
    log.debug('Fetched', records.length, 'reviews for', ownerId);
    return records;
  }

  async saveReview(record: ReviewRecord): Promise<ReviewRecord> {
    const document: ReviewDocument = serializeReview(record);
    const body = await this.fetchJSON('save', `/reviews/${encodeURIComponent(record.item_id)}`, {
      method: 'PUT',
      body: JSON.stringify(document),
    });
    const stored = parseReview(body);
    if (!stored) {
      throw new PersistenceError('save', 'Malformed save response');
    }
    return stored;
  }

  async deleteReview(ownerId: string, itemId: string): Promise<boolean> {
    const body = await this.fetchJSON(
      'delete',
      `/reviews/${encodeURIComponent(itemId)}?owner_id=${encodeURIComponent(ownerId)}`,
      { method: 'DELETE' }
    );
    return typeof body === 'object' && body !== null && 'deleted' in body && body.deleted === true;
  }

  async *streamUpdates(ownerId: string, signal: AbortSignal): AsyncIterable<ReviewRecord> {
    let response: Response;
    try {
      response = await this.fetchImpl(
        `${this.apiPath}/reviews/stream?owner_id=${encodeURIComponent(ownerId)}`,
        { headers: { Accept: 'text/event-stream' }, signal }
      );
    } catch (err) {
      if (signal.aborted) return;
      throw new PersistenceError('stream', err instanceof Error ? err.message : 'Network error');
    }

    if (!response.ok || !response.body) {
      throw new PersistenceError('stream', `HTTP ${response.status}`, response.status);
    }

    try {
      for await (const message of readServerSentEvents(response.body)) {
        if (message.event !== 'review') continue;

        let payload: unknown;
        try {
          payload = JSON.parse(message.data);
        } catch {
          log.warn('Skipping unreadable stream message');
          continue;
        }

        const record = parseReview(payload);
        if (record) yield record;
      }
    } catch (err) {
      if (signal.aborted) return;
      throw new PersistenceError('stream', err instanceof Error ? err.message : 'Stream failed');
    }
  }
}
