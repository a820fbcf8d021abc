import { HttpReviewPersistence } from './api/client';
import { ReviewMirrorDB } from './db/database';
import { OfflineReviewPersistence } from './services/sync';
import { ReviewStore } from './services/review-store';
import { resolveClientConfig, type ClientConfigInput } from './config';

export { HttpReviewPersistence, type HttpReviewPersistenceOptions } from './api/client';
export { readServerSentEvents, type ServerSentEvent } from './api/sse';
export { ReviewMirrorDB, type LocalReview, type OutboxEntry } from './db/database';
export {
  PersistenceError,
  type PersistenceOperation,
  type ReviewPersistence,
} from './services/persistence';
export { OfflineReviewPersistence } from './services/sync';
export {
  ReviewStore,
  type ChangeSource,
  type ReviewStoreEvent,
  type ReviewStoreListener,
  type ReviewStoreOptions,
  type ReviewStoreStatus,
} from './services/review-store';
export { resolveClientConfig, type ClientConfig, type ClientConfigInput } from './config';

export interface ReviewClient {
  store: ReviewStore;
  persistence: OfflineReviewPersistence;
  db: ReviewMirrorDB;
}

/**
 * Wire a store for one learner: HTTP remote, IndexedDB mirror and outbox.
 */
export function createReviewClient(
  ownerId: string,
  config: ClientConfigInput = {},
  fetchImpl?: typeof fetch
): ReviewClient {
  const resolved = resolveClientConfig(config);
  const db = new ReviewMirrorDB(resolved.databaseName);
  const remote = new HttpReviewPersistence({ apiBase: resolved.apiBase, fetch: fetchImpl });
  const persistence = new OfflineReviewPersistence(remote, db);
  const store = new ReviewStore({ persistence, ownerId, timeZone: resolved.timeZone });
  return { store, persistence, db };
}
