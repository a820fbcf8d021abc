import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { streamSSE } from 'hono/streaming';
import {
  ReviewDocumentSchema,
  formatZodErrors,
  serializeReview,
  type ReviewRecord,
} from '@recall-scheduler/shared/scheduler';
import { createLogger, errorMessage } from '@recall-scheduler/shared/logger';
import * as queries from './db/queries';
import type { ReviewDatabase } from './db/queries';
import { ReviewHub } from './services/review-hub';

const log = createLogger('api');

export interface AppOptions {
  db: ReviewDatabase;
  hub?: ReviewHub;
  corsOrigin?: string;
  /** Interval between keepalive events on update streams */
  keepAliveMs?: number;
}

/**
 * Review API: per-learner review records with last-write-wins saves and a
 * server-sent event stream of accepted writes.
 */
export function createApp(options: AppOptions) {
  const { db } = options;
  const hub = options.hub ?? new ReviewHub();
  const keepAliveMs = options.keepAliveMs ?? 30000;

  const app = new Hono();

  app.use('*', logger((message, ...rest) => log.info(message, ...rest)));
  app.use('/api/*', cors({ origin: options.corsOrigin ?? '*' }));

  app.onError((err, c) => {
    log.error(`${c.req.method} ${c.req.path} failed:`, err);
    return c.json({ error: 'Internal server error' }, 500);
  });

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  // Health check
  app.get('/api/health', (c) => c.json({ status: 'ok' }));

  // ============ Reviews ============

  app.get('/api/reviews', (c) => {
    const ownerId = c.req.query('owner_id');
    if (!ownerId) {
      return c.json({ error: 'owner_id is required' }, 400);
    }

    const reviews = queries.getReviewsByOwner(db, ownerId);
    return c.json({ reviews: reviews.map(serializeReview) });
  });

  // Stream of accepted writes for one learner
  app.get('/api/reviews/stream', (c) => {
    const ownerId = c.req.query('owner_id');
    if (!ownerId) {
      return c.json({ error: 'owner_id is required' }, 400);
    }

    return streamSSE(c, async (stream) => {
      // Writes go out one at a time, in publish order
      let writes: Promise<void> = Promise.resolve();
      const send = (event: string, data: string) => {
        writes = writes
          .then(() => stream.writeSSE({ event, data }))
          .catch((err: unknown) => log.warn('Stream write failed:', errorMessage(err)));
      };

      const unsubscribe = hub.subscribe(ownerId, (record: ReviewRecord) => {
        send('review', JSON.stringify(serializeReview(record)));
      });
      const keepalive = setInterval(() => {
        send('keepalive', JSON.stringify({ timestamp: Date.now() }));
      }, keepAliveMs);

      const closed = new Promise<void>((resolve) => {
        stream.onAbort(() => {
          clearInterval(keepalive);
          unsubscribe();
          log.debug('Update stream closed for', ownerId);
          resolve();
        });
      });

      log.debug('Update stream opened for', ownerId);
      send('connected', JSON.stringify({ timestamp: Date.now() }));

      await closed;
      await writes;
    });
  });

  app.put('/api/reviews/:itemId', async (c) => {
    const itemId = c.req.param('itemId');
    const body: unknown = await c.req.json().catch(() => null);

    const parsed = ReviewDocumentSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: 'Invalid review', details: formatZodErrors(parsed.error) }, 400);
    }
    if (parsed.data.item_id !== itemId) {
      return c.json({ error: 'item_id does not match the path' }, 400);
    }

    const { stored, applied } = queries.upsertReview(db, parsed.data);
    if (applied) {
      hub.publish(stored);
    } else {
      log.debug(`Kept newer review for ${stored.owner_id}/${itemId}`);
    }

    return c.json(serializeReview(stored));
  });

  app.delete('/api/reviews/:itemId', (c) => {
    const ownerId = c.req.query('owner_id');
    if (!ownerId) {
      return c.json({ error: 'owner_id is required' }, 400);
    }

    const deleted = queries.deleteReview(db, ownerId, c.req.param('itemId'));
    return c.json({ deleted });
  });

  return app;
}

export type ReviewApp = ReturnType<typeof createApp>;
