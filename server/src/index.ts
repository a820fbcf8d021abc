import { serve } from '@hono/node-server';
import { createLogger, setLogLevel } from '@recall-scheduler/shared/logger';
import { createApp } from './app';
import { loadServerConfig } from './config';
import { openDatabase } from './db/queries';
import { ReviewHub } from './services/review-hub';

const log = createLogger('server');

const config = loadServerConfig(process.env);
setLogLevel(config.logLevel);

const db = openDatabase(config.databasePath);
const app = createApp({ db, hub: new ReviewHub(), corsOrigin: config.corsOrigin });

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  log.info(`Review API listening on http://localhost:${info.port}`);
});

function shutdown(signal: string) {
  log.info(`Received ${signal}, shutting down`);
  server.close(() => {
    db.close();
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
