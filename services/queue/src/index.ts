import { config } from '@cleanq/config';
import { createCorrelatedLogger } from '@cleanq/observability';
import { createApp, SERVICE_NAME } from './app.js';
import { createQueueStore } from './stores/index.js';

const logger = createCorrelatedLogger({
  service: SERVICE_NAME,
  level: config.LOG_LEVEL,
  environment: config.NODE_ENV,
});

const { store, close } = createQueueStore(config);

const app = createApp({
  store,
  logger,
  corsOrigin: config.APP_URL,
  view: {
    defaultPerPage: config.QUEUE_DEFAULT_PER_PAGE,
    maxPerPage: config.QUEUE_MAX_PER_PAGE,
    previewSize: config.QUEUE_PREVIEW_SIZE,
    shipToFilter: {
      mode: config.QUEUE_SHIP_TO_FILTER_MODE,
      values: config.QUEUE_SHIP_TO_FILTER,
    },
  },
});

const PORT = config.QUEUE_SERVICE_PORT;
const server = app.listen(PORT, () => {
  logger.info({ port: PORT, store: config.QUEUE_STORE }, 'queue service listening');
});

function shutdown(signal: string): void {
  logger.info({ signal }, 'shutting down');
  server.close(() => {
    close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'failed to close database pool');
        process.exit(1);
      }
    );
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

export default app;
