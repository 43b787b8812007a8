import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { authMiddleware } from '@cleanq/auth-utils';
import {
  correlationMiddleware,
  requestLoggingMiddleware,
  type Logger,
} from '@cleanq/observability';
import { createCleaningQueueRouter } from './routes/cleaning-queue.routes.js';
import { createErrorHandler } from './middleware/error-handler.js';
import { CleaningQueueEngine } from './services/queue-engine.service.js';
import { CleaningQueueView, type QueueViewOptions } from './services/queue-view.service.js';
import type { QueueStore } from './stores/queue-store.js';

export const SERVICE_NAME = 'queue';

export interface CreateAppOptions {
  store: QueueStore;
  logger: Logger;
  view: QueueViewOptions;
  corsOrigin: string;
}

export function createApp(opts: CreateAppOptions): express.Express {
  const engine = new CleaningQueueEngine(opts.store, opts.logger);
  const view = new CleaningQueueView(opts.store, engine, opts.view, opts.logger);

  const app = express();

  app.use(helmet());
  app.use(cors({ origin: opts.corsOrigin, credentials: true }));
  app.use(correlationMiddleware(SERVICE_NAME));
  app.use(requestLoggingMiddleware(opts.logger));
  app.use(express.json({ limit: '1mb' }));

  // Health
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', service: SERVICE_NAME, timestamp: new Date().toISOString() });
  });

  app.use(authMiddleware);
  app.use(
    '/cleaning-queue',
    createCleaningQueueRouter({
      engine,
      view,
      defaultPerPage: opts.view.defaultPerPage,
      maxPerPage: opts.view.maxPerPage,
    })
  );

  app.use(createErrorHandler(opts.logger));

  return app;
}
