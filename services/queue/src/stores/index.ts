import { createDatabase } from '@cleanq/db';
import type { AppConfig } from '@cleanq/config';
import { DrizzleQueueStore } from './drizzle-queue-store.js';
import { InMemoryQueueStore } from './memory-queue-store.js';
import type { QueueStore } from './queue-store.js';

export { DrizzleQueueStore, toWorkOrderRecord, escapeLikePattern } from './drizzle-queue-store.js';
export { InMemoryQueueStore } from './memory-queue-store.js';
export { matchesSearch } from './queue-store.js';
export type { QueueStore, QueueTransaction, OpenOrderFilter } from './queue-store.js';

export interface QueueStoreHandle {
  store: QueueStore;
  close: () => Promise<void>;
}

/**
 * Build the store named by `QUEUE_STORE`.
 */
export function createQueueStore(
  config: Pick<AppConfig, 'QUEUE_STORE' | 'DATABASE_URL'>
): QueueStoreHandle {
  switch (config.QUEUE_STORE) {
    case 'postgres': {
      if (!config.DATABASE_URL) {
        throw new Error('DATABASE_URL is required when QUEUE_STORE is "postgres"');
      }
      const { db, close } = createDatabase({ connectionString: config.DATABASE_URL });
      return { store: new DrizzleQueueStore(db), close };
    }

    case 'memory':
      return { store: new InMemoryQueueStore(), close: async () => undefined };
  }
}
