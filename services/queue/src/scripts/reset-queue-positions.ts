/**
 * Reset cleaning queue positions from the priority policy.
 *
 * Usage:
 *   tsx src/scripts/reset-queue-positions.ts            # reset if positions drifted
 *   tsx src/scripts/reset-queue-positions.ts --force    # always clear and recompute
 *   tsx src/scripts/reset-queue-positions.ts --preview  # show current state only
 */

import { config } from '@cleanq/config';
import { createCorrelatedLogger, runWithCorrelation } from '@cleanq/observability';
import { CleaningQueueEngine } from '../services/queue-engine.service.js';
import { CleaningQueueView } from '../services/queue-view.service.js';
import { createQueueStore } from '../stores/index.js';
import { runResetCommand } from './reset-command.js';

const SERVICE = 'queue-reset';

async function main(argv: string[]): Promise<boolean> {
  const logger = createCorrelatedLogger({
    service: SERVICE,
    level: config.LOG_LEVEL,
    environment: config.NODE_ENV,
  });
  const { store, close } = createQueueStore(config);
  const engine = new CleaningQueueEngine(store, logger);
  const view = new CleaningQueueView(
    store,
    engine,
    {
      defaultPerPage: config.QUEUE_DEFAULT_PER_PAGE,
      maxPerPage: config.QUEUE_MAX_PER_PAGE,
      previewSize: 0,
      // Maintenance covers every open order.
      shipToFilter: { mode: 'deny', values: [] },
    },
    logger
  );

  try {
    return await runResetCommand(argv, { engine, view });
  } finally {
    await close();
  }
}

runWithCorrelation(SERVICE, () => main(process.argv.slice(2))).then(
  (success) => process.exit(success ? 0 : 1),
  (err: unknown) => {
    console.error('Queue reset failed:', err);
    process.exit(1);
  }
);
