import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createCorrelatedLogger } from '@cleanq/observability';
import { InMemoryQueueStore } from '../stores/memory-queue-store.js';
import type { OpenOrderFilter, QueueStore, QueueTransaction } from '../stores/queue-store.js';
import { CleaningQueueEngine } from './queue-engine.service.js';
import type { WorkOrderRecord } from './work-order.types.js';

const logger = createCorrelatedLogger({ service: 'queue-test', environment: 'test' });

function order(workOrderNo: string, overrides: Partial<WorkOrderRecord> = {}): WorkOrderRecord {
  return {
    workOrderNo,
    custId: null,
    woName: null,
    shipTo: null,
    firmRush: false,
    rush: false,
    dateIn: '2024-01-01',
    dateRequired: null,
    dateCompleted: null,
    position: null,
    ...overrides,
  };
}

function seedOrders(): WorkOrderRecord[] {
  return [
    order('WO1', { dateIn: '2024-01-01' }),
    order('WO2', { firmRush: true, dateRequired: '2024-01-05', dateIn: '2024-01-02' }),
    order('WO3', { rush: true, dateIn: '2024-01-03' }),
  ];
}

/** Lets the write land, then fails, so the store has to roll it back. */
class FailingWriteStore implements QueueStore {
  constructor(private readonly inner: InMemoryQueueStore) {}

  listOpenOrders(filter?: OpenOrderFilter): Promise<WorkOrderRecord[]> {
    return this.inner.listOpenOrders(filter);
  }

  transaction<T>(fn: (tx: QueueTransaction) => Promise<T>): Promise<T> {
    return this.inner.transaction((tx) =>
      fn({
        ...tx,
        setPositions: async (updates) => {
          await tx.setPositions(updates);
          throw new Error('connection lost');
        },
      })
    );
  }
}

let store: InMemoryQueueStore;
let engine: CleaningQueueEngine;

beforeEach(() => {
  store = new InMemoryQueueStore(seedOrders());
  engine = new CleaningQueueEngine(store, logger);
});

// ─── initializeUnassigned ────────────────────────────────────────────
describe('CleaningQueueEngine.initializeUnassigned', () => {
  it('ranks unpositioned orders by tier', async () => {
    const result = await engine.initializeUnassigned();

    expect(result).toEqual({
      success: true,
      message: 'Assigned queue positions to 3 work order(s)',
      newlyRanked: 3,
      inserted: { firm_rush: 1, rush: 1, regular: 1 },
    });
    expect(store.positions()).toEqual({ WO1: 3, WO2: 1, WO3: 2 });
  });

  it('is a no-op when every open order is ranked', async () => {
    await engine.initializeUnassigned();
    const result = await engine.initializeUnassigned();

    expect(result.success).toBe(true);
    expect(result.message).toBe('All open work orders already have queue positions');
    expect(result.newlyRanked).toBe(0);
    expect(store.positions()).toEqual({ WO1: 3, WO2: 1, WO3: 2 });
  });

  it('leaves completed orders alone', async () => {
    store.upsert(order('WO9', { dateCompleted: '2024-01-10', position: null }));
    await engine.initializeUnassigned();
    expect(store.get('WO9')?.position).toBeNull();
  });

  it('rolls back and reports a storage error when a write fails', async () => {
    const failing = new CleaningQueueEngine(new FailingWriteStore(store), logger);
    const result = await failing.initializeUnassigned();

    expect(result).toEqual({
      success: false,
      errorType: 'storage',
      message: 'Failed to initialize queue positions: connection lost',
      newlyRanked: 0,
      inserted: { firm_rush: 0, rush: 0, regular: 0 },
    });
    expect(store.positions()).toEqual({ WO1: null, WO2: null, WO3: null });
  });

  it('logs unparseable dates as warnings', async () => {
    const warn = vi.spyOn(logger, 'warn');
    store.upsert(order('WO4', { dateIn: 'someday' }));

    await engine.initializeUnassigned();

    expect(warn).toHaveBeenCalledWith(
      { workOrderNo: 'WO4', field: 'dateIn', raw: 'someday' },
      'unparseable work order date; sorting it last in its tier'
    );
  });
});

// ─── reorder ─────────────────────────────────────────────────────────
describe('CleaningQueueEngine.reorder', () => {
  beforeEach(async () => {
    await engine.initializeUnassigned();
  });

  it('applies known ids and reports unknown ones', async () => {
    const result = await engine.reorder(['WO1', 'WO999'], 1, 25);

    expect(result).toEqual({
      success: true,
      message: 'Queue order updated; 1 work order(s) not found: WO999',
      updatedCount: 1,
      failedIds: ['WO999'],
    });
    expect(store.get('WO1')?.position).toBe(1);
  });

  it('assigns page-relative positions', async () => {
    const result = await engine.reorder(['WO3', 'WO1', 'WO2'], 2, 3);

    expect(result.message).toBe('Queue order updated successfully');
    expect(result.updatedCount).toBe(3);
    expect(store.positions()).toEqual({ WO3: 4, WO1: 5, WO2: 6 });
  });

  it('rejects an empty list', async () => {
    expect(await engine.reorder([], 1, 25)).toEqual({
      success: false,
      errorType: 'validation',
      message: 'No work orders provided',
      updatedCount: 0,
      failedIds: [],
    });
  });

  it('rejects non-positive page and perPage values', async () => {
    expect((await engine.reorder(['WO1'], 0, 25)).message).toBe('page must be a positive integer');
    expect((await engine.reorder(['WO1'], 1, 0)).message).toBe('perPage must be a positive integer');
  });

  it('fails validation when nothing matches an open order', async () => {
    store.upsert(order('WO8', { dateCompleted: '2024-02-01', position: 8 }));
    const result = await engine.reorder(['WO8', 'NOPE'], 1, 25);

    expect(result).toEqual({
      success: false,
      errorType: 'validation',
      message: 'None of the provided work orders are in the queue',
      updatedCount: 0,
      failedIds: ['WO8', 'NOPE'],
    });
    expect(store.get('WO8')?.position).toBe(8);
  });

  it('allows cross-tier moves but logs them', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const result = await engine.reorder(['WO1', 'WO2'], 1, 25);

    expect(result.success).toBe(true);
    expect(store.positions()).toEqual({ WO1: 1, WO2: 2, WO3: 2 });
    expect(warn).toHaveBeenCalledWith(
      {
        tierInversions: [{ workOrderNo: 'WO2', tier: 'firm_rush', after: 'regular' }],
        page: 1,
        perPage: 25,
      },
      'manual reorder places orders ahead of a higher priority tier'
    );
  });

  it('rolls back a failed write', async () => {
    const failing = new CleaningQueueEngine(new FailingWriteStore(store), logger);
    const result = await failing.reorder(['WO1', 'WO2', 'WO3'], 1, 25);

    expect(result.success).toBe(false);
    expect(result.errorType).toBe('storage');
    expect(result.message).toBe('Error updating queue: connection lost');
    expect(store.positions()).toEqual({ WO1: 3, WO2: 1, WO3: 2 });
  });
});

// ─── reset ───────────────────────────────────────────────────────────
describe('CleaningQueueEngine.reset', () => {
  beforeEach(async () => {
    await engine.initializeUnassigned();
  });

  it('skips when positions already follow priority order', async () => {
    expect(await engine.reset()).toEqual({
      success: true,
      message: 'Queue already matches priority order; nothing reset',
      cleared: 0,
      reinitialized: 0,
      skipped: true,
    });
  });

  it('discards manual ordering', async () => {
    await engine.reorder(['WO1', 'WO2', 'WO3'], 1, 25);
    const result = await engine.reset();

    expect(result).toEqual({
      success: true,
      message: 'Cleared 3 and re-initialized 3 queue position(s)',
      cleared: 3,
      reinitialized: 3,
      skipped: false,
    });
    expect(store.positions()).toEqual({ WO1: 3, WO2: 1, WO3: 2 });
  });

  it('recomputes when forced even if already in order', async () => {
    const result = await engine.reset(true);
    expect(result.skipped).toBe(false);
    expect(result.cleared).toBe(3);
    expect(result.reinitialized).toBe(3);
    expect(store.positions()).toEqual({ WO1: 3, WO2: 1, WO3: 2 });
  });

  it('does not touch completed orders', async () => {
    store.upsert(order('WO7', { dateCompleted: '2024-01-09', position: 7 }));
    await engine.reset(true);
    expect(store.get('WO7')?.position).toBe(7);
  });

  it('restores every position when the rewrite fails', async () => {
    await engine.reorder(['WO1', 'WO2', 'WO3'], 1, 25);
    const failing = new CleaningQueueEngine(new FailingWriteStore(store), logger);
    const result = await failing.reset(true);

    expect(result).toEqual({
      success: false,
      errorType: 'storage',
      message: 'Failed to reset queue positions: connection lost',
      cleared: 0,
      reinitialized: 0,
      skipped: false,
    });
    expect(store.positions()).toEqual({ WO1: 1, WO2: 2, WO3: 3 });
  });
});
