/**
 * In-memory QueueStore
 *
 * Holds work orders in a Map. Transactions run one at a time against a
 * working copy that replaces the map only when the callback resolves, so
 * reads outside a transaction see committed rows. Used by the test suite
 * and by `QUEUE_STORE=memory` for local development without Postgres.
 */

import { isOpenOrder } from '../services/queue-dates.js';
import type { PositionUpdate, WorkOrderRecord } from '../services/work-order.types.js';
import {
  matchesSearch,
  type OpenOrderFilter,
  type QueueStore,
  type QueueTransaction,
} from './queue-store.js';

function copy(order: WorkOrderRecord): WorkOrderRecord {
  return {
    ...order,
    dateIn: order.dateIn instanceof Date ? new Date(order.dateIn) : order.dateIn,
    dateRequired: order.dateRequired instanceof Date ? new Date(order.dateRequired) : order.dateRequired,
    dateCompleted:
      order.dateCompleted instanceof Date ? new Date(order.dateCompleted) : order.dateCompleted,
  };
}

export class InMemoryQueueStore implements QueueStore {
  private orders = new Map<string, WorkOrderRecord>();
  private tail: Promise<void> = Promise.resolve();

  constructor(seed: WorkOrderRecord[] = []) {
    for (const order of seed) this.upsert(order);
  }

  upsert(order: WorkOrderRecord): void {
    this.orders.set(order.workOrderNo, copy(order));
  }

  get(workOrderNo: string): WorkOrderRecord | undefined {
    const order = this.orders.get(workOrderNo);
    return order ? copy(order) : undefined;
  }

  all(): WorkOrderRecord[] {
    return [...this.orders.values()].map(copy);
  }

  /** Current position per order number, for assertions and debugging. */
  positions(): Record<string, number | null> {
    const result: Record<string, number | null> = {};
    for (const order of this.orders.values()) result[order.workOrderNo] = order.position;
    return result;
  }

  async listOpenOrders(filter?: OpenOrderFilter): Promise<WorkOrderRecord[]> {
    return this.openOrders().filter((order) => matchesSearch(order, filter?.search));
  }

  transaction<T>(fn: (tx: QueueTransaction) => Promise<T>): Promise<T> {
    const run = this.tail.then(() => this.runTransaction(fn));
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private openOrders(source: Map<string, WorkOrderRecord> = this.orders): WorkOrderRecord[] {
    return [...source.values()].filter(isOpenOrder).map(copy);
  }

  private async runTransaction<T>(fn: (tx: QueueTransaction) => Promise<T>): Promise<T> {
    const working = new Map([...this.orders].map(([key, order]) => [key, copy(order)]));

    const tx: QueueTransaction = {
      listOpenOrders: async () => this.openOrders(working),
      findOpenOrders: async (workOrderNos) => {
        const wanted = new Set(workOrderNos);
        return this.openOrders(working).filter((order) => wanted.has(order.workOrderNo));
      },
      setPositions: async (updates: PositionUpdate[]) => {
        for (const update of updates) {
          const order = working.get(update.workOrderNo);
          if (!order) throw new Error(`Work order ${update.workOrderNo} not found`);
          order.position = update.position;
        }
      },
      clearOpenPositions: async () => {
        let cleared = 0;
        for (const order of working.values()) {
          if (isOpenOrder(order) && order.position !== null) {
            order.position = null;
            cleared += 1;
          }
        }
        return cleared;
      },
    };

    const result = await fn(tx);
    this.orders = working;
    return result;
  }
}
