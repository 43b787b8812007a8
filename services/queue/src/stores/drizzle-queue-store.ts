import { and, asc, eq, ilike, inArray, isNotNull, isNull, or, sql } from 'drizzle-orm';
import { schema, type Database, type DbExecutor, type DbTransaction } from '@cleanq/db';
import type { PositionUpdate, WorkOrderRecord } from '../services/work-order.types.js';
import type { OpenOrderFilter, QueueStore, QueueTransaction } from './queue-store.js';

const { workOrders } = schema;

const queueColumns = {
  workOrderNo: workOrders.workOrderNo,
  custId: workOrders.custId,
  woName: workOrders.woName,
  shipTo: workOrders.shipTo,
  rushOrder: workOrders.rushOrder,
  firmRush: workOrders.firmRush,
  dateIn: workOrders.dateIn,
  dateRequired: workOrders.dateRequired,
  dateCompleted: workOrders.dateCompleted,
  queuePosition: workOrders.queuePosition,
};

export interface QueueRow {
  workOrderNo: string;
  custId: string | null;
  woName: string | null;
  shipTo: string | null;
  rushOrder: boolean;
  firmRush: boolean;
  dateIn: string | null;
  dateRequired: string | null;
  dateCompleted: string | null;
  queuePosition: number | null;
}

export function toWorkOrderRecord(row: QueueRow): WorkOrderRecord {
  return {
    workOrderNo: row.workOrderNo,
    custId: row.custId,
    woName: row.woName,
    shipTo: row.shipTo,
    firmRush: row.firmRush,
    rush: row.rushOrder,
    dateIn: row.dateIn,
    dateRequired: row.dateRequired,
    dateCompleted: row.dateCompleted,
    position: row.queuePosition,
  };
}

/** Escape LIKE wildcards so a search for "50%" matches literally. */
export function escapeLikePattern(term: string): string {
  return term.replace(/[\\%_]/g, (char) => `\\${char}`);
}

// Legacy imports wrote '' instead of NULL for open orders.
const isOpen = or(isNull(workOrders.dateCompleted), eq(workOrders.dateCompleted, ''));

// ─── Query Builders ──────────────────────────────────────────────────

/** Open orders in number order, row-locked for the rest of the transaction. */
export function lockOpenOrdersQuery(db: DbExecutor) {
  return db
    .select(queueColumns)
    .from(workOrders)
    .where(isOpen)
    .orderBy(asc(workOrders.workOrderNo))
    .for('update');
}

export function lockOpenOrdersByNumberQuery(db: DbExecutor, workOrderNos: string[]) {
  return db
    .select(queueColumns)
    .from(workOrders)
    .where(and(isOpen, inArray(workOrders.workOrderNo, workOrderNos)))
    .for('update');
}

/** Open orders by position (unranked last), optionally narrowed by a search term. */
export function searchOpenOrdersQuery(db: DbExecutor, search?: string) {
  const term = search?.trim();
  const pattern = term ? `%${escapeLikePattern(term)}%` : undefined;
  const searchCondition = pattern
    ? or(
        ilike(workOrders.workOrderNo, pattern),
        ilike(workOrders.custId, pattern),
        ilike(workOrders.woName, pattern),
        ilike(workOrders.shipTo, pattern)
      )
    : undefined;

  return db
    .select(queueColumns)
    .from(workOrders)
    .where(and(isOpen, searchCondition))
    .orderBy(sql`${workOrders.queuePosition} asc nulls last`, asc(workOrders.workOrderNo));
}

export function setPositionQuery(db: DbExecutor, update: PositionUpdate, now: Date) {
  return db
    .update(workOrders)
    .set({ queuePosition: update.position, updatedAt: now })
    .where(eq(workOrders.workOrderNo, update.workOrderNo));
}

export function clearOpenPositionsQuery(db: DbExecutor, now: Date) {
  return db
    .update(workOrders)
    .set({ queuePosition: null, updatedAt: now })
    .where(and(isOpen, isNotNull(workOrders.queuePosition)))
    .returning({ workOrderNo: workOrders.workOrderNo });
}

// ─── Store ───────────────────────────────────────────────────────────

class DrizzleQueueTransaction implements QueueTransaction {
  constructor(private readonly tx: DbTransaction) {}

  async listOpenOrders(): Promise<WorkOrderRecord[]> {
    const rows = await lockOpenOrdersQuery(this.tx);
    return rows.map(toWorkOrderRecord);
  }

  async findOpenOrders(workOrderNos: string[]): Promise<WorkOrderRecord[]> {
    if (workOrderNos.length === 0) return [];
    const rows = await lockOpenOrdersByNumberQuery(this.tx, workOrderNos);
    return rows.map(toWorkOrderRecord);
  }

  async setPositions(updates: PositionUpdate[]): Promise<void> {
    const now = new Date();
    for (const update of updates) {
      await setPositionQuery(this.tx, update, now);
    }
  }

  async clearOpenPositions(): Promise<number> {
    const cleared = await clearOpenPositionsQuery(this.tx, new Date());
    return cleared.length;
  }
}

export class DrizzleQueueStore implements QueueStore {
  constructor(private readonly db: Database) {}

  async listOpenOrders(filter?: OpenOrderFilter): Promise<WorkOrderRecord[]> {
    const rows = await searchOpenOrdersQuery(this.db, filter?.search);
    return rows.map(toWorkOrderRecord);
  }

  transaction<T>(fn: (tx: QueueTransaction) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => fn(new DrizzleQueueTransaction(tx)));
  }
}
