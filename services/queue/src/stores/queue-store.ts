import type { PositionUpdate, WorkOrderRecord } from '../services/work-order.types.js';

export interface OpenOrderFilter {
  /** Case-insensitive substring over order number, customer, name and ship-to. */
  search?: string;
}

/**
 * Writes made inside one `QueueStore.transaction` call. Everything commits
 * together or not at all.
 */
export interface QueueTransaction {
  /** Open orders, locked for the rest of the transaction where the backend supports it. */
  listOpenOrders(): Promise<WorkOrderRecord[]>;
  findOpenOrders(workOrderNos: string[]): Promise<WorkOrderRecord[]>;
  setPositions(updates: PositionUpdate[]): Promise<void>;
  /** Null out every open order's position; returns how many had one. */
  clearOpenPositions(): Promise<number>;
}

export interface QueueStore {
  listOpenOrders(filter?: OpenOrderFilter): Promise<WorkOrderRecord[]>;
  /** Runs `fn`; a rejection rolls back every write made through `tx`. */
  transaction<T>(fn: (tx: QueueTransaction) => Promise<T>): Promise<T>;
}

const SEARCH_FIELDS = ['workOrderNo', 'custId', 'woName', 'shipTo'] as const;

export function matchesSearch(order: WorkOrderRecord, search: string | undefined): boolean {
  const term = search?.trim().toLowerCase();
  if (!term) return true;
  return SEARCH_FIELDS.some((field) => order[field]?.toLowerCase().includes(term) ?? false);
}
