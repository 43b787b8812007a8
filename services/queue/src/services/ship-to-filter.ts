import type { WorkOrderRecord } from './work-order.types.js';

export interface ShipToFilter {
  /** deny: hide listed ship-to names. allow: show only listed ones. */
  mode: 'deny' | 'allow';
  values: string[];
}

function normalize(value: string | null): string {
  return (value ?? '').trim().toLowerCase();
}

/**
 * Apply the configured ship-to group. An empty list, or `showExcludedGroup`,
 * leaves the orders untouched.
 */
export function applyShipToFilter(
  orders: WorkOrderRecord[],
  filter: ShipToFilter,
  showExcludedGroup: boolean
): WorkOrderRecord[] {
  if (showExcludedGroup || filter.values.length === 0) return orders;

  const listed = new Set(filter.values.map(normalize));
  return orders.filter((order) => {
    const inList = listed.has(normalize(order.shipTo));
    return filter.mode === 'deny' ? !inList : inList;
  });
}
