/**
 * Cleaning Queue Ranking
 *
 * Pure functions that classify work orders into priority tiers, derive their
 * within-tier sort keys, and plan position assignments. Nothing here touches
 * storage: the engine takes a snapshot, asks for a plan, and commits it.
 *
 * Tiers, highest first:
 *  1. Firm rush: by date required, then date in, then order number.
 *  2. Rush: by date in, then order number.
 *  3. Regular: by date in, then order number.
 *
 * Missing or unparseable dates sort last within their tier.
 */

import { parseQueueDate } from './queue-dates.js';
import type { PositionUpdate, QueueTier, WorkOrderRecord } from './work-order.types.js';

// ─── Tiers ───────────────────────────────────────────────────────────

export const TIER_ORDER: readonly QueueTier[] = ['firm_rush', 'rush', 'regular'];

export const TIER_RANK: Record<QueueTier, number> = {
  firm_rush: 0,
  rush: 1,
  regular: 2,
};

export const TIER_DISPLAY: Record<QueueTier, { label: string; className: string }> = {
  firm_rush: { label: 'FIRM RUSH', className: 'priority-firm-rush' },
  rush: { label: 'RUSH', className: 'priority-rush' },
  regular: { label: 'REGULAR', className: 'priority-regular' },
};

export function classifyTier(order: Pick<WorkOrderRecord, 'firmRush' | 'rush'>): QueueTier {
  if (order.firmRush) return 'firm_rush';
  if (order.rush) return 'rush';
  return 'regular';
}

// ─── Sort Keys ───────────────────────────────────────────────────────

/** Stands in for a missing or unparseable date: later than every real one. */
export const SENTINEL_TIME = Number.POSITIVE_INFINITY;

export interface SortKey {
  times: number[];
  workOrderNo: string;
}

export interface DateIssue {
  workOrderNo: string;
  field: 'dateIn' | 'dateRequired';
  raw: string;
}

export interface RankedEntry {
  order: WorkOrderRecord;
  tier: QueueTier;
  sortKey: SortKey;
}

const orderNumberCollator = new Intl.Collator('en', { numeric: true, sensitivity: 'variant' });

/** Numeric-aware: `WO2` before `WO10`, `999` before `1000`. */
export function compareOrderNumbers(a: string, b: string): number {
  const byCollator = orderNumberCollator.compare(a, b);
  if (byCollator !== 0) return byCollator;
  // Collator ties (e.g. "01" vs "1") still need a total order.
  return a < b ? -1 : a > b ? 1 : 0;
}

function dateTime(
  order: WorkOrderRecord,
  field: DateIssue['field'],
  issues: DateIssue[] | undefined
): number {
  const parsed = parseQueueDate(order[field]);
  if (parsed.status === 'ok') return parsed.date.getTime();
  if (parsed.status === 'invalid') {
    issues?.push({ workOrderNo: order.workOrderNo, field, raw: parsed.raw });
  }
  return SENTINEL_TIME;
}

export function buildSortKey(
  order: WorkOrderRecord,
  tier: QueueTier = classifyTier(order),
  issues?: DateIssue[]
): SortKey {
  const dateIn = dateTime(order, 'dateIn', issues);
  const times =
    tier === 'firm_rush' ? [dateTime(order, 'dateRequired', issues), dateIn] : [dateIn];
  return { times, workOrderNo: order.workOrderNo };
}

export function compareSortKeys(a: SortKey, b: SortKey): number {
  const length = Math.min(a.times.length, b.times.length);
  for (let i = 0; i < length; i += 1) {
    const left = a.times[i] ?? SENTINEL_TIME;
    const right = b.times[i] ?? SENTINEL_TIME;
    // Infinity - Infinity is NaN, so compare explicitly.
    if (left < right) return -1;
    if (left > right) return 1;
  }
  return compareOrderNumbers(a.workOrderNo, b.workOrderNo);
}

export function toRankedEntry(order: WorkOrderRecord, issues?: DateIssue[]): RankedEntry {
  const tier = classifyTier(order);
  return { order, tier, sortKey: buildSortKey(order, tier, issues) };
}

/** Policy order: tier first, then the tier's sort key. */
export function compareEntries(a: RankedEntry, b: RankedEntry): number {
  const byTier = TIER_RANK[a.tier] - TIER_RANK[b.tier];
  if (byTier !== 0) return byTier;
  return compareSortKeys(a.sortKey, b.sortKey);
}

/** Display order: committed position (unranked last), policy order on ties. */
export function compareByPosition(a: RankedEntry, b: RankedEntry): number {
  const left = a.order.position;
  const right = b.order.position;
  if (left !== null && right !== null && left !== right) return left - right;
  if (left === null && right !== null) return 1;
  if (left !== null && right === null) return -1;
  return compareEntries(a, b);
}

export function groupByTier(entries: RankedEntry[]): Record<QueueTier, RankedEntry[]> {
  const groups: Record<QueueTier, RankedEntry[]> = { firm_rush: [], rush: [], regular: [] };
  for (const entry of entries) groups[entry.tier].push(entry);
  return groups;
}

// ─── Insertion Plan ──────────────────────────────────────────────────

export interface InitializationPlan {
  /** Only orders whose position actually changes, in new-position order. */
  updates: PositionUpdate[];
  newlyRanked: number;
  inserted: Record<QueueTier, number>;
  dateIssues: DateIssue[];
}

function extremes(positions: Map<string, number>): { min: number; max: number } | null {
  if (positions.size === 0) return null;
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const value of positions.values()) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return { min, max };
}

/**
 * Plan positions for every unranked open order while keeping the relative
 * order of everything already ranked.
 *
 * - New firm-rush orders take 1..k; all ranked orders move down by k.
 * - New rush orders go right after the last firm-rush position; orders
 *   behind that boundary move down to make room.
 * - New regular orders are appended after the current maximum.
 */
export function planInitialization(orders: WorkOrderRecord[]): InitializationPlan {
  const dateIssues: DateIssue[] = [];
  const entries = orders.map((order) => toRankedEntry(order, dateIssues));

  const planned = new Map<string, number>();
  const unranked: Record<QueueTier, RankedEntry[]> = { firm_rush: [], rush: [], regular: [] };
  for (const entry of entries) {
    if (entry.order.position === null) {
      unranked[entry.tier].push(entry);
    } else {
      planned.set(entry.order.workOrderNo, entry.order.position);
    }
  }
  for (const tier of TIER_ORDER) {
    unranked[tier].sort((a, b) => compareSortKeys(a.sortKey, b.sortKey));
  }

  // Firm rush: front of the queue.
  const newFirm = unranked.firm_rush;
  if (newFirm.length > 0) {
    const range = extremes(planned);
    if (range) {
      // Legacy rows may start at 0 or below; keep them all behind the new block.
      const shift = newFirm.length + Math.max(0, 1 - range.min);
      for (const [workOrderNo, position] of planned) {
        planned.set(workOrderNo, position + shift);
      }
    }
    newFirm.forEach((entry, index) => planned.set(entry.order.workOrderNo, index + 1));
  }

  // Rush: right after the last firm-rush position.
  const newRush = unranked.rush;
  if (newRush.length > 0) {
    let boundary: number | null = null;
    for (const entry of entries) {
      if (entry.tier !== 'firm_rush') continue;
      const position = planned.get(entry.order.workOrderNo);
      if (position !== undefined && (boundary === null || position > boundary)) {
        boundary = position;
      }
    }
    if (boundary === null) {
      const range = extremes(planned);
      boundary = range ? Math.min(0, range.min - 1) : 0;
    }

    for (const [workOrderNo, position] of planned) {
      if (position > boundary) planned.set(workOrderNo, position + newRush.length);
    }
    const start = boundary + 1;
    newRush.forEach((entry, index) => planned.set(entry.order.workOrderNo, start + index));
  }

  // Regular: append.
  const newRegular = unranked.regular;
  if (newRegular.length > 0) {
    const range = extremes(planned);
    const start = (range ? range.max : 0) + 1;
    newRegular.forEach((entry, index) => planned.set(entry.order.workOrderNo, start + index));
  }

  const updates: PositionUpdate[] = [];
  for (const entry of entries) {
    const position = planned.get(entry.order.workOrderNo);
    if (position !== undefined && position !== entry.order.position) {
      updates.push({ workOrderNo: entry.order.workOrderNo, position });
    }
  }
  updates.sort((a, b) => a.position - b.position);

  return {
    updates,
    newlyRanked: newFirm.length + newRush.length + newRegular.length,
    inserted: {
      firm_rush: newFirm.length,
      rush: newRush.length,
      regular: newRegular.length,
    },
    dateIssues,
  };
}

/** Positions 1..n in pure policy order, ignoring any committed positions. */
export function planPolicyOrder(orders: WorkOrderRecord[]): PositionUpdate[] {
  return orders
    .map((order) => toRankedEntry(order))
    .sort(compareEntries)
    .map((entry, index) => ({ workOrderNo: entry.order.workOrderNo, position: index + 1 }));
}

/** True when every order already sits exactly where a full recompute would put it. */
export function isInPolicyOrder(orders: WorkOrderRecord[]): boolean {
  const current = new Map(orders.map((order) => [order.workOrderNo, order.position]));
  return planPolicyOrder(orders).every(
    (assignment) => current.get(assignment.workOrderNo) === assignment.position
  );
}

// ─── Manual Reorder Plan ─────────────────────────────────────────────

export interface ReorderPlan {
  updates: PositionUpdate[];
  failedIds: string[];
  /** Orders placed ahead of a higher-priority tier on the reordered page. */
  tierInversions: Array<{ workOrderNo: string; tier: QueueTier; after: QueueTier }>;
}

/**
 * Map a page's worth of order numbers to positions starting at
 * `(page - 1) * perPage + 1`. Each slot keeps its index in the list, so a
 * failed id leaves its slot unused rather than pulling later ids forward.
 */
export function planReorder(
  orderedIds: string[],
  page: number,
  perPage: number,
  found: ReadonlyMap<string, WorkOrderRecord>
): ReorderPlan {
  const start = (page - 1) * perPage + 1;
  const seen = new Set<string>();
  const updates: PositionUpdate[] = [];
  const failedIds: string[] = [];
  const tierInversions: ReorderPlan['tierInversions'] = [];
  let lowestTierSoFar: QueueTier | null = null;

  orderedIds.forEach((workOrderNo, index) => {
    const order = found.get(workOrderNo);
    if (seen.has(workOrderNo) || !order) {
      failedIds.push(workOrderNo);
      return;
    }
    seen.add(workOrderNo);
    updates.push({ workOrderNo, position: start + index });

    const tier = classifyTier(order);
    if (lowestTierSoFar !== null && TIER_RANK[tier] < TIER_RANK[lowestTierSoFar]) {
      tierInversions.push({ workOrderNo, tier, after: lowestTierSoFar });
    }
    if (lowestTierSoFar === null || TIER_RANK[tier] > TIER_RANK[lowestTierSoFar]) {
      lowestTierSoFar = tier;
    }
  });

  return { updates, failedIds, tierInversions };
}

// ─── Diagnostics ─────────────────────────────────────────────────────

export interface FifoViolation {
  tier: QueueTier;
  earlier: RankedEntry;
  later: RankedEntry;
}

/**
 * Adjacent orders (in position order) within the rush or regular tier whose
 * intake dates run backwards. Orders with a missing date are skipped.
 */
export function findFifoViolations(entries: RankedEntry[]): FifoViolation[] {
  const groups = groupByTier(entries);
  const violations: FifoViolation[] = [];

  for (const tier of ['rush', 'regular'] as const) {
    const ordered = [...groups[tier]].sort(compareByPosition);
    for (let i = 0; i + 1 < ordered.length; i += 1) {
      const earlier = ordered[i];
      const later = ordered[i + 1];
      if (!earlier || !later) continue;
      const earlierIn = earlier.sortKey.times[0] ?? SENTINEL_TIME;
      const laterIn = later.sortKey.times[0] ?? SENTINEL_TIME;
      if (earlierIn !== SENTINEL_TIME && laterIn !== SENTINEL_TIME && earlierIn > laterIn) {
        violations.push({ tier, earlier, later });
      }
    }
  }

  return violations;
}
