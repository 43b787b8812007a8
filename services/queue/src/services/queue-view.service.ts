/**
 * Cleaning Queue Views
 *
 * Read-side queries: the paginated queue listing, the dashboard summary and
 * the maintenance preview. Listing and summary first rank any orders that
 * are still unpositioned, so every view renders a complete order.
 */

import type { Logger } from '@cleanq/observability';
import type { QueueStore } from '../stores/queue-store.js';
import { formatQueueDate } from './queue-dates.js';
import type { CleaningQueueEngine } from './queue-engine.service.js';
import {
  TIER_DISPLAY,
  TIER_ORDER,
  compareByPosition,
  findFifoViolations,
  groupByTier,
  toRankedEntry,
  type RankedEntry,
} from './queue-ranking.service.js';
import { applyShipToFilter, type ShipToFilter } from './ship-to-filter.js';
import type { QueueTier } from './work-order.types.js';

// ─── Types ───────────────────────────────────────────────────────────

export interface QueueViewOptions {
  defaultPerPage: number;
  maxPerPage: number;
  previewSize: number;
  shipToFilter: ShipToFilter;
}

export interface QueueListItem {
  workOrderNo: string;
  custId: string | null;
  woName: string | null;
  shipTo: string | null;
  tier: QueueTier;
  priorityLabel: string;
  priorityClass: string;
  position: number | null;
  dateIn: string | null;
  dateRequired: string | null;
}

export type TierCounts = Record<QueueTier, number> & { total: number };

export interface Pagination {
  page: number;
  perPage: number;
  total: number;
  totalPages: number;
  hasPrev: boolean;
  hasNext: boolean;
  prevPage: number | null;
  nextPage: number | null;
}

export interface QueueListing {
  items: QueueListItem[];
  pagination: Pagination;
  counts: TierCounts;
  search: string;
}

export interface ListQueueParams {
  search?: string;
  page?: number;
  perPage?: number;
  showExcludedGroup?: boolean;
}

export interface QueueSummary {
  counts: TierCounts;
  nextOrders: QueueListItem[];
}

export interface QueuePreview {
  tiers: Record<QueueTier, QueueListItem[]>;
  unranked: number;
  fifoViolations: Array<{ tier: QueueTier; earlier: QueueListItem; later: QueueListItem }>;
}

// ─── Helpers ─────────────────────────────────────────────────────────

export function toListItem(entry: RankedEntry): QueueListItem {
  const { order, tier } = entry;
  return {
    workOrderNo: order.workOrderNo,
    custId: order.custId,
    woName: order.woName,
    shipTo: order.shipTo,
    tier,
    priorityLabel: TIER_DISPLAY[tier].label,
    priorityClass: TIER_DISPLAY[tier].className,
    position: order.position,
    dateIn: formatQueueDate(order.dateIn),
    dateRequired: formatQueueDate(order.dateRequired),
  };
}

export function countByTier(entries: RankedEntry[]): TierCounts {
  const counts: TierCounts = { firm_rush: 0, rush: 0, regular: 0, total: entries.length };
  for (const entry of entries) counts[entry.tier] += 1;
  return counts;
}

export function paginate(total: number, page: number, perPage: number): Pagination {
  const totalPages = Math.ceil(total / perPage);
  const hasPrev = page > 1;
  const hasNext = page < totalPages;
  return {
    page,
    perPage,
    total,
    totalPages,
    hasPrev,
    hasNext,
    prevPage: hasPrev ? page - 1 : null,
    nextPage: hasNext ? page + 1 : null,
  };
}

// ─── View ────────────────────────────────────────────────────────────

export class CleaningQueueView {
  constructor(
    private readonly store: QueueStore,
    private readonly engine: CleaningQueueEngine,
    private readonly options: QueueViewOptions,
    private readonly logger: Logger
  ) {}

  async listQueue(params: ListQueueParams = {}): Promise<QueueListing> {
    await this.ensureRanked();

    const search = params.search?.trim() ?? '';
    const page = Math.max(1, Math.floor(params.page ?? 1));
    const perPage = Math.min(
      this.options.maxPerPage,
      Math.max(1, Math.floor(params.perPage ?? this.options.defaultPerPage))
    );

    const orders = applyShipToFilter(
      await this.store.listOpenOrders({ search }),
      this.options.shipToFilter,
      params.showExcludedGroup ?? false
    );
    const entries = orders.map((order) => toRankedEntry(order)).sort(compareByPosition);

    const start = (page - 1) * perPage;
    return {
      items: entries.slice(start, start + perPage).map(toListItem),
      pagination: paginate(entries.length, page, perPage),
      counts: countByTier(entries),
      search,
    };
  }

  /**
   * Per-tier counts plus the next `limit` orders, filled tier by tier in
   * priority order.
   */
  async getSummary(params: { limit?: number; showExcludedGroup?: boolean } = {}): Promise<QueueSummary> {
    await this.ensureRanked();

    const limit = Math.max(0, Math.floor(params.limit ?? this.options.previewSize));
    const orders = applyShipToFilter(
      await this.store.listOpenOrders(),
      this.options.shipToFilter,
      params.showExcludedGroup ?? false
    );
    const entries = orders.map((order) => toRankedEntry(order));
    const groups = groupByTier(entries);

    const nextOrders: QueueListItem[] = [];
    for (const tier of TIER_ORDER) {
      const remaining = limit - nextOrders.length;
      if (remaining <= 0) break;
      const ordered = [...groups[tier]].sort(compareByPosition);
      nextOrders.push(...ordered.slice(0, remaining).map(toListItem));
    }

    return { counts: countByTier(entries), nextOrders };
  }

  /** Current state grouped by tier, with FIFO violations. Changes nothing. */
  async previewQueue(): Promise<QueuePreview> {
    const entries = (await this.store.listOpenOrders()).map((order) => toRankedEntry(order));
    const groups = groupByTier(entries);

    const tiers: Record<QueueTier, QueueListItem[]> = { firm_rush: [], rush: [], regular: [] };
    for (const tier of TIER_ORDER) {
      tiers[tier] = [...groups[tier]].sort(compareByPosition).map(toListItem);
    }

    return {
      tiers,
      unranked: entries.filter((entry) => entry.order.position === null).length,
      fifoViolations: findFifoViolations(entries).map((violation) => ({
        tier: violation.tier,
        earlier: toListItem(violation.earlier),
        later: toListItem(violation.later),
      })),
    };
  }

  private async ensureRanked(): Promise<void> {
    const open = await this.store.listOpenOrders();
    if (!open.some((order) => order.position === null)) return;

    const result = await this.engine.initializeUnassigned();
    if (!result.success) {
      // Still render: unranked orders sort last.
      this.logger.warn({ message: result.message }, 'could not rank new work orders before listing');
    }
  }
}
