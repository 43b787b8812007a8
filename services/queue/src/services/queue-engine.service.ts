/**
 * Cleaning Queue Engine
 *
 * Sole writer of work order queue positions. Every operation runs as one
 * store transaction and reports a structured result instead of throwing;
 * a storage failure rolls the whole call back.
 */

import type { Logger } from '@cleanq/observability';
import type { QueueStore } from '../stores/queue-store.js';
import {
  isInPolicyOrder,
  planInitialization,
  planReorder,
  type DateIssue,
} from './queue-ranking.service.js';
import type { QueueOperationResult, QueueTier } from './work-order.types.js';

// ─── Result Types ────────────────────────────────────────────────────

export interface InitializeResult extends QueueOperationResult {
  newlyRanked: number;
  inserted: Record<QueueTier, number>;
}

export interface ResetResult extends QueueOperationResult {
  cleared: number;
  reinitialized: number;
  /** True when the queue already matched policy order and `force` was off. */
  skipped: boolean;
}

export interface ReorderResult extends QueueOperationResult {
  updatedCount: number;
  failedIds: string[];
}

const NO_INSERTS: Record<QueueTier, number> = { firm_rush: 0, rush: 0, regular: 0 };

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}

// ─── Engine ──────────────────────────────────────────────────────────

export class CleaningQueueEngine {
  constructor(
    private readonly store: QueueStore,
    private readonly logger: Logger
  ) {}

  /**
   * Rank every open order that has no position yet, shifting already-ranked
   * orders only as far as needed for higher-priority arrivals.
   */
  async initializeUnassigned(): Promise<InitializeResult> {
    try {
      const plan = await this.store.transaction(async (tx) => {
        const orders = await tx.listOpenOrders();
        const planned = planInitialization(orders);
        if (planned.updates.length > 0) await tx.setPositions(planned.updates);
        return planned;
      });

      this.reportDateIssues(plan.dateIssues);
      if (plan.newlyRanked > 0) {
        this.logger.info(
          { newlyRanked: plan.newlyRanked, inserted: plan.inserted, shifted: plan.updates.length - plan.newlyRanked },
          'assigned queue positions to unranked work orders'
        );
      }

      return {
        success: true,
        message:
          plan.newlyRanked > 0
            ? `Assigned queue positions to ${plan.newlyRanked} work order(s)`
            : 'All open work orders already have queue positions',
        newlyRanked: plan.newlyRanked,
        inserted: plan.inserted,
      };
    } catch (err) {
      this.logger.error({ err, operation: 'initialize' }, 'queue initialization failed; rolled back');
      return {
        success: false,
        errorType: 'storage',
        message: `Failed to initialize queue positions: ${errorMessage(err)}`,
        newlyRanked: 0,
        inserted: { ...NO_INSERTS },
      };
    }
  }

  /**
   * Clear every open order's position and recompute the queue from the
   * priority policy alone. Discards all manual ordering.
   */
  async reset(force = false): Promise<ResetResult> {
    try {
      const outcome = await this.store.transaction(async (tx) => {
        const current = await tx.listOpenOrders();
        if (!force && isInPolicyOrder(current)) {
          return { cleared: 0, reinitialized: 0, skipped: true, dateIssues: [] as DateIssue[] };
        }

        const cleared = await tx.clearOpenPositions();
        const plan = planInitialization(await tx.listOpenOrders());
        if (plan.updates.length > 0) await tx.setPositions(plan.updates);
        return { cleared, reinitialized: plan.newlyRanked, skipped: false, dateIssues: plan.dateIssues };
      });

      this.reportDateIssues(outcome.dateIssues);

      if (outcome.skipped) {
        return {
          success: true,
          message: 'Queue already matches priority order; nothing reset',
          cleared: 0,
          reinitialized: 0,
          skipped: true,
        };
      }

      this.logger.warn(
        { cleared: outcome.cleared, reinitialized: outcome.reinitialized, force },
        'queue positions reset; manual ordering discarded'
      );
      return {
        success: true,
        message: `Cleared ${outcome.cleared} and re-initialized ${outcome.reinitialized} queue position(s)`,
        cleared: outcome.cleared,
        reinitialized: outcome.reinitialized,
        skipped: false,
      };
    } catch (err) {
      this.logger.error({ err, operation: 'reset', force }, 'queue reset failed; rolled back');
      return {
        success: false,
        errorType: 'storage',
        message: `Failed to reset queue positions: ${errorMessage(err)}`,
        cleared: 0,
        reinitialized: 0,
        skipped: false,
      };
    }
  }

  /**
   * Apply a staff-supplied order for one page of the queue view. Unknown ids
   * are reported back; the rest are still applied.
   */
  async reorder(orderedIds: string[], page: number, perPage: number): Promise<ReorderResult> {
    if (orderedIds.length === 0) {
      return this.rejectReorder('No work orders provided', []);
    }
    if (!Number.isInteger(page) || page < 1) {
      return this.rejectReorder('page must be a positive integer', []);
    }
    if (!Number.isInteger(perPage) || perPage < 1) {
      return this.rejectReorder('perPage must be a positive integer', []);
    }

    try {
      const plan = await this.store.transaction(async (tx) => {
        const found = await tx.findOpenOrders([...new Set(orderedIds)]);
        const planned = planReorder(
          orderedIds,
          page,
          perPage,
          new Map(found.map((order) => [order.workOrderNo, order]))
        );
        if (planned.updates.length > 0) await tx.setPositions(planned.updates);
        return planned;
      });

      if (plan.failedIds.length > 0) {
        this.logger.warn({ failedIds: plan.failedIds, page, perPage }, 'reorder skipped unknown work orders');
      }
      if (plan.tierInversions.length > 0) {
        this.logger.warn(
          { tierInversions: plan.tierInversions, page, perPage },
          'manual reorder places orders ahead of a higher priority tier'
        );
      }

      if (plan.updates.length === 0) {
        return this.rejectReorder('None of the provided work orders are in the queue', plan.failedIds);
      }

      this.logger.info({ updatedCount: plan.updates.length, page, perPage }, 'queue manually reordered');
      return {
        success: true,
        message:
          plan.failedIds.length > 0
            ? `Queue order updated; ${plan.failedIds.length} work order(s) not found: ${plan.failedIds.join(', ')}`
            : 'Queue order updated successfully',
        updatedCount: plan.updates.length,
        failedIds: plan.failedIds,
      };
    } catch (err) {
      this.logger.error({ err, operation: 'reorder', page, perPage }, 'queue reorder failed; rolled back');
      return {
        success: false,
        errorType: 'storage',
        message: `Error updating queue: ${errorMessage(err)}`,
        updatedCount: 0,
        failedIds: [],
      };
    }
  }

  private rejectReorder(message: string, failedIds: string[]): ReorderResult {
    return { success: false, errorType: 'validation', message, updatedCount: 0, failedIds };
  }

  private reportDateIssues(issues: DateIssue[]): void {
    for (const issue of issues) {
      this.logger.warn(issue, 'unparseable work order date; sorting it last in its tier');
    }
  }
}
