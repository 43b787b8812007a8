/**
 * Cleaning Queue Routes
 *
 * REST endpoints for the cleaning queue: listing, dashboard summary,
 * maintenance preview, manual reorder, initialization and reset.
 */

import { Router, type Response } from 'express';
import { z } from 'zod';
import { AppError } from '../middleware/error-handler.js';
import { guards } from '../middleware/auth-guards.js';
import type { CleaningQueueEngine } from '../services/queue-engine.service.js';
import type { CleaningQueueView } from '../services/queue-view.service.js';
import type { QueueOperationResult } from '../services/work-order.types.js';

export interface CleaningQueueRouterDeps {
  engine: CleaningQueueEngine;
  view: CleaningQueueView;
  defaultPerPage: number;
  /** Page size cap shared with the listing. */
  maxPerPage: number;
}

// ─── Validation Schemas ─────────────────────────────────────────────

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1');

const ListQuerySchema = z.object({
  search: z.string().max(200).optional(),
  page: z.coerce.number().int().min(1).optional(),
  perPage: z.coerce.number().int().min(1).optional(),
  showExcluded: booleanFlag,
});

const SummaryQuerySchema = z.object({
  limit: z.coerce.number().int().min(0).max(100).optional(),
  showExcluded: booleanFlag,
});

const ReorderSchema = z.object({
  workOrderIds: z.array(z.string().trim().min(1)).max(500),
  page: z.number().int().min(1).default(1),
  perPage: z.number().int().min(1).max(500).optional(),
});

const ResetSchema = z.object({
  force: z.boolean().default(false),
});

function validationError(error: z.ZodError): AppError {
  return new AppError(400, `Validation error: ${error.issues.map((i) => i.message).join(', ')}`);
}

/** Engine results never throw; map their failure kind onto a status code. */
function sendResult(res: Response, result: QueueOperationResult): void {
  if (result.success) {
    res.json(result);
    return;
  }
  res.status(result.errorType === 'validation' ? 400 : 500).json(result);
}

export function createCleaningQueueRouter(deps: CleaningQueueRouterDeps): Router {
  const router = Router();

  // ─── GET /: Paginated Queue ──────────────────────────────────────
  router.get('/', guards.readQueue, async (req, res, next) => {
    try {
      const parsed = ListQuerySchema.safeParse(req.query);
      if (!parsed.success) throw validationError(parsed.error);

      const listing = await deps.view.listQueue({
        search: parsed.data.search,
        page: parsed.data.page,
        perPage: parsed.data.perPage,
        showExcludedGroup: parsed.data.showExcluded,
      });
      res.json(listing);
    } catch (err) {
      next(err);
    }
  });

  // ─── GET /summary: Dashboard Counts & Next Orders ───────────────
  router.get('/summary', guards.readQueue, async (req, res, next) => {
    try {
      const parsed = SummaryQuerySchema.safeParse(req.query);
      if (!parsed.success) throw validationError(parsed.error);

      const summary = await deps.view.getSummary({
        limit: parsed.data.limit,
        showExcludedGroup: parsed.data.showExcluded,
      });
      res.json(summary);
    } catch (err) {
      next(err);
    }
  });

  // ─── GET /preview: Tier Grouping & FIFO Violations ──────────────
  router.get('/preview', guards.manageQueue, async (_req, res, next) => {
    try {
      res.json(await deps.view.previewQueue());
    } catch (err) {
      next(err);
    }
  });

  // ─── POST /reorder: Manual Drag-and-Drop Order ──────────────────
  router.post('/reorder', guards.reorderQueue, async (req, res, next) => {
    try {
      const parsed = ReorderSchema.safeParse(req.body);
      if (!parsed.success) throw validationError(parsed.error);

      const { workOrderIds, page, perPage } = parsed.data;
      const pageSize = Math.min(perPage ?? deps.defaultPerPage, deps.maxPerPage);
      const result = await deps.engine.reorder(workOrderIds, page, pageSize);
      sendResult(res, result);
    } catch (err) {
      next(err);
    }
  });

  // ─── POST /initialize: Rank Unpositioned Orders ─────────────────
  router.post('/initialize', guards.manageQueue, async (_req, res, next) => {
    try {
      sendResult(res, await deps.engine.initializeUnassigned());
    } catch (err) {
      next(err);
    }
  });

  // ─── POST /reset: Recompute From Priority Policy ────────────────
  router.post('/reset', guards.manageQueue, async (req, res, next) => {
    try {
      const parsed = ResetSchema.safeParse(req.body ?? {});
      if (!parsed.success) throw validationError(parsed.error);

      sendResult(res, await deps.engine.reset(parsed.data.force));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
