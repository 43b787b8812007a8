/**
 * @cleanq/observability: Request correlation ID middleware
 *
 * Assigns a unique correlation ID to every incoming request (or CLI run).
 * The ID propagates through logs and error responses.
 */

import { randomUUID } from 'node:crypto';
import { AsyncLocalStorage } from 'node:async_hooks';
import type { Request, Response, NextFunction, RequestHandler } from 'express';

/** Header name for correlation ID propagation */
export const CORRELATION_HEADER = 'x-correlation-id';

const MAX_INCOMING_ID_LENGTH = 128;

const correlationStore = new AsyncLocalStorage<CorrelationContext>();

/**
 * Correlation context available throughout a request lifecycle.
 */
export interface CorrelationContext {
  /** Unique request correlation ID */
  correlationId: string;
  /** Current service name */
  serviceName: string;
  /** Request start timestamp */
  startTime: number;
}

/**
 * Get the current correlation context from async local storage.
 *
 * @returns The current correlation context, or undefined if outside a request
 */
export function getCorrelationContext(): CorrelationContext | undefined {
  return correlationStore.getStore();
}

/**
 * Get the current correlation ID.
 *
 * @returns The correlation ID, or 'unknown' if outside a request
 */
export function getCorrelationId(): string {
  return correlationStore.getStore()?.correlationId ?? 'unknown';
}

/**
 * Run `fn` inside a fresh correlation context. Used by entry points that
 * are not HTTP requests, such as maintenance scripts.
 */
export function runWithCorrelation<T>(serviceName: string, fn: () => T, correlationId?: string): T {
  return correlationStore.run(
    { correlationId: correlationId ?? randomUUID(), serviceName, startTime: Date.now() },
    fn
  );
}

function readIncomingId(req: Request): string | undefined {
  const raw = req.headers[CORRELATION_HEADER];
  const value = Array.isArray(raw) ? raw[0] : raw;
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  if (trimmed.length === 0 || trimmed.length > MAX_INCOMING_ID_LENGTH) return undefined;
  return trimmed;
}

/**
 * Express middleware that establishes request correlation.
 *
 * - Reuses the incoming `x-correlation-id` header when present
 * - Generates a new UUID otherwise
 * - Echoes the ID on the response
 * - Stores context in AsyncLocalStorage for access anywhere in the request
 *
 * @example
 * ```ts
 * app.use(correlationMiddleware('queue'));
 * ```
 */
export function correlationMiddleware(serviceName: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const correlationId = readIncomingId(req) ?? randomUUID();
    res.setHeader(CORRELATION_HEADER, correlationId);

    const context: CorrelationContext = {
      correlationId,
      serviceName,
      startTime: Date.now(),
    };

    correlationStore.run(context, () => {
      next();
    });
  };
}
