import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { getCorrelationId, type Logger } from '@cleanq/observability';

export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

// express.json() rejects malformed bodies with a SyntaxError carrying `body`.
function isMalformedJson(error: unknown): boolean {
  return error instanceof SyntaxError && 'body' in error;
}

export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isAppError(err)) {
      res.status(err.statusCode).json({ error: err.message });
      return;
    }

    if (isMalformedJson(err)) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }

    logger.error({ err }, 'unhandled error');
    res.status(500).json({ error: 'Internal server error', correlationId: getCorrelationId() });
  };
}
