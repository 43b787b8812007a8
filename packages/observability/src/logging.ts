import pino, { type Logger } from 'pino';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { getCorrelationContext } from './correlation.js';

export type { Logger } from 'pino';

export interface CorrelatedLoggerOptions {
  service: string;
  /** Overrides the environment default (silent in test, info in production, debug otherwise). */
  level?: string;
  environment?: string;
}

const DEFAULT_LEVELS: Record<string, string> = {
  test: 'silent',
  production: 'info',
};

/**
 * JSON logger that stamps each line with the service name and the current
 * request's correlation id ('none' outside a request).
 */
export function createCorrelatedLogger(opts: CorrelatedLoggerOptions): Logger {
  const environment = opts.environment ?? process.env.NODE_ENV ?? 'development';

  return pino({
    name: opts.service,
    level: opts.level ?? DEFAULT_LEVELS[environment] ?? 'debug',
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    mixin() {
      return {
        correlationId: getCorrelationContext()?.correlationId ?? 'none',
        service: opts.service,
        environment,
      };
    },
  });
}

/** Logs every finished request; 5xx at error, 4xx at warn. */
export function requestLoggingMiddleware(logger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const startTime = Date.now();

    res.on('finish', () => {
      const entry = {
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        duration: Date.now() - startTime,
      };

      if (res.statusCode >= 500) {
        logger.error(entry, 'request failed');
      } else if (res.statusCode >= 400) {
        logger.warn(entry, 'request rejected');
      } else {
        logger.info(entry, 'request completed');
      }
    });

    next();
  };
}
