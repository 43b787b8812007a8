export {
  CORRELATION_HEADER,
  correlationMiddleware,
  getCorrelationContext,
  getCorrelationId,
  runWithCorrelation,
  type CorrelationContext,
} from './correlation.js';
export {
  createCorrelatedLogger,
  requestLoggingMiddleware,
  type CorrelatedLoggerOptions,
  type Logger,
} from './logging.js';
