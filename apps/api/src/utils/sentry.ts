import * as Sentry from '@sentry/node';

/**
 * Sentry utilities for business-event logging and error tracking in services
 *
 * Usage:
 * - Use `logger` for sync and migration events
 * - Use captureCustomError for fatal session failures
 * - Use trackAsyncOperation to time a whole session run
 */

type SeverityLevel = 'fatal' | 'error' | 'warning' | 'info' | 'debug';
type Attributes = Record<string, string | number | boolean>;

// OpenTelemetry span status codes
const SPAN_STATUS_OK = 1;
const SPAN_STATUS_ERROR = 2;

/**
 * Capture a custom error with additional context
 */
export function captureCustomError(
  error: unknown,
  context?: {
    level?: SeverityLevel;
    tags?: Record<string, string>;
    extra?: Record<string, unknown>;
  }
): void {
  Sentry.captureException(error, {
    level: context?.level || 'error',
    tags: context?.tags,
    extra: context?.extra,
  });
}

/**
 * High-value event logger for structured logging to Sentry Logs
 *
 * Use it for significant operations: sync sessions, skipped or failed
 * messages, record upserts, schema migrations, manual corrections.
 */
export const logger = {
  info: (message: string, extra?: Record<string, unknown>) => {
    Sentry.logger.info(message, extra);
  },

  /**
   * Data quality issues and partial failures
   */
  warn: (message: string, extra?: Record<string, unknown>) => {
    Sentry.logger.warn(message, extra);
  },

  error: (message: string, extra?: Record<string, unknown>) => {
    Sentry.logger.error(message, extra);
  },

  fatal: (message: string, extra?: Record<string, unknown>) => {
    Sentry.logger.fatal(message, extra);
  },
};

/**
 * Log a breadcrumb for debugging
 * Breadcrumbs help reconstruct the sequence of events leading to an error
 */
export function addBreadcrumb(
  message: string,
  category: string = 'custom',
  level: SeverityLevel = 'info',
  data?: Record<string, unknown>
): void {
  Sentry.addBreadcrumb({
    message,
    category,
    level,
    data,
    timestamp: Date.now() / 1000,
  });
}

/**
 * Track a custom performance span
 *
 * Example:
 * const metric = startPerformanceTracking('sync.session');
 * // ... do work
 * metric.finish({ syncedCount: 3 });
 */
export function startPerformanceTracking(operation: string, data?: Attributes) {
  const span = Sentry.startInactiveSpan({
    op: operation,
    name: operation,
    attributes: data,
  });

  return {
    finish: (additionalData?: Attributes) => {
      if (additionalData) {
        span.setAttributes(additionalData);
      }
      span.end();
    },
    setStatus: (status: 'ok' | 'internal_error' | 'cancelled') => {
      span.setStatus(status === 'ok' ? { code: SPAN_STATUS_OK } : { code: SPAN_STATUS_ERROR, message: status });
    },
  };
}

/**
 * Wrap an async function with performance tracking
 *
 * Example:
 * const summary = await trackAsyncOperation(
 *   'sync.session',
 *   async () => session.run(window),
 *   { fromDate: window.fromDate }
 * );
 */
export async function trackAsyncOperation<T>(
  operationName: string,
  fn: () => Promise<T>,
  tags?: Record<string, string>
): Promise<T> {
  const metric = startPerformanceTracking(operationName, tags);

  try {
    const result = await fn();
    metric.setStatus('ok');
    metric.finish();
    return result;
  } catch (error) {
    metric.setStatus('internal_error');
    metric.finish();
    captureCustomError(error, {
      tags: { ...tags, operation: operationName },
    });
    throw error;
  }
}
