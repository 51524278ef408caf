import { FastifyPluginAsync, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import * as Sentry from '@sentry/node';

interface SentryOptions {
  dsn?: string;
  environment?: string;
  tracesSampleRate?: number;
}

type Span = ReturnType<typeof Sentry.startInactiveSpan>;

// OpenTelemetry span status codes
const SPAN_STATUS_OK = 1;
const SPAN_STATUS_ERROR = 2;

const UNTRACED_URLS = ['/health', '/docs'];

function isUntraced(url: string): boolean {
  return UNTRACED_URLS.some((prefix) => url === prefix || url.startsWith(`${prefix}/`));
}

/**
 * Sentry plugin for error monitoring, logging and request tracing
 *
 * Features:
 * - Automatic error capturing with request context
 * - Request spans with status and response time
 * - Console lines ([SYNC], [MIGRATE]) forwarded as logs
 */
const sentryPlugin: FastifyPluginAsync<SentryOptions> = async (fastify, opts) => {
  if (!opts.dsn) {
    fastify.log.warn('Sentry DSN not provided, skipping Sentry initialization');
    return;
  }

  const environment = opts.environment || process.env.NODE_ENV || 'development';
  const isDevelopment = environment === 'development';
  const tracesSampleRate = opts.tracesSampleRate ?? (isDevelopment ? 1.0 : 0.1);

  Sentry.init({
    dsn: opts.dsn,
    environment,
    tracesSampleRate,
    release: process.env.npm_package_version || '0.1.0',
    debug: isDevelopment,

    // Enable Sentry Logs product
    enableLogs: true,
    integrations: [
      // Capture console.log, console.warn, and console.error as logs
      Sentry.consoleLoggingIntegration({ levels: ['log', 'warn', 'error'] }),
    ],

    beforeSend(event) {
      if (event.request?.headers) {
        delete event.request.headers.authorization;
        delete event.request.headers.cookie;
      }
      return event;
    },

    ignoreErrors: ['ECONNRESET', 'EPIPE', 'ECONNABORTED'],

    beforeBreadcrumb(breadcrumb) {
      const url: unknown = breadcrumb.data?.url;
      if (breadcrumb.category === 'http' && typeof url === 'string' && url.includes('/health')) {
        return null;
      }
      return breadcrumb;
    },
  });

  const spans = new WeakMap<FastifyRequest, Span>();

  fastify.addHook('onRequest', async (request: FastifyRequest) => {
    if (isUntraced(request.url)) {
      return;
    }

    const route = request.routeOptions.url || request.url;
    const span = Sentry.startInactiveSpan({
      op: 'http.server',
      name: `${request.method} ${route}`,
      attributes: {
        method: request.method,
        url: request.url,
        'http.request.id': request.id,
      },
    });
    spans.set(request, span);

    Sentry.addBreadcrumb({
      category: 'http',
      message: `${request.method} ${request.url}`,
      level: 'info',
      data: { requestId: request.id },
    });
  });

  fastify.addHook('onResponse', async (request: FastifyRequest, reply: FastifyReply) => {
    const span = spans.get(request);
    if (!span) return;

    span.setAttributes({
      'http.response.status_code': reply.statusCode,
      'http.response_time_ms': Math.round(reply.elapsedTime),
    });
    span.setStatus(
      reply.statusCode >= 500 ? { code: SPAN_STATUS_ERROR, message: 'internal_error' } : { code: SPAN_STATUS_OK }
    );
    span.end();
    spans.delete(request);
  });

  fastify.addHook('onError', async (request: FastifyRequest, reply: FastifyReply, error: Error) => {
    // Runs after the error handler, so the status is final
    if (isUntraced(request.url) || reply.statusCode < 500) {
      return;
    }

    Sentry.captureException(error, {
      contexts: {
        request: {
          id: request.id,
          method: request.method,
          url: request.url,
          route: request.routeOptions.url,
        },
        response: {
          statusCode: reply.statusCode,
        },
      },
      tags: {
        route: request.routeOptions.url || request.url,
        method: request.method,
        errorType: error.name,
      },
      level: 'error',
    });
  });

  // Graceful shutdown - flush Sentry events
  fastify.addHook('onClose', async () => {
    fastify.log.info('Flushing Sentry events before shutdown...');
    await Sentry.close(2000);
  });

  fastify.log.info({ environment, tracesSampleRate }, 'Sentry plugin initialized');
};

export default fp(sentryPlugin);
export { sentryPlugin };
