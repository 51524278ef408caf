import { FastifyError, FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { ZodError } from 'zod';

import { SyncError } from '../errors.js';
import { logger } from '../utils/sentry.js';

const errorHandler: FastifyPluginAsync = async (fastify) => {
  fastify.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error instanceof ZodError) {
      reply.status(400).send({
        error: 'Validation Error',
        message: 'Request validation failed',
        statusCode: 400,
        details: error.errors,
      });
      return;
    }

    if (error instanceof SyncError) {
      if (error.statusCode >= 500) {
        fastify.log.error(error);
        logger.error('Request failed', { code: error.code, url: request.url, message: error.message });
      }
      reply.status(error.statusCode).send({
        error: error.name,
        message: error.message,
        statusCode: error.statusCode,
        code: error.code,
      });
      return;
    }

    if (error.statusCode && error.statusCode < 500) {
      reply.status(error.statusCode).send({
        error: error.name,
        message: error.message,
        statusCode: error.statusCode,
      });
      return;
    }

    fastify.log.error(error);
    logger.error('Unhandled request error', { url: request.url, message: error.message });

    reply.status(500).send({
      error: 'Internal Server Error',
      message: 'An unexpected error occurred',
      statusCode: 500,
    });
  });
};

export default fp(errorHandler);
export { errorHandler };
