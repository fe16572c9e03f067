/**
 * Fastify server construction.
 */

import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { ZodError } from 'zod';
import type { Store } from './services/database.js';
import type { Pipeline } from './services/pipeline.js';
import { askRoutes } from './routes/ask.js';
import { utilityRoutes } from './routes/utility.js';
import {
  LLMError,
  ProvisioningError,
  SQLExecutionError,
  StorageUnavailableError,
} from './types/errors.js';
import { loggerConfig } from './utils/logger.js';

export const API_NAME = 'tabletalk API';
export const API_VERSION = '1.0.0';

export interface ServerOptions {
  pipeline: Pipeline;
  store: Store;
  /** Pass false to keep request logging off, e.g. under test. */
  logger?: boolean;
}

/**
 * Create and configure a Fastify server around a pipeline.
 */
export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger === false ? false : loggerConfig,
  });

  await fastify.register(cors, {
    origin: '*',
  });

  await fastify.register(swagger, {
    openapi: {
      info: {
        title: API_NAME,
        description: 'Ask questions about clients, invoices and line items in plain English',
        version: API_VERSION,
      },
    },
  });

  await fastify.register(swaggerUi, {
    routePrefix: '/docs',
  });

  fastify.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.status(400).send({
        error: 'ValidationError',
        message: error.issues.map((issue) => issue.message).join('; '),
      });
    }
    if (error.validation) {
      return reply.status(400).send({
        error: 'ValidationError',
        message: error.message,
      });
    }
    if (error instanceof LLMError) {
      return reply.status(502).send({
        error: 'LLMError',
        message: 'Language model service unavailable',
        detail: error.message,
      });
    }
    if (error instanceof StorageUnavailableError) {
      return reply.status(503).send({
        error: 'StorageUnavailableError',
        message: error.message,
      });
    }
    if (error instanceof ProvisioningError) {
      return reply.status(500).send({
        error: 'ProvisioningError',
        message: error.message,
      });
    }
    if (error instanceof SQLExecutionError) {
      return reply.status(500).send({
        error: 'SQLExecutionError',
        message: error.message,
        sql: error.sql,
      });
    }
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: error.name,
        message: error.message,
      });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.status(500).send({
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  // Registered after the error handler so the route contexts inherit it.
  await fastify.register(askRoutes, { pipeline: options.pipeline });
  await fastify.register(utilityRoutes, { pipeline: options.pipeline, store: options.store });

  fastify.addHook('onClose', async () => {
    await options.store.close();
  });

  return fastify;
}
