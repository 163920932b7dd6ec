/**
 * Fastify application wiring: plugins, routes and the error handler.
 */

import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { ZodError } from 'zod';
import type { SqlAgent } from './services/agent.js';
import { loggerConfig } from './utils/logger.js';
import { queryRoutes } from './routes/query.js';
import { schemaRoutes } from './routes/schemas.js';
import { utilityRoutes } from './routes/utility.js';
import {
  ConfigError,
  DatabaseError,
  EmbeddingError,
  LLMError,
  SQLExecutionError,
  VectorStoreError,
} from './types/errors.js';
import { APP_NAME, APP_VERSION } from './version.js';

export interface ServerOptions {
  /** Log requests through pino. Defaults to true. */
  logger?: boolean;
  /** Serve OpenAPI docs at /docs. Defaults to true. */
  docs?: boolean;
}

export async function buildServer(
  agent: SqlAgent,
  options: ServerOptions = {}
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger === false ? false : loggerConfig,
  });

  await fastify.register(cors, {
    origin: '*',
  });

  if (options.docs !== false) {
    await fastify.register(swagger, {
      openapi: {
        info: {
          title: `${APP_NAME} API`,
          description: 'Ask questions about a relational database in natural language',
          version: APP_VERSION,
        },
      },
    });

    await fastify.register(swaggerUi, {
      routePrefix: '/docs',
    });
  }

  fastify.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.status(400).send({
        error: 'ValidationError',
        message: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
      });
    }
    if (error.validation) {
      return reply.status(400).send({
        error: 'ValidationError',
        message: error.message,
      });
    }
    if (error instanceof LLMError || error instanceof EmbeddingError) {
      return reply.status(502).send({
        error: error.name,
        message: 'Language model service unavailable',
        detail: error.message,
      });
    }
    if (error instanceof DatabaseError) {
      return reply.status(503).send({
        error: 'DatabaseError',
        message: error.message,
      });
    }
    if (
      error instanceof ConfigError ||
      error instanceof SQLExecutionError ||
      error instanceof VectorStoreError
    ) {
      return reply.status(500).send({
        error: error.name,
        message: error.message,
      });
    }

    request.log.error({ err: error }, 'Unhandled request error');
    return reply.status(error.statusCode ?? 500).send({
      error: 'InternalServerError',
      message: error.message || 'An unexpected error occurred',
    });
  });

  await fastify.register(queryRoutes, { agent });
  await fastify.register(schemaRoutes, { agent });
  await fastify.register(utilityRoutes, { agent });

  fastify.addHook('onClose', async () => {
    await agent.close();
  });

  return fastify;
}
