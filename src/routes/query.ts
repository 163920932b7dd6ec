/**
 * Query endpoints for natural language questions.
 * A failed pipeline result is still a 200: the body carries `errorKind` and `errorMessage`.
 */

import type { FastifyPluginAsync } from 'fastify';
import { AskRequestSchema } from '../types/models.js';
import type { AgentRouteOptions } from './types.js';

export const queryRoutes: FastifyPluginAsync<AgentRouteOptions> = async (fastify, { agent }) => {
  // POST /query - Main query endpoint
  fastify.post(
    '/query',
    {
      schema: {
        description: 'Answer a natural language question with SQL, rows and an analysis',
        tags: ['Query'],
        body: {
          type: 'object',
          properties: {
            question: { type: 'string', maxLength: 2000 },
          },
          required: ['question'],
        },
      },
    },
    async (request) => {
      const { question } = AskRequestSchema.parse(request.body);
      return agent.ask(question);
    }
  );

  // GET /query - Convenience endpoint
  fastify.get<{ Querystring: { q: string } }>(
    '/query',
    {
      schema: {
        description: 'Answer a natural language question (GET)',
        tags: ['Query'],
        querystring: {
          type: 'object',
          properties: {
            q: { type: 'string', maxLength: 2000 },
          },
          required: ['q'],
        },
      },
    },
    async (request) => {
      const { question } = AskRequestSchema.parse({ question: request.query.q });
      return agent.ask(question);
    }
  );
};
