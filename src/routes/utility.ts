/**
 * Utility endpoints (history, stats, health).
 */

import type { FastifyPluginAsync } from 'fastify';
import { HistoryQuerySchema } from '../types/models.js';
import { APP_NAME, APP_VERSION } from '../version.js';
import type { AgentRouteOptions } from './types.js';

export const utilityRoutes: FastifyPluginAsync<AgentRouteOptions> = async (fastify, { agent }) => {
  // GET /history - Recent results, oldest first
  fastify.get('/history', async (request) => {
    const { limit } = HistoryQuerySchema.parse(request.query);
    const history = agent.history(limit);
    return { history, total: history.length };
  });

  // DELETE /history - Clear history
  fastify.delete('/history', async () => ({ cleared: agent.clearHistory() }));

  // GET /stats - History statistics
  fastify.get('/stats', async () => agent.stats());

  // GET /health - Health check
  fastify.get('/health', async () => ({
    status: agent.isInitialized ? 'ok' : 'initializing',
    database: {
      client: agent.databaseClient,
    },
    index: {
      documents: agent.documentCount(),
    },
  }));

  // GET / - Root endpoint
  fastify.get('/', async () => ({
    name: APP_NAME,
    version: APP_VERSION,
    description: 'Natural language questions over a relational database',
    docs: '/docs',
  }));
};
