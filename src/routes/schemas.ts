/**
 * Schema endpoints: indexed tables, index summary and refresh.
 */

import type { FastifyPluginAsync } from 'fastify';
import type { AgentRouteOptions } from './types.js';

export const schemaRoutes: FastifyPluginAsync<AgentRouteOptions> = async (fastify, { agent }) => {
  // GET /tables - Table names known to the schema index
  fastify.get(
    '/tables',
    {
      schema: {
        description: 'List tables available for questions',
        tags: ['Schema'],
      },
    },
    async () => {
      const tables = agent.availableTables();
      return { tables, total: tables.length };
    }
  );

  // GET /schema - Index summary
  fastify.get(
    '/schema',
    {
      schema: {
        description: 'Summary of the indexed schema documents',
        tags: ['Schema'],
      },
    },
    async () => agent.schemaSummary()
  );

  // POST /schema/refresh - Re-introspect and re-embed
  fastify.post(
    '/schema/refresh',
    {
      schema: {
        description: 'Reload the database schema and rebuild the index',
        tags: ['Schema'],
      },
    },
    async (_request, reply) => {
      const result = await agent.refreshSchema();
      if (!result.ok) {
        return reply.status(500).send({
          error: 'SchemaRefreshFailed',
          reason: result.reason,
          message: result.message,
        });
      }
      return { refreshed: true, summary: result.value };
    }
  );
};
