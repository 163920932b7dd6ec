import type { SqlAgent } from '../services/agent.js';

/**
 * Options every route plugin is registered with.
 */
export interface AgentRouteOptions {
  agent: SqlAgent;
}
