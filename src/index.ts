/**
 * HTTP server entry point.
 */

import { getConfig } from './config.js';
import { createAgent } from './services/agent.js';
import { buildServer } from './server.js';
import { logger } from './utils/logger.js';

const config = getConfig();
const agent = createAgent(config);

logger.info('Starting ragsql API server...');
const initialized = await agent.initialize();
if (!initialized.ok) {
  logger.fatal(
    { reason: initialized.reason },
    `Failed to initialize SQL agent: ${initialized.message}`
  );
  process.exit(1);
}

const fastify = await buildServer(agent);

const shutdown = async (signal: string) => {
  logger.info(`Received ${signal}, shutting down ragsql API server...`);
  await fastify.close();
  process.exit(0);
};
const onSignal = (signal: NodeJS.Signals) => {
  shutdown(signal).catch((err: unknown) => {
    logger.error({ err }, 'Shutdown failed');
    process.exit(1);
  });
};
process.once('SIGINT', onSignal);
process.once('SIGTERM', onSignal);

try {
  await fastify.listen({ port: config.PORT, host: '0.0.0.0' });
  logger.info(`Server running at http://localhost:${config.PORT}`);
  logger.info(`API docs at http://localhost:${config.PORT}/docs`);
} catch (err) {
  fastify.log.error(err);
  process.exit(1);
}
