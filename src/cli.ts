#!/usr/bin/env node
/**
 * ragsql CLI
 * Ask questions about a database from the command line
 */

import { resolve } from 'path';
import { cac } from 'cac';
import { getConfig } from './config.js';
import { createAgent, type SqlAgent } from './services/agent.js';
import { buildServer } from './server.js';
import { ConfigError, describeError } from './types/errors.js';
import { APP_NAME, APP_VERSION } from './version.js';
import { runChat } from './cli/chat.js';
import { displayResult, displaySummary } from './cli/display.js';
import * as logger from './cli/logger.js';
import { DEFAULT_COUNTS, seedSampleDatabase } from './cli/seed-database.js';

const cli = cac(APP_NAME);

cli.version(APP_VERSION);
cli.help();

function fail(message: string, error: unknown): never {
  if (error instanceof ConfigError) {
    logger.error(message, 'Check your .env file (see .env.example)');
    for (const issue of error.issues) {
      console.log(`    - ${issue}`);
    }
  } else {
    logger.error(message, describeError(error));
  }
  process.exit(1);
}

/**
 * Build and initialize an agent from configuration, or exit with the failing step.
 */
async function startAgent(): Promise<SqlAgent> {
  let agent: SqlAgent;
  try {
    agent = createAgent(getConfig());
  } catch (error) {
    fail('Invalid configuration', error);
  }

  const spin = logger.spinner('Initializing SQL agent...');
  const initialized = await agent.initialize();
  if (!initialized.ok) {
    spin.fail(`Initialization failed (${initialized.reason})`);
    logger.error(initialized.message);
    await agent.close();
    process.exit(1);
  }

  const { tables, documentsIndexed, embedded } = initialized.value;
  spin.succeed(
    `Agent ready: ${documentsIndexed} schema documents ${embedded ? 'embedded' : 'loaded'}`
  );
  if (tables.length > 0) {
    logger.info(`Available tables: ${tables.join(', ')}`);
  }
  return agent;
}

/**
 * ragsql ask <question>
 */
cli
  .command('ask <question>', 'Answer one natural language question')
  .option('--json', 'Print the raw result as JSON')
  .action(async (question: string, options: { json?: boolean }) => {
    const agent = await startAgent();
    try {
      const result = await agent.ask(question);
      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
      } else {
        logger.newline();
        displayResult(result);
      }
      process.exitCode = result.success ? 0 : 1;
    } finally {
      await agent.close();
    }
  });

/**
 * ragsql chat
 */
cli.command('chat', 'Interactive question loop').action(async () => {
  logger.printBanner();
  const agent = await startAgent();
  logger.newline();
  try {
    await runChat(agent);
  } finally {
    await agent.close();
  }
});

/**
 * ragsql serve
 */
cli
  .command('serve', 'Start the HTTP API server')
  .option('-p, --port <port>', 'Server port (defaults to PORT)')
  .action(async (options: { port?: string | number }) => {
    logger.printBanner();
    const agent = await startAgent();
    const port = options.port === undefined ? getConfig().PORT : Number(options.port);
    if (!Number.isInteger(port) || port <= 0) {
      await agent.close();
      fail('Invalid port', `Expected a positive integer, got ${String(options.port)}`);
    }

    const fastify = await buildServer(agent);
    try {
      await fastify.listen({ port, host: '0.0.0.0' });
    } catch (error) {
      await fastify.close();
      fail('Failed to start server', error);
    }

    logger.newline();
    logger.link('API', `http://localhost:${port}`);
    logger.link('Docs', `http://localhost:${port}/docs`);

    process.once('SIGINT', () => {
      logger.newline();
      logger.info('Shutting down server...');
      fastify.close().then(
        () => process.exit(0),
        (error: unknown) => fail('Shutdown failed', error)
      );
    });
  });

/**
 * ragsql refresh
 */
cli.command('refresh', 'Re-introspect the database and rebuild the schema index').action(async () => {
  const agent = await startAgent();
  try {
    const spin = logger.spinner('Refreshing database schema...');
    const refreshed = await agent.refreshSchema();
    if (!refreshed.ok) {
      spin.fail(`Failed to refresh schema (${refreshed.reason})`);
      logger.error(refreshed.message);
      process.exitCode = 1;
      return;
    }
    spin.succeed('Schema refreshed successfully');
    displaySummary(refreshed.value);
  } finally {
    await agent.close();
  }
});

/**
 * ragsql seed <path>
 */
cli
  .command('seed <path>', 'Create a sample e-commerce SQLite database')
  .option('--customers <n>', 'Customers to generate', { default: DEFAULT_COUNTS.customers })
  .option('--products <n>', 'Products to generate', { default: DEFAULT_COUNTS.products })
  .option('--orders <n>', 'Orders to generate', { default: DEFAULT_COUNTS.orders })
  .action(
    (path: string, options: { customers: string | number; products: string | number; orders: string | number }) => {
      const counts = {
        customers: Number(options.customers),
        products: Number(options.products),
        orders: Number(options.orders),
      };
      for (const [name, value] of Object.entries(counts)) {
        if (!Number.isInteger(value) || value < 1) {
          fail('Invalid count', `--${name} must be a positive integer`);
        }
      }

      const dbPath = resolve(path);
      try {
        seedSampleDatabase(dbPath, counts);
      } catch (error) {
        fail('Seeding failed', error);
      }
      logger.info(`Set DATABASE_TYPE=sqlite3 and DATABASE_PATH=${dbPath} to query it`);
    }
  );

// Parse CLI arguments
try {
  cli.parse(process.argv, { run: false });
  await cli.runMatchedCommand();
} catch (error) {
  fail('Command failed', error);
}
