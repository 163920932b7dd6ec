/**
 * Interactive question loop.
 */

import prompts from 'prompts';
import type { SqlAgent } from '../services/agent.js';
import * as logger from './logger.js';
import {
  displayHistory,
  displayResult,
  displayStats,
  displaySummary,
} from './display.js';

export type ChatCommand =
  | { kind: 'help' }
  | { kind: 'stats' }
  | { kind: 'tables' }
  | { kind: 'schema' }
  | { kind: 'refresh' }
  | { kind: 'history' }
  | { kind: 'clear' }
  | { kind: 'quit' }
  | { kind: 'empty' }
  | { kind: 'ask'; question: string };

const KEYWORDS: Record<string, ChatCommand> = {
  help: { kind: 'help' },
  stats: { kind: 'stats' },
  tables: { kind: 'tables' },
  schema: { kind: 'schema' },
  refresh: { kind: 'refresh' },
  history: { kind: 'history' },
  clear: { kind: 'clear' },
  quit: { kind: 'quit' },
  exit: { kind: 'quit' },
  q: { kind: 'quit' },
};

/**
 * Keywords match case-insensitively; anything else is a question.
 */
export function parseChatCommand(input: string): ChatCommand {
  const trimmed = input.trim();
  if (trimmed === '') return { kind: 'empty' };
  return KEYWORDS[trimmed.toLowerCase()] ?? { kind: 'ask', question: trimmed };
}

const HELP_TEXT = `Ask any question about your data in plain English, for example:
  - How many customers do we have?
  - What are the top 5 products by revenue?
  - Show orders placed in the last 7 days

Commands:
  help      Show this message
  stats     Query statistics
  tables    List available tables
  schema    Schema index summary
  refresh   Reload the database schema
  history   Recent questions
  clear     Clear the query history
  quit      Leave (also: exit, q)`;

export async function runChat(agent: SqlAgent): Promise<void> {
  logger.panel(HELP_TEXT, 'ragsql chat');

  for (;;) {
    const { input } = await prompts(
      {
        type: 'text',
        name: 'input',
        message: 'Ask a question',
      },
      // Ctrl+C ends the loop instead of killing the process
      { onCancel: () => true }
    );

    // undefined after Ctrl+C
    if (typeof input !== 'string') return;

    const command = parseChatCommand(input);
    switch (command.kind) {
      case 'empty':
        break;
      case 'quit':
        logger.info('Goodbye!');
        return;
      case 'help':
        logger.panel(HELP_TEXT, 'Help');
        break;
      case 'stats':
        displayStats(agent.stats());
        break;
      case 'tables': {
        const tables = agent.availableTables();
        logger.info(tables.length > 0 ? `Available tables: ${tables.join(', ')}` : 'No tables indexed');
        break;
      }
      case 'schema':
        displaySummary(agent.schemaSummary());
        break;
      case 'refresh': {
        const spin = logger.spinner('Refreshing database schema...');
        const refreshed = await agent.refreshSchema();
        if (refreshed.ok) {
          spin.succeed(`Schema refreshed (${refreshed.value.totalDocuments} documents)`);
        } else {
          spin.fail(`Failed to refresh schema: ${refreshed.message}`);
        }
        break;
      }
      case 'history':
        displayHistory(agent.history(10));
        break;
      case 'clear':
        logger.success(`Cleared ${agent.clearHistory()} history entries`);
        break;
      case 'ask': {
        const spin = logger.spinner('Thinking...');
        const result = await agent.ask(command.question);
        spin.stop();
        displayResult(result);
        break;
      }
    }
    logger.newline();
  }
}
