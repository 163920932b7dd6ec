import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { SqlAgent } from './agent.js';
import { DatabaseConnection } from './database.js';
import type { TextCompleter } from './pipeline/index.js';
import { DatabaseError, EmbeddingError, LLMError } from '../types/errors.js';
import { FakeSchemaIndex, IN_MEMORY_SQLITE, createShopTables } from '../testing/fakes.js';

const CUSTOMERS_SQL = 'SELECT name FROM customers ORDER BY id';

describe('SqlAgent', () => {
  let connection: DatabaseConnection;
  let index: FakeSchemaIndex;
  let completer: { complete: Mock<TextCompleter['complete']>; verify: Mock<() => Promise<void>> };
  let agent: SqlAgent;

  beforeEach(async () => {
    connection = new DatabaseConnection(IN_MEMORY_SQLITE);
    await connection.connect();
    await createShopTables(connection.knex);
    index = new FakeSchemaIndex(0.1);
    completer = {
      complete: vi.fn<TextCompleter['complete']>(),
      verify: vi.fn(async () => {}),
    };
    agent = new SqlAgent(
      { connection, index, completer },
      { similarityThreshold: 0.7, maxRetrievedDocs: 5, maxHistory: 10 }
    );
  });

  afterEach(async () => {
    await connection.close();
  });

  it('refuses questions before initialization', async () => {
    const result = await agent.ask('How many customers?');

    expect(result).toMatchObject({
      success: false,
      errorKind: 'not-initialized',
      errorMessage: 'Agent not initialized. Call initialize() first.',
      processingTimeSeconds: 0,
    });
    expect(agent.history()).toEqual([]);
    expect(agent.availableTables()).toEqual([]);
  });

  it('embeds the introspected schema into an empty index', async () => {
    const result = await agent.initialize();

    expect(result).toEqual({
      ok: true,
      value: { tables: ['customers', 'orders'], documentsIndexed: 3, embedded: true },
    });
    expect(agent.isInitialized).toBe(true);
    expect(completer.verify).toHaveBeenCalledTimes(1);
    expect(agent.schemaSummary()).toEqual({
      totalDocuments: 3,
      tables: 2,
      views: 0,
      relationships: 1,
    });
  });

  it('keeps a populated index as it is', async () => {
    await index.replaceAll([{ name: 'customers', kind: 'table', content: 'Table: customers' }]);
    const replaceAll = vi.spyOn(index, 'replaceAll');

    const result = await agent.initialize();

    expect(result).toEqual({
      ok: true,
      value: { tables: ['customers'], documentsIndexed: 1, embedded: false },
    });
    expect(replaceAll).not.toHaveBeenCalled();
  });

  it('reports an unreachable database', async () => {
    vi.spyOn(connection, 'connect').mockRejectedValueOnce(
      new DatabaseError('Failed to connect to database: refused')
    );

    expect(await agent.initialize()).toEqual({
      ok: false,
      reason: 'database-unavailable',
      message: 'Failed to connect to database: refused',
    });
    expect(agent.isInitialized).toBe(false);
  });

  it('reports a model that cannot be used', async () => {
    completer.verify.mockRejectedValueOnce(
      new LLMError("Model 'llama3.1' is not available. Pull it with 'ollama pull llama3.1'")
    );
    const loadSchema = vi.fn(async () => ({ tables: [], views: [], relationships: [] }));
    const guarded = new SqlAgent(
      { connection, index, completer, schemaLoader: loadSchema },
      { similarityThreshold: 0.7, maxRetrievedDocs: 5, maxHistory: 10 }
    );

    expect(await guarded.initialize()).toEqual({
      ok: false,
      reason: 'llm-unavailable',
      message: "Model 'llama3.1' is not available. Pull it with 'ollama pull llama3.1'",
    });
    expect(guarded.isInitialized).toBe(false);
    expect(loadSchema).not.toHaveBeenCalled();
  });

  it('reports introspection failures', async () => {
    const failing = new SqlAgent(
      {
        connection,
        index,
        completer,
        schemaLoader: async () => {
          throw new DatabaseError('catalog unavailable');
        },
      },
      { similarityThreshold: 0.7, maxRetrievedDocs: 5, maxHistory: 10 }
    );

    expect(await failing.initialize()).toEqual({
      ok: false,
      reason: 'schema-introspection-failed',
      message: 'catalog unavailable',
    });
  });

  it('reports an index that cannot be opened', async () => {
    vi.spyOn(index, 'open').mockRejectedValueOnce(new Error('corrupt collection'));

    expect(await agent.initialize()).toEqual({
      ok: false,
      reason: 'index-unavailable',
      message: 'corrupt collection',
    });
  });

  it('reports embedding failures', async () => {
    vi.spyOn(index, 'replaceAll').mockRejectedValueOnce(new EmbeddingError('quota exceeded'));

    expect(await agent.initialize()).toEqual({
      ok: false,
      reason: 'embedding-failed',
      message: 'quota exceeded',
    });
    expect(agent.isInitialized).toBe(false);
  });

  it('rejects blank questions without recording them', async () => {
    await agent.initialize();

    const result = await agent.ask('   ');

    expect(result).toMatchObject({
      success: false,
      errorKind: 'empty-question',
      errorMessage: 'Question cannot be empty',
    });
    expect(completer.complete).not.toHaveBeenCalled();
    expect(agent.history()).toEqual([]);
  });

  it('answers against the database and records the result', async () => {
    await agent.initialize();
    completer.complete
      .mockResolvedValueOnce(CUSTOMERS_SQL)
      .mockResolvedValueOnce('There are three customers.');

    const result = await agent.ask('Who are our customers?');

    expect(result).toMatchObject({
      success: true,
      sqlQuery: CUSTOMERS_SQL,
      rows: [{ name: 'Ada' }, { name: 'Grace' }, { name: 'Linus' }],
      columns: ['name'],
      analysis: 'There are three customers.',
      schemaDocumentsUsed: ['customers', 'orders'],
    });
    expect(agent.history()).toEqual([result]);
    expect(agent.stats()).toMatchObject({
      total: 1,
      successful: 1,
      failed: 0,
      successRate: 100,
    });
  });

  it('records failed questions', async () => {
    await agent.initialize();
    completer.complete.mockResolvedValueOnce('SELECT nope FROM customers');

    const result = await agent.ask('What is nope?');

    expect(result).toMatchObject({ success: false, errorKind: 'invalid-sql' });
    expect(agent.stats()).toMatchObject({ total: 1, successful: 0, failed: 1, successRate: 0 });
  });

  it('refreshes the schema only after initialization', async () => {
    expect(await agent.refreshSchema()).toEqual({
      ok: false,
      reason: 'not-initialized',
      message: 'Agent not initialized. Call initialize() first.',
    });

    await agent.initialize();
    await connection.knex.raw('CREATE TABLE products (id INTEGER PRIMARY KEY, title TEXT)');

    expect(await agent.refreshSchema()).toEqual({
      ok: true,
      value: { totalDocuments: 4, tables: 3, views: 0, relationships: 1 },
    });
    expect(agent.availableTables()).toEqual(['customers', 'orders', 'products']);
  });

  it('clears history and reports how much was removed', async () => {
    await agent.initialize();
    completer.complete.mockResolvedValue(CUSTOMERS_SQL);
    await agent.ask('Who are our customers?');
    await agent.ask('List customers');

    expect(agent.clearHistory()).toBe(2);
    expect(agent.history()).toEqual([]);
  });

  it('stops answering once closed', async () => {
    await agent.initialize();
    await agent.close();

    expect(agent.isInitialized).toBe(false);
    expect(connection.isConnected).toBe(false);
    expect(await agent.ask('Who are our customers?')).toMatchObject({
      errorKind: 'not-initialized',
    });
  });
});
