/**
 * SQL agent: owns the collaborators, the question pipeline and the query history.
 */

import type { Config } from '../config.js';
import type {
  IndexSummary,
  HistoryStats,
  PipelineErrorKind,
  PipelineFailure,
  PipelineResult,
  SchemaDocument,
} from '../types/models.js';
import { describeError } from '../types/errors.js';
import { failure, ok, type Result } from '../types/utils.js';
import { logger } from '../utils/logger.js';
import { DatabaseConnection, KnexQueryExecutor } from './database.js';
import { EmbeddingService } from './embedding.js';
import { QueryHistoryLog } from './history.js';
import { LLMService } from './llm.js';
import { QuestionPipeline } from './pipeline/index.js';
import type {
  PipelineOptions,
  QueryExecutor,
  SchemaIndex,
  TextCompleter,
} from './pipeline/index.js';
import { SchemaCache, SchemaIntrospector, type SchemaLoader } from './schema-cache.js';
import { buildSchemaDocuments } from './schema-documents.js';
import { MemorySchemaIndex } from './vector-store.js';

export type InitializeFailureReason =
  | 'database-unavailable'
  | 'llm-unavailable'
  | 'schema-introspection-failed'
  | 'index-unavailable'
  | 'embedding-failed';

export type RefreshFailureReason =
  | 'not-initialized'
  | 'schema-introspection-failed'
  | 'embedding-failed';

export interface InitializeSummary {
  tables: string[];
  documentsIndexed: number;
  /** True when the index was rebuilt from the database instead of loaded from disk. */
  embedded: boolean;
}

/**
 * Schema index the agent can open, fill and describe.
 */
export interface ManagedSchemaIndex extends SchemaIndex {
  open(): Promise<void>;
  replaceAll(documents: readonly SchemaDocument[]): Promise<void>;
  count(): number;
  summary(): IndexSummary;
  tableNames(): string[];
}

/**
 * Text completer that can check, before any question, that its model is usable.
 */
export interface ManagedCompleter extends TextCompleter {
  verify(): Promise<void>;
}

export interface AgentDependencies {
  connection: DatabaseConnection;
  index: ManagedSchemaIndex;
  completer: ManagedCompleter;
  /** Defaults to a knex executor over `connection`. */
  executor?: QueryExecutor;
  /** Defaults to introspecting `connection`. */
  schemaLoader?: SchemaLoader;
}

export interface AgentOptions extends PipelineOptions {
  maxHistory: number;
}

export class SqlAgent {
  private readonly connection: DatabaseConnection;
  private readonly index: ManagedSchemaIndex;
  private readonly completer: ManagedCompleter;
  private readonly pipeline: QuestionPipeline;
  private readonly schemaCache: SchemaCache;
  private readonly log: QueryHistoryLog;
  private initialized = false;

  constructor(deps: AgentDependencies, options: AgentOptions) {
    this.connection = deps.connection;
    this.index = deps.index;
    this.completer = deps.completer;
    this.log = new QueryHistoryLog(options.maxHistory);
    this.pipeline = new QuestionPipeline(
      {
        index: deps.index,
        executor: deps.executor ?? new KnexQueryExecutor(deps.connection),
        completer: deps.completer,
      },
      options
    );
    this.schemaCache = new SchemaCache(
      deps.schemaLoader ??
        (() =>
          new SchemaIntrospector(this.connection.knex, this.connection.client).load())
    );
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  get databaseClient(): string {
    return this.connection.client;
  }

  /**
   * Connect, check the model, introspect, open the index and embed the schema when the
   * index is empty.
   */
  async initialize(): Promise<Result<InitializeSummary, InitializeFailureReason>> {
    logger.info('Initializing SQL agent...');

    try {
      await this.connection.connect();
    } catch (error) {
      return this.setupFailed('database-unavailable', error);
    }

    try {
      await this.completer.verify();
    } catch (error) {
      return this.setupFailed('llm-unavailable', error);
    }

    let documents: SchemaDocument[];
    try {
      documents = buildSchemaDocuments(await this.schemaCache.refresh());
    } catch (error) {
      return this.setupFailed('schema-introspection-failed', error);
    }

    try {
      await this.index.open();
    } catch (error) {
      return this.setupFailed('index-unavailable', error);
    }

    let embedded = false;
    if (this.index.count() === 0) {
      logger.info(`Embedding ${documents.length} schema documents...`);
      try {
        await this.index.replaceAll(documents);
      } catch (error) {
        return this.setupFailed('embedding-failed', error);
      }
      embedded = true;
    }

    this.initialized = true;
    const tables = this.index.tableNames();
    logger.info(`SQL agent initialized. Available tables: ${tables.join(', ') || '(none)'}`);
    return ok({ tables, documentsIndexed: this.index.count(), embedded });
  }

  /**
   * Re-introspect the database and replace the index contents.
   */
  async refreshSchema(): Promise<Result<IndexSummary, RefreshFailureReason>> {
    if (!this.initialized) {
      return failure('not-initialized', 'Agent not initialized. Call initialize() first.');
    }

    logger.info('Refreshing database schema...');
    this.schemaCache.invalidate();

    let documents: SchemaDocument[];
    try {
      documents = buildSchemaDocuments(await this.schemaCache.refresh());
    } catch (error) {
      return this.setupFailed('schema-introspection-failed', error);
    }

    try {
      await this.index.replaceAll(documents);
    } catch (error) {
      return this.setupFailed('embedding-failed', error);
    }

    logger.info('Schema refreshed successfully');
    return ok(this.index.summary());
  }

  /**
   * Answer one question. Guard failures are returned without touching history.
   */
  async ask(question: string): Promise<PipelineResult> {
    if (!this.initialized) {
      return guardFailure(question, 'not-initialized', 'Agent not initialized. Call initialize() first.');
    }
    if (question.trim() === '') {
      return guardFailure(question, 'empty-question', 'Question cannot be empty');
    }

    logger.info(`Processing question: ${question}`);
    const result = await this.pipeline.process(question);
    this.log.record(result);
    return result;
  }

  history(limit?: number): PipelineResult[] {
    return this.log.recent(limit);
  }

  clearHistory(): number {
    const cleared = this.log.clear();
    logger.info(`Query history cleared (${cleared} entries)`);
    return cleared;
  }

  stats(): HistoryStats {
    return this.log.stats();
  }

  schemaSummary(): IndexSummary {
    return this.index.summary();
  }

  availableTables(): string[] {
    return this.initialized ? this.index.tableNames() : [];
  }

  documentCount(): number {
    return this.index.count();
  }

  async close(): Promise<void> {
    this.initialized = false;
    await this.connection.close();
  }

  private setupFailed<R extends string>(reason: R, error: unknown) {
    const message = describeError(error);
    logger.error({ err: error, reason }, 'SQL agent setup step failed');
    return failure(reason, message);
  }
}

function guardFailure(
  question: string,
  errorKind: PipelineErrorKind,
  errorMessage: string
): PipelineFailure {
  return {
    success: false,
    question,
    errorKind,
    errorMessage,
    schemaDocumentsUsed: [],
    processingTimeSeconds: 0,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Wire an agent from configuration with the bundled collaborators.
 */
export function createAgent(config: Config): SqlAgent {
  const connection = new DatabaseConnection(config.KNEX_CONFIG);
  const index = new MemorySchemaIndex(new EmbeddingService(config.EMBEDDING_CONFIG), {
    directory: config.VECTOR_STORE_PATH,
    collection: config.VECTOR_COLLECTION,
    embeddingModel: `${config.EMBEDDING_CONFIG.provider}/${config.EMBEDDING_CONFIG.model}`,
  });

  return new SqlAgent(
    { connection, index, completer: new LLMService(config.LLM_CONFIG) },
    {
      similarityThreshold: config.SIMILARITY_THRESHOLD,
      maxRetrievedDocs: config.MAX_RETRIEVED_DOCS,
      maxHistory: config.MAX_QUERY_HISTORY,
    }
  );
}
