/**
 * Collaborator contracts consumed by the question pipeline.
 * Implementations live beside it (knex executor, memory index, AI SDK completer)
 * and tests substitute in-process fakes.
 */

import type { RetrievedDocument } from '../../types/models.js';
import type { JsonObject } from '../../types/utils.js';
import type { DistanceMetric } from './distance.js';

/**
 * Similarity search over embedded schema documents.
 */
export interface SchemaIndex {
  /** Metric the returned distances are expressed in. */
  readonly metric: DistanceMetric;

  /**
   * Up to `k` documents, closest first.
   */
  searchWithScores(query: string, k: number): Promise<RetrievedDocument[]>;
}

export interface ValidationOutcome {
  ok: boolean;
  message: string;
}

export interface ExecutionOutcome {
  rows: JsonObject[];
  columns: string[];
}

/**
 * Validates and runs SQL against the target database.
 */
export interface QueryExecutor {
  /**
   * Non-destructive check, e.g. an EXPLAIN probe.
   */
  validate(sql: string): Promise<ValidationOutcome>;

  /**
   * Rejects when the database refuses or fails the statement.
   */
  execute(sql: string): Promise<ExecutionOutcome>;
}

/**
 * Language model text generation.
 */
export interface TextCompleter {
  complete(prompt: string): Promise<string>;
}

export interface PipelineOptions {
  /** Minimum similarity in [0, 1] a document needs to ground generation. */
  similarityThreshold: number;
  maxRetrievedDocs: number;
  /** Rows handed to the analysis prompt. Defaults to 10. */
  analysisRowLimit?: number;
}
