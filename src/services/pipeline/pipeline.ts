/**
 * Question pipeline: retrieval, context assembly, SQL generation, extraction,
 * validation, execution and analysis for one natural-language question.
 */

import type {
  PipelineErrorKind,
  PipelineFailure,
  PipelineResult,
  RetrievedDocument,
} from '../../types/models.js';
import { describeError } from '../../types/errors.js';
import { roundTo } from '../../types/utils.js';
import type { JsonObject } from '../../types/utils.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import { assembleContext } from './context.js';
import { maxDistanceFor } from './distance.js';
import { buildAnalysisPrompt, buildSqlPrompt } from './prompts.js';
import { extractSql } from './sql-extractor.js';
import type {
  PipelineOptions,
  QueryExecutor,
  SchemaIndex,
  TextCompleter,
} from './types.js';

const DEFAULT_ANALYSIS_ROW_LIMIT = 10;

export interface PipelineDependencies {
  index: SchemaIndex;
  executor: QueryExecutor;
  completer: TextCompleter;
  logger?: Logger;
}

/**
 * Stateless across calls: everything a run needs lives in local variables,
 * and recording history is left to the caller.
 */
export class QuestionPipeline {
  private readonly index: SchemaIndex;
  private readonly executor: QueryExecutor;
  private readonly completer: TextCompleter;
  private readonly logger: Logger;
  private readonly analysisRowLimit: number;

  constructor(
    deps: PipelineDependencies,
    private readonly options: PipelineOptions
  ) {
    this.index = deps.index;
    this.executor = deps.executor;
    this.completer = deps.completer;
    this.logger = deps.logger ?? defaultLogger;
    this.analysisRowLimit = options.analysisRowLimit ?? DEFAULT_ANALYSIS_ROW_LIMIT;
  }

  /**
   * Process a question end to end.
   * Collaborator failures come back as `success: false` results; only analysis
   * failures are absorbed into the analysis text.
   */
  async process(question: string): Promise<PipelineResult> {
    const startedAt = Date.now();
    const elapsed = () => roundTo((Date.now() - startedAt) / 1000, 2);

    const fail = (
      errorKind: PipelineErrorKind,
      errorMessage: string,
      extra: { sqlQuery?: string; schemaDocumentsUsed?: string[] } = {}
    ): PipelineFailure => {
      this.logger.warn({ errorKind, question }, errorMessage);
      return {
        success: false,
        question,
        errorKind,
        errorMessage,
        sqlQuery: extra.sqlQuery,
        schemaDocumentsUsed: extra.schemaDocumentsUsed ?? [],
        processingTimeSeconds: elapsed(),
        timestamp: new Date().toISOString(),
      };
    };

    // RETRIEVE
    let retrieved: RetrievedDocument[];
    try {
      retrieved = await this.retrieve(question);
    } catch (error) {
      return fail('retrieval-failed', `Schema retrieval failed: ${describeError(error)}`);
    }

    if (retrieved.length === 0) {
      return fail('no-relevant-schema', 'No relevant schema information found for the question');
    }
    const schemaDocumentsUsed = retrieved.map((r) => r.document.name);
    this.logger.debug({ schemaDocumentsUsed }, 'Retrieved schema documents');

    // ASSEMBLE + GENERATE-SQL
    const schemaContext = assembleContext(retrieved, this.index.metric);
    let sqlQuery: string | undefined;
    try {
      const completion = await this.completer.complete(buildSqlPrompt(question, schemaContext));
      sqlQuery = extractSql(completion);
    } catch (error) {
      return fail('generation-failed', `Failed to generate SQL query: ${describeError(error)}`, {
        schemaDocumentsUsed,
      });
    }

    if (sqlQuery === undefined) {
      return fail(
        'generation-failed',
        'Failed to generate SQL query: the model response contained no SQL statement',
        { schemaDocumentsUsed }
      );
    }
    this.logger.debug({ sql: sqlQuery }, 'Generated SQL');

    // VALIDATE
    try {
      const validation = await this.executor.validate(sqlQuery);
      if (!validation.ok) {
        return fail('invalid-sql', `Generated SQL query is invalid: ${validation.message}`, {
          sqlQuery,
          schemaDocumentsUsed,
        });
      }
    } catch (error) {
      return fail('invalid-sql', `Generated SQL query is invalid: ${describeError(error)}`, {
        sqlQuery,
        schemaDocumentsUsed,
      });
    }

    // EXECUTE
    let rows: JsonObject[];
    let columns: string[];
    try {
      ({ rows, columns } = await this.executor.execute(sqlQuery));
    } catch (error) {
      return fail('execution-error', `Query execution failed: ${describeError(error)}`, {
        sqlQuery,
        schemaDocumentsUsed,
      });
    }
    this.logger.debug({ rowCount: rows.length }, 'Executed SQL');

    // ANALYZE
    const analysis = await this.analyze(question, sqlQuery, rows);

    return {
      success: true,
      question,
      sqlQuery,
      rows,
      columns,
      analysis,
      schemaDocumentsUsed,
      processingTimeSeconds: elapsed(),
      timestamp: new Date().toISOString(),
    };
  }

  /**
   * Top-K documents whose distance stays within the similarity threshold, rank order kept.
   */
  async retrieve(question: string): Promise<RetrievedDocument[]> {
    const candidates = await this.index.searchWithScores(question, this.options.maxRetrievedDocs);
    const maxDistance = maxDistanceFor(this.options.similarityThreshold, this.index.metric);
    return candidates.filter((candidate) => candidate.distance <= maxDistance);
  }

  private async analyze(question: string, sqlQuery: string, rows: JsonObject[]): Promise<string> {
    try {
      return await this.completer.complete(
        buildAnalysisPrompt(question, sqlQuery, rows, this.analysisRowLimit)
      );
    } catch (error) {
      this.logger.warn({ err: error }, 'Result analysis failed');
      return `Analysis failed: ${describeError(error)}`;
    }
  }
}
