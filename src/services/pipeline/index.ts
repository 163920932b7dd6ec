export { QuestionPipeline } from './pipeline.js';
export type { PipelineDependencies } from './pipeline.js';
export { assembleContext, CONTEXT_SEPARATOR } from './context.js';
export {
  extractSql,
  fromSqlFence,
  fromAnyFence,
  fromLineScan,
  fromRawText,
  EXTRACTION_STRATEGIES,
} from './sql-extractor.js';
export type { ExtractionStrategy } from './sql-extractor.js';
export { buildSqlPrompt, buildAnalysisPrompt, renderTemplate } from './prompts.js';
export { toSimilarity, maxDistanceFor } from './distance.js';
export type { DistanceMetric } from './distance.js';
export type {
  SchemaIndex,
  QueryExecutor,
  TextCompleter,
  ValidationOutcome,
  ExecutionOutcome,
  PipelineOptions,
} from './types.js';
