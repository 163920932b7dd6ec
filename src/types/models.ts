/**
 * Type definitions and Zod schemas for type-safe data validation.
 */

import { z } from 'zod';
import type { JsonObject } from './utils.js';

// ============================================================================
// SCHEMA DOCUMENTS
// ============================================================================

export const DocumentKindSchema = z.enum(['table', 'view', 'relationships']);
export type DocumentKind = z.infer<typeof DocumentKindSchema>;

/**
 * A unit of embedded text describing one table, one view, or the relationship graph.
 */
export const SchemaDocumentSchema = z.object({
	content: z.string(),
	kind: DocumentKindSchema,
	name: z.string(),
	rowCountHint: z.number().int().nonnegative().optional(),
});

export interface SchemaDocument {
	readonly content: string;
	readonly kind: DocumentKind;
	readonly name: string;
	readonly rowCountHint?: number;
}

/**
 * A schema document paired with its dissimilarity to the question (lower is closer).
 */
export interface RetrievedDocument {
	readonly document: SchemaDocument;
	readonly distance: number;
}

// ============================================================================
// INTROSPECTED DATABASE SCHEMA
// ============================================================================

export interface ColumnInfo {
	name: string;
	type: string;
	nullable: boolean;
	defaultValue: string | null;
	primaryKey: boolean;
}

export interface ForeignKeyInfo {
	table: string;
	column: string;
	referencedTable: string;
	referencedColumn: string;
	constraintName: string | null;
}

export interface TableInfo {
	name: string;
	columns: ColumnInfo[];
	foreignKeys: ForeignKeyInfo[];
	sampleRows: JsonObject[];
	rowCount: number | null;
}

export interface ViewInfo {
	name: string;
	columns: ColumnInfo[];
}

export interface SchemaInfo {
	tables: TableInfo[];
	views: ViewInfo[];
	relationships: ForeignKeyInfo[];
}

// ============================================================================
// PIPELINE RESULTS (DISCRIMINATED UNION ON `success`)
// ============================================================================

export type PipelineErrorKind =
	| 'no-relevant-schema'
	| 'generation-failed'
	| 'invalid-sql'
	| 'execution-error'
	| 'empty-question'
	| 'retrieval-failed'
	| 'not-initialized';

interface PipelineResultBase {
	readonly question: string;
	/** Names of the schema documents that grounded generation, best match first. */
	readonly schemaDocumentsUsed: readonly string[];
	readonly processingTimeSeconds: number;
	readonly timestamp: string;
}

export interface PipelineSuccess extends PipelineResultBase {
	readonly success: true;
	readonly sqlQuery: string;
	readonly rows: readonly JsonObject[];
	readonly columns: readonly string[];
	readonly analysis: string;
}

export interface PipelineFailure extends PipelineResultBase {
	readonly success: false;
	/** Present when a statement was generated before the failure. */
	readonly sqlQuery?: string;
	readonly errorKind: PipelineErrorKind;
	readonly errorMessage: string;
}

export type PipelineResult = PipelineSuccess | PipelineFailure;

export interface HistoryStats {
	total: number;
	successful: number;
	failed: number;
	successRate: number;
	avgProcessingTimeSeconds: number;
}

export interface IndexSummary {
	totalDocuments: number;
	tables: number;
	views: number;
	relationships: number;
}

// ============================================================================
// API REQUESTS
// ============================================================================

/**
 * Request model for natural language questions.
 * Blank questions are accepted here and rejected by the agent with `empty-question`.
 */
export const AskRequestSchema = z.object({
	question: z.string().max(2000).describe('Natural language question'),
});
export type AskRequest = z.infer<typeof AskRequestSchema>;

export const HistoryQuerySchema = z.object({
	limit: z.coerce.number().int().positive().optional(),
});
export type HistoryQuery = z.infer<typeof HistoryQuerySchema>;
