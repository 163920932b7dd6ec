/**
 * Turns introspected schema information into the text documents that get embedded.
 */

import type {
  ColumnInfo,
  ForeignKeyInfo,
  SchemaDocument,
  SchemaInfo,
  TableInfo,
  ViewInfo,
} from '../types/models.js';

export const RELATIONSHIPS_DOCUMENT_NAME = 'database_relationships';

/** Sample rows quoted in a table document. */
const SAMPLE_ROWS_IN_DOCUMENT = 2;

function describeColumn(column: ColumnInfo, withConstraints: boolean): string {
  const details = [column.type || 'unknown'];
  if (withConstraints) {
    if (!column.nullable) details.push('NOT NULL');
    if (column.defaultValue !== null) details.push(`DEFAULT ${column.defaultValue}`);
  }
  return `- ${column.name} (${details.join(', ')})`;
}

export function formatTable(table: TableInfo): string {
  const lines = [
    `Table: ${table.name}`,
    `Description: This is a database table named ${table.name}`,
    'Columns:',
    ...table.columns.map((column) => describeColumn(column, true)),
  ];

  const primaryKey = table.columns.filter((c) => c.primaryKey).map((c) => c.name);
  if (primaryKey.length > 0) {
    lines.push(`Primary Key: ${primaryKey.join(', ')}`);
  }

  for (const fk of table.foreignKeys) {
    lines.push(`Foreign Key: ${fk.column} -> ${fk.referencedTable}.${fk.referencedColumn}`);
  }

  const samples = table.sampleRows.slice(0, SAMPLE_ROWS_IN_DOCUMENT);
  if (samples.length > 0) {
    lines.push('Sample data shows:');
    for (const row of samples) {
      lines.push(`- ${JSON.stringify(row)}`);
    }
  }

  if (table.rowCount !== null) {
    lines.push(`Approximate row count: ${table.rowCount}`);
  }

  return lines.join('\n');
}

export function formatView(view: ViewInfo): string {
  return [
    `View: ${view.name}`,
    `Description: This is a database view named ${view.name}`,
    'Columns:',
    ...view.columns.map((column) => describeColumn(column, false)),
  ].join('\n');
}

export function formatRelationships(relationships: readonly ForeignKeyInfo[]): string {
  return [
    'Database Relationships:',
    'This document describes the foreign key relationships between tables.',
    '',
    ...relationships.map(
      (rel) => `- ${rel.table}.${rel.column} references ${rel.referencedTable}.${rel.referencedColumn}`
    ),
  ].join('\n');
}

/**
 * One document per table and view, plus one for the relationship graph when it is not empty.
 */
export function buildSchemaDocuments(info: SchemaInfo): SchemaDocument[] {
  const documents: SchemaDocument[] = [];

  for (const table of info.tables) {
    documents.push({
      content: formatTable(table),
      kind: 'table',
      name: table.name,
      ...(table.rowCount !== null ? { rowCountHint: table.rowCount } : {}),
    });
  }

  for (const view of info.views) {
    documents.push({ content: formatView(view), kind: 'view', name: view.name });
  }

  if (info.relationships.length > 0) {
    documents.push({
      content: formatRelationships(info.relationships),
      kind: 'relationships',
      name: RELATIONSHIPS_DOCUMENT_NAME,
    });
  }

  return documents;
}
