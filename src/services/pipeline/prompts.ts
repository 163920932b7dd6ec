/**
 * Prompt templates for SQL generation and result analysis.
 */

import type { JsonObject } from '../../types/utils.js';

export const SQL_GENERATION_TEMPLATE = `You are an expert SQL query generator. Convert the user's question into one accurate SQL query using the database schema information below.

Database Schema Information:
{schema_context}

User Question: {question}

Rules:
- Only use tables and columns that appear in the schema information above
- Join related tables through their foreign keys when the question spans several tables
- Use aggregate functions (COUNT, SUM, AVG, MIN, MAX) when the question asks for totals, counts or averages
- Filter with WHERE clauses and order the results when the question implies it
- Be careful with date and time comparisons
- If the question cannot be answered from this schema, say so in one sentence instead of writing SQL

Respond with ONLY the SQL query, without explanations.

SQL Query:`;

export const ANALYSIS_TEMPLATE = `You are a data analyst. Analyze the results of a SQL query that answered a user's question.

Original Question: {question}
SQL Query: {sql_query}
Query Results (first {row_count} of {total_rows} rows):
{results}

Provide:
1. A short summary of the findings
2. Key insights and trends
3. Notable patterns or anomalies
4. Recommendations based on the data

Analysis:`;

/**
 * Replace `{name}` placeholders. Unknown placeholders are left as they are.
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? values[name] : placeholder
  );
}

export function buildSqlPrompt(question: string, schemaContext: string): string {
  return renderTemplate(SQL_GENERATION_TEMPLATE, {
    schema_context: schemaContext,
    question,
  });
}

/**
 * Analysis prompt carrying at most `rowLimit` rows of the result set.
 */
export function buildAnalysisPrompt(
  question: string,
  sqlQuery: string,
  rows: readonly JsonObject[],
  rowLimit: number
): string {
  const shown = rows.slice(0, rowLimit);
  return renderTemplate(ANALYSIS_TEMPLATE, {
    question,
    sql_query: sqlQuery,
    row_count: String(shown.length),
    total_rows: String(rows.length),
    results: JSON.stringify(shown),
  });
}
