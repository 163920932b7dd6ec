/**
 * Database service using Knex.js for multi-database support.
 * Supports PostgreSQL, MySQL, SQLite, and SQL Server.
 */

import Database from 'better-sqlite3';
import { knex, type Knex } from 'knex';
import { DatabaseError, SQLExecutionError, describeError } from '../types/errors.js';
import { toJsonObject, type JsonObject } from '../types/utils.js';
import { logger } from '../utils/logger.js';
import type {
  ExecutionOutcome,
  QueryExecutor,
  ValidationOutcome,
} from './pipeline/types.js';

/**
 * Owns the Knex instance for one target database.
 */
export class DatabaseConnection {
  private db: Knex | null = null;

  constructor(private readonly knexConfig: Knex.Config) {}

  /**
   * Knex client name (`pg`, `mysql2`, `better-sqlite3`, `mssql`).
   */
  get client(): string {
    return typeof this.knexConfig.client === 'string' ? this.knexConfig.client : 'custom';
  }

  get isConnected(): boolean {
    return this.db !== null;
  }

  /**
   * Get the current Knex instance.
   */
  get knex(): Knex {
    if (!this.db) {
      throw new DatabaseError('Database not initialized. Call connect() first.');
    }
    return this.db;
  }

  /**
   * Open the pool and test the connection.
   */
  async connect(): Promise<Knex> {
    if (this.db) return this.db;

    const db = knex(this.knexConfig);
    try {
      await db.raw('SELECT 1');
    } catch (error) {
      await db.destroy();
      logger.error({ err: error }, 'Failed to connect to database');
      throw new DatabaseError(`Failed to connect to database: ${describeError(error)}`);
    }

    this.db = db;
    logger.info(`Database connection established: ${this.client}`);
    return db;
  }

  /**
   * Close database connection.
   */
  async close(): Promise<void> {
    if (this.db) {
      await this.db.destroy();
      this.db = null;
      logger.info('Database connection closed');
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRows(value: unknown): JsonObject[] {
  if (!Array.isArray(value)) return [];
  return value.filter(isRecord).map((row) => toJsonObject(row));
}

function fieldNames(fields: unknown): string[] | undefined {
  if (!Array.isArray(fields)) return undefined;
  const names = fields.flatMap((field) =>
    isRecord(field) && typeof field.name === 'string' ? [field.name] : []
  );
  return names.length === fields.length ? names : undefined;
}

function columnsOf(rows: JsonObject[]): string[] {
  return rows.length > 0 ? Object.keys(rows[0]) : [];
}

/**
 * SQL Server recordsets carry `columns` keyed by name, each with its ordinal `index`.
 */
function recordsetColumns(recordset: unknown[]): string[] | undefined {
  if (!('columns' in recordset) || !isRecord(recordset.columns)) return undefined;
  const described = Object.values(recordset.columns).flatMap((column) =>
    isRecord(column) && typeof column.name === 'string'
      ? [{ name: column.name, index: typeof column.index === 'number' ? column.index : 0 }]
      : []
  );
  if (described.length === 0) return undefined;
  return described.sort((a, b) => a.index - b.index).map((column) => column.name);
}

/**
 * Normalize the dialect-specific shapes `knex.raw` resolves with.
 * `knownColumns`, when given, wins over anything read from the result.
 * Order matters: check more specific structures first.
 */
export function normalizeRawResult(result: unknown, knownColumns?: string[]): ExecutionOutcome {
  // PostgreSQL: { rows: [...], fields: [...] }
  if (isRecord(result) && Array.isArray(result.rows)) {
    const rows = toRows(result.rows);
    return { rows, columns: knownColumns ?? fieldNames(result.fields) ?? columnsOf(rows) };
  }

  // SQL Server: { recordset: [...] }
  if (isRecord(result) && Array.isArray(result.recordset)) {
    const rows = toRows(result.recordset);
    return {
      rows,
      columns: knownColumns ?? recordsetColumns(result.recordset) ?? columnsOf(rows),
    };
  }

  if (Array.isArray(result)) {
    // MySQL: [[rows], [fields]]
    if (result.length === 2 && Array.isArray(result[0]) && Array.isArray(result[1])) {
      const rows = toRows(result[0]);
      return { rows, columns: knownColumns ?? fieldNames(result[1]) ?? columnsOf(rows) };
    }

    // SQLite: array of rows directly
    const rows = toRows(result);
    return { rows, columns: knownColumns ?? columnsOf(rows) };
  }

  return { rows: [], columns: knownColumns ?? [] };
}

/**
 * Validates with an EXPLAIN probe and executes raw SQL through Knex.
 */
export class KnexQueryExecutor implements QueryExecutor {
  constructor(private readonly connection: DatabaseConnection) {}

  /**
   * SQL Server has no EXPLAIN; the statement is compiled under NOEXEC instead.
   */
  async validate(sql: string): Promise<ValidationOutcome> {
    if (!this.connection.isConnected) {
      return { ok: false, message: 'Database not connected' };
    }

    const probe =
      this.connection.client === 'mssql'
        ? `SET NOEXEC ON;\n${sql}\n;SET NOEXEC OFF;`
        : `EXPLAIN ${sql}`;

    try {
      await this.connection.knex.raw(probe);
      return { ok: true, message: 'Query is valid' };
    } catch (error) {
      return { ok: false, message: describeError(error) };
    }
  }

  async execute(sql: string): Promise<ExecutionOutcome> {
    let result: unknown;
    let columns: string[] | undefined;
    try {
      if (this.connection.client === 'better-sqlite3') {
        columns = await this.statementColumns(sql);
      }
      result = await this.connection.knex.raw(sql);
    } catch (error) {
      logger.error({ err: error, sql }, 'Query execution failed');
      throw new SQLExecutionError(describeError(error), sql);
    }

    const outcome = normalizeRawResult(result, columns);
    logger.info(`Query executed successfully, returned ${outcome.rows.length} rows`);
    return outcome;
  }

  /**
   * Result columns of a better-sqlite3 statement, known even when it returns no rows.
   */
  private async statementColumns(sql: string): Promise<string[] | undefined> {
    const { client } = this.connection.knex;
    const raw: unknown = await client.acquireConnection();
    try {
      if (!(raw instanceof Database)) return undefined;
      const statement = raw.prepare(sql);
      return statement.reader ? statement.columns().map((column) => column.name) : undefined;
    } finally {
      await client.releaseConnection(raw);
    }
  }
}
