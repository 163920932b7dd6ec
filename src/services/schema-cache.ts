/**
 * Schema introspection and the explicit cache that holds its result.
 */

import type { Knex } from 'knex';
import { SchemaInspector } from 'knex-schema-inspector';
import type {
  ColumnInfo,
  ForeignKeyInfo,
  SchemaInfo,
  TableInfo,
  ViewInfo,
} from '../types/models.js';
import { describeError } from '../types/errors.js';
import { toJsonObject, type JsonObject } from '../types/utils.js';
import { logger } from '../utils/logger.js';
import { normalizeRawResult } from './database.js';

/**
 * Minimal catalog access the introspector needs from a dialect.
 */
export interface CatalogReader {
  tables(): Promise<string[]>;
  columns(table: string): Promise<ColumnInfo[]>;
  foreignKeys(table: string): Promise<ForeignKeyInfo[]>;
}

const SQLITE_CLIENTS = new Set(['better-sqlite3', 'sqlite3']);

function asString(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return String(value);
}

/**
 * Catalog reader over SQLite pragma table-valued functions.
 */
export class SqliteCatalogReader implements CatalogReader {
  constructor(private readonly db: Knex) {}

  async tables(): Promise<string[]> {
    const { rows } = normalizeRawResult(
      await this.db.raw(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
      )
    );
    return rows.flatMap((row) => (typeof row.name === 'string' ? [row.name] : []));
  }

  async columns(table: string): Promise<ColumnInfo[]> {
    const { rows } = normalizeRawResult(
      await this.db.raw('SELECT * FROM pragma_table_info(?) ORDER BY cid', [table])
    );
    return rows.map((row) => {
      const primaryKey = Number(row.pk) > 0;
      return {
        name: String(row.name),
        type: String(row.type ?? ''),
        nullable: !primaryKey && Number(row.notnull) === 0,
        defaultValue: asString(row.dflt_value),
        primaryKey,
      };
    });
  }

  async foreignKeys(table: string): Promise<ForeignKeyInfo[]> {
    const { rows } = normalizeRawResult(
      await this.db.raw('SELECT * FROM pragma_foreign_key_list(?) ORDER BY id, seq', [table])
    );
    return rows.map((row) => ({
      table,
      column: String(row.from),
      referencedTable: String(row.table),
      referencedColumn: asString(row.to) ?? 'rowid',
      constraintName: null,
    }));
  }
}

/**
 * Catalog reader backed by knex-schema-inspector (PostgreSQL, MySQL, SQL Server).
 */
export class InspectorCatalogReader implements CatalogReader {
  private readonly inspector: ReturnType<typeof SchemaInspector>;

  constructor(db: Knex) {
    this.inspector = SchemaInspector(db);
  }

  async tables(): Promise<string[]> {
    return this.inspector.tables();
  }

  async columns(table: string): Promise<ColumnInfo[]> {
    const columns = await this.inspector.columnInfo(table);
    return columns.map((col) => ({
      name: col.name,
      type: col.data_type,
      nullable: col.is_nullable,
      defaultValue: asString(col.default_value),
      primaryKey: col.is_primary_key,
    }));
  }

  async foreignKeys(table: string): Promise<ForeignKeyInfo[]> {
    const keys = await this.inspector.foreignKeys(table);
    return keys.map((fk) => ({
      table: fk.table,
      column: fk.column,
      referencedTable: fk.foreign_key_table,
      referencedColumn: fk.foreign_key_column,
      constraintName: fk.constraint_name ?? null,
    }));
  }
}

const VIEW_QUERIES: Record<string, string> = {
  'better-sqlite3': "SELECT name FROM sqlite_master WHERE type = 'view' ORDER BY name",
  sqlite3: "SELECT name FROM sqlite_master WHERE type = 'view' ORDER BY name",
  pg: 'SELECT table_name AS name FROM information_schema.views WHERE table_schema = current_schema() ORDER BY table_name',
  mysql2:
    'SELECT TABLE_NAME AS name FROM information_schema.VIEWS WHERE TABLE_SCHEMA = DATABASE() ORDER BY TABLE_NAME',
  mssql: 'SELECT TABLE_NAME AS name FROM INFORMATION_SCHEMA.VIEWS ORDER BY TABLE_NAME',
};

export interface IntrospectorOptions {
  /** Sample rows read per table. Defaults to 3. */
  sampleRows?: number;
}

/**
 * Reads tables, views, keys, sample rows and row counts from the live database.
 */
export class SchemaIntrospector {
  private readonly catalog: CatalogReader;
  private readonly sampleRows: number;

  constructor(
    private readonly db: Knex,
    private readonly client: string,
    options: IntrospectorOptions = {}
  ) {
    this.catalog = SQLITE_CLIENTS.has(client)
      ? new SqliteCatalogReader(db)
      : new InspectorCatalogReader(db);
    this.sampleRows = options.sampleRows ?? 3;
  }

  async load(): Promise<SchemaInfo> {
    const tableNames = await this.catalog.tables();
    const tables: TableInfo[] = [];
    for (const name of tableNames) {
      tables.push(await this.describeTable(name));
    }

    const views: ViewInfo[] = [];
    for (const name of await this.viewNames()) {
      views.push({ name, columns: await this.catalog.columns(name) });
    }

    const relationships = tables.flatMap((table) => table.foreignKeys);
    logger.info(
      `Schema information loaded for ${tables.length} tables and ${views.length} views`
    );
    return { tables, views, relationships };
  }

  private async describeTable(name: string): Promise<TableInfo> {
    const columns = await this.catalog.columns(name);

    let foreignKeys: ForeignKeyInfo[] = [];
    try {
      foreignKeys = await this.catalog.foreignKeys(name);
    } catch (error) {
      // Foreign keys might not be supported in all databases
      logger.warn(`Could not fetch foreign keys for ${name}: ${describeError(error)}`);
    }

    return {
      name,
      columns,
      foreignKeys,
      sampleRows: await this.sample(name),
      rowCount: await this.countRows(name),
    };
  }

  private async viewNames(): Promise<string[]> {
    const query = VIEW_QUERIES[this.client];
    if (!query) return [];

    try {
      const { rows } = normalizeRawResult(await this.db.raw(query));
      return rows.flatMap((row) => (typeof row.name === 'string' ? [row.name] : []));
    } catch (error) {
      logger.warn(`Could not list views: ${describeError(error)}`);
      return [];
    }
  }

  private async sample(table: string): Promise<JsonObject[]> {
    try {
      const rows: unknown[] = await this.db.select('*').from(table).limit(this.sampleRows);
      return rows.flatMap((row) =>
        typeof row === 'object' && row !== null ? [toJsonObject(row)] : []
      );
    } catch (error) {
      logger.warn(`Could not get sample data for ${table}: ${describeError(error)}`);
      return [];
    }
  }

  private async countRows(table: string): Promise<number | null> {
    try {
      const result: unknown[] = await this.db(table).count({ count: '*' });
      const first = result[0];
      if (typeof first !== 'object' || first === null || !('count' in first)) return null;
      const count = Number(first.count);
      return Number.isFinite(count) ? count : null;
    } catch (error) {
      logger.warn(`Could not get row count for ${table}: ${describeError(error)}`);
      return null;
    }
  }
}

export type SchemaLoader = () => Promise<SchemaInfo>;

/**
 * Holds the last introspected schema until it is invalidated or refreshed.
 * Concurrent callers share one in-flight load.
 */
export class SchemaCache {
  private cached: SchemaInfo | null = null;
  private loadedAt: Date | null = null;
  private inflight: Promise<SchemaInfo> | null = null;

  constructor(private readonly loader: SchemaLoader) {}

  get isLoaded(): boolean {
    return this.cached !== null;
  }

  get lastLoadedAt(): Date | null {
    return this.loadedAt;
  }

  /**
   * Cached schema, loading it on first use.
   */
  async get(): Promise<SchemaInfo> {
    return this.cached ?? this.refresh();
  }

  /**
   * Reload from the database and replace the cached copy.
   */
  refresh(): Promise<SchemaInfo> {
    if (this.inflight) return this.inflight;

    this.inflight = this.loader()
      .then((info) => {
        this.cached = info;
        this.loadedAt = new Date();
        return info;
      })
      .finally(() => {
        this.inflight = null;
      });
    return this.inflight;
  }

  invalidate(): void {
    this.cached = null;
    this.loadedAt = null;
  }
}
