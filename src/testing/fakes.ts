/**
 * In-process stand-ins shared by the test suites.
 */

import type { Knex } from 'knex';
import type { ManagedSchemaIndex } from '../services/agent.js';
import type { IndexSummary, RetrievedDocument, SchemaDocument } from '../types/models.js';

/**
 * Schema index that returns every table document at a fixed distance.
 */
export class FakeSchemaIndex implements ManagedSchemaIndex {
  readonly metric = 'cosine' as const;
  documents: SchemaDocument[] = [];

  constructor(private readonly distance: number = 0.1) {}

  async open(): Promise<void> {}

  async replaceAll(documents: readonly SchemaDocument[]): Promise<void> {
    this.documents = [...documents];
  }

  async searchWithScores(_query: string, k: number): Promise<RetrievedDocument[]> {
    return this.documents
      .filter((document) => document.kind === 'table')
      .slice(0, k)
      .map((document) => ({ document, distance: this.distance }));
  }

  count(): number {
    return this.documents.length;
  }

  summary(): IndexSummary {
    const countKind = (kind: SchemaDocument['kind']) =>
      this.documents.filter((document) => document.kind === kind).length;
    return {
      totalDocuments: this.documents.length,
      tables: countKind('table'),
      views: countKind('view'),
      relationships: countKind('relationships'),
    };
  }

  tableNames(): string[] {
    return this.documents
      .filter((document) => document.kind === 'table')
      .map((document) => document.name)
      .sort();
  }
}

export const IN_MEMORY_SQLITE: Knex.Config = {
  client: 'better-sqlite3',
  connection: { filename: ':memory:' },
  useNullAsDefault: true,
};

/**
 * customers(3 rows) and orders(2 rows) with a foreign key between them.
 */
export async function createShopTables(db: Knex): Promise<void> {
  await db.raw(
    "CREATE TABLE customers (id INTEGER PRIMARY KEY, name TEXT NOT NULL, city TEXT DEFAULT 'Paris')"
  );
  await db.raw(
    'CREATE TABLE orders (id INTEGER PRIMARY KEY, customer_id INTEGER NOT NULL REFERENCES customers(id), total REAL)'
  );
  await db('customers').insert([
    { id: 1, name: 'Ada', city: 'Paris' },
    { id: 2, name: 'Grace', city: 'London' },
    { id: 3, name: 'Linus', city: 'Helsinki' },
  ]);
  await db('orders').insert([
    { id: 1, customer_id: 1, total: 120.5 },
    { id: 2, customer_id: 2, total: 80 },
  ]);
}
