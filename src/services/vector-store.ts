/**
 * In-memory vector index over schema documents, persisted as one JSON file per collection.
 */

import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { SchemaDocumentSchema } from '../types/models.js';
import type { IndexSummary, RetrievedDocument, SchemaDocument } from '../types/models.js';
import { VectorStoreError, describeError } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import { cosineSimilarity, type Embedder } from './embedding.js';
import type { SchemaIndex } from './pipeline/types.js';

const StoredEntrySchema = z.object({
  document: SchemaDocumentSchema,
  embedding: z.array(z.number()).min(1),
});

const StoredCollectionSchema = z.object({
  collection: z.string(),
  embeddingModel: z.string().optional(),
  entries: z.array(StoredEntrySchema),
});

interface IndexEntry {
  document: SchemaDocument;
  embedding: number[];
}

export interface MemorySchemaIndexOptions {
  /** Directory for the collection file. Without one the index lives only in memory. */
  directory?: string;
  collection: string;
  /**
   * Identifies the embedder (e.g. `ollama/nomic-embed-text`). A stored collection built by
   * another model is discarded on open, leaving the index empty so it gets re-embedded.
   */
  embeddingModel: string;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class MemorySchemaIndex implements SchemaIndex {
  readonly metric = 'cosine' as const;

  private entries: IndexEntry[] = [];
  private readonly filePath: string | null;

  constructor(
    private readonly embedder: Embedder,
    private readonly options: MemorySchemaIndexOptions
  ) {
    this.filePath = options.directory
      ? join(options.directory, `${options.collection}.json`)
      : null;
  }

  /**
   * Load the persisted collection, if there is one.
   */
  async open(): Promise<void> {
    if (!this.filePath) return;

    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        logger.info(`No persisted collection at ${this.filePath}, starting empty`);
        this.entries = [];
        return;
      }
      throw new VectorStoreError(`Failed to read vector store: ${describeError(error)}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new VectorStoreError(`Vector store file is not valid JSON: ${describeError(error)}`);
    }

    const parsed = StoredCollectionSchema.safeParse(json);
    if (!parsed.success) {
      throw new VectorStoreError(`Vector store file has an unexpected shape: ${this.filePath}`);
    }

    if (parsed.data.embeddingModel !== this.options.embeddingModel) {
      logger.warn(
        `Collection at ${this.filePath} was embedded with ${parsed.data.embeddingModel ?? 'an unknown model'}, ` +
          `not ${this.options.embeddingModel}; it will be rebuilt`
      );
      this.entries = [];
      return;
    }

    this.entries = parsed.data.entries;
    logger.info(`Loaded ${this.entries.length} schema documents from ${this.filePath}`);
  }

  /**
   * Embed `documents` and make them the whole contents of the index.
   * The previous contents stay in place if any embedding fails.
   */
  async replaceAll(documents: readonly SchemaDocument[]): Promise<void> {
    const entries: IndexEntry[] = [];
    for (const document of documents) {
      entries.push({ document, embedding: await this.embedder.embed(document.content) });
    }

    this.entries = entries;
    await this.persist();
    logger.info(`Indexed ${entries.length} schema documents`);
  }

  async searchWithScores(query: string, k: number): Promise<RetrievedDocument[]> {
    if (k <= 0 || this.entries.length === 0) return [];

    const queryEmbedding = await this.embedder.embed(query);
    return this.entries
      .map((entry) => ({
        document: entry.document,
        distance: 1 - cosineSimilarity(queryEmbedding, entry.embedding),
      }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, k);
  }

  count(): number {
    return this.entries.length;
  }

  summary(): IndexSummary {
    const countKind = (kind: SchemaDocument['kind']) =>
      this.entries.filter((entry) => entry.document.kind === kind).length;
    return {
      totalDocuments: this.entries.length,
      tables: countKind('table'),
      views: countKind('view'),
      relationships: countKind('relationships'),
    };
  }

  tableNames(): string[] {
    return this.entries
      .filter((entry) => entry.document.kind === 'table')
      .map((entry) => entry.document.name)
      .sort();
  }

  private async persist(): Promise<void> {
    if (!this.filePath || !this.options.directory) return;

    const payload = JSON.stringify({
      collection: this.options.collection,
      embeddingModel: this.options.embeddingModel,
      entries: this.entries,
    });

    try {
      await mkdir(this.options.directory, { recursive: true });
      const tmpPath = `${this.filePath}.tmp`;
      await writeFile(tmpPath, payload, 'utf8');
      await rename(tmpPath, this.filePath);
    } catch (error) {
      throw new VectorStoreError(`Failed to write vector store: ${describeError(error)}`);
    }
  }
}
