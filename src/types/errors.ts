/**
 * Custom error classes for ragsql.
 * Collaborators throw these; the question pipeline turns them into result error kinds.
 */

/**
 * Error thrown when configuration is missing or invalid.
 */
export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join('\n')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Error thrown when the database cannot be reached or introspected.
 */
export class DatabaseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DatabaseError';
    Object.setPrototypeOf(this, DatabaseError.prototype);
  }
}

/**
 * Error thrown when SQL execution fails.
 */
export class SQLExecutionError extends Error {
  public readonly sql?: string;

  constructor(message: string, sql?: string) {
    super(message);
    this.name = 'SQLExecutionError';
    this.sql = sql;
    Object.setPrototypeOf(this, SQLExecutionError.prototype);
  }
}

/**
 * Error thrown when LLM API calls fail.
 */
export class LLMError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LLMError';
    Object.setPrototypeOf(this, LLMError.prototype);
  }
}

/**
 * Error thrown when an embedding request fails or returns an unexpected payload.
 */
export class EmbeddingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EmbeddingError';
    Object.setPrototypeOf(this, EmbeddingError.prototype);
  }
}

/**
 * Error thrown when the vector store cannot be read or written.
 */
export class VectorStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'VectorStoreError';
    Object.setPrototypeOf(this, VectorStoreError.prototype);
  }
}

/**
 * Error thrown when schema context is assembled from nothing.
 */
export class ContextAssemblyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContextAssemblyError';
    Object.setPrototypeOf(this, ContextAssemblyError.prototype);
  }
}

/**
 * Message of an unknown thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
