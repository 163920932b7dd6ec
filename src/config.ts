/**
 * Configuration management using Zod for validation.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { existsSync } from 'fs';
import type { Knex } from 'knex';
import { ConfigError } from './types/errors.js';

// Runs before utils/logger.ts reads LOG_LEVEL, which imports this module
const rootDir = join(dirname(fileURLToPath(import.meta.url)), '..');
const envPath = join(rootDir, '.env');
if (existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

export const LogLevelSchema = z
  .enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL'])
  .default('INFO');

/**
 * Configuration schema with validation and defaults.
 */
const ConfigSchema = z.object({
  // LLM Provider Configuration
  LLM_PROVIDER: z.enum(['anthropic', 'openai', 'ollama']).default('ollama'),
  LLM_MODEL: z.string().default('llama3.1'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(4096),
  LLM_BASE_URL: z.string().url().default('http://localhost:11434'),

  // API Keys (provider-specific)
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  COHERE_API_KEY: z.string().optional(),

  // Embeddings
  EMBEDDING_PROVIDER: z.enum(['ollama', 'openai', 'cohere']).default('ollama'),
  EMBEDDING_MODEL: z.string().optional(), // Provider-specific defaults applied in loadConfig()

  // Database Configuration
  DATABASE_TYPE: z.enum(['sqlite3', 'pg', 'mysql2', 'mssql']).default('sqlite3'),
  DATABASE_PATH: z.string().optional(),
  DATABASE_URL: z.string().optional(),

  // Retrieval
  VECTOR_STORE_PATH: z
    .string()
    .default('./data/vectorstore')
    .describe('Directory holding persisted schema embeddings'),
  VECTOR_COLLECTION: z.string().min(1).default('database_schema'),
  SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  MAX_RETRIEVED_DOCS: z.coerce.number().int().positive().default(5),

  // Application
  MAX_QUERY_HISTORY: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: LogLevelSchema,
  PORT: z.coerce.number().int().positive().default(8000),
});

type BaseConfig = z.infer<typeof ConfigSchema>;

export type LLMProvider = BaseConfig['LLM_PROVIDER'];
export type EmbeddingProvider = BaseConfig['EMBEDDING_PROVIDER'];

export interface LLMConfig {
  provider: LLMProvider;
  model: string;
  apiKey?: string;
  baseUrl: string;
  temperature: number;
  maxTokens: number;
}

export interface EmbeddingConfig {
  provider: EmbeddingProvider;
  model: string;
  apiKey?: string;
  baseUrl: string;
}

/**
 * Extended configuration with parsed KNEX_CONFIG, LLM_CONFIG, and EMBEDDING_CONFIG.
 */
export interface Config
  extends Pick<
    BaseConfig,
    | 'VECTOR_STORE_PATH'
    | 'VECTOR_COLLECTION'
    | 'SIMILARITY_THRESHOLD'
    | 'MAX_RETRIEVED_DOCS'
    | 'MAX_QUERY_HISTORY'
    | 'LOG_LEVEL'
    | 'PORT'
  > {
  DATABASE_TYPE: BaseConfig['DATABASE_TYPE'];
  KNEX_CONFIG: Knex.Config;
  LLM_CONFIG: LLMConfig;
  EMBEDDING_CONFIG: EmbeddingConfig;
}

const DEFAULT_EMBEDDING_MODELS: Record<EmbeddingProvider, string> = {
  ollama: 'nomic-embed-text',
  openai: 'text-embedding-3-small',
  cohere: 'embed-english-v3.0',
};

function buildKnexConfig(base: BaseConfig, issues: string[]): Knex.Config {
  if (base.DATABASE_TYPE === 'sqlite3') {
    if (!base.DATABASE_PATH) {
      issues.push('DATABASE_PATH is required when DATABASE_TYPE is sqlite3');
    }
    return {
      client: 'better-sqlite3',
      connection: { filename: base.DATABASE_PATH ?? ':memory:' },
      useNullAsDefault: true,
    };
  }

  if (!base.DATABASE_URL) {
    issues.push(`DATABASE_URL is required when DATABASE_TYPE is ${base.DATABASE_TYPE}`);
  }
  return {
    client: base.DATABASE_TYPE,
    connection: base.DATABASE_URL ?? '',
    pool: { min: 0, max: 10 },
    acquireConnectionTimeout: 30_000,
  };
}

function requireKey(
  key: 'ANTHROPIC_API_KEY' | 'OPENAI_API_KEY' | 'COHERE_API_KEY',
  base: BaseConfig,
  reason: string,
  issues: string[]
): string | undefined {
  const value = base[key];
  if (!value) {
    issues.push(`${key} is required when ${reason}`);
  }
  return value;
}

function buildLLMConfig(base: BaseConfig, issues: string[]): LLMConfig {
  let apiKey: string | undefined;
  switch (base.LLM_PROVIDER) {
    case 'anthropic':
      apiKey = requireKey('ANTHROPIC_API_KEY', base, 'LLM_PROVIDER is anthropic', issues);
      break;
    case 'openai':
      apiKey = requireKey('OPENAI_API_KEY', base, 'LLM_PROVIDER is openai', issues);
      break;
    case 'ollama':
      apiKey = undefined;
      break;
  }

  return {
    provider: base.LLM_PROVIDER,
    model: base.LLM_MODEL,
    apiKey,
    baseUrl: base.LLM_BASE_URL,
    temperature: base.LLM_TEMPERATURE,
    maxTokens: base.LLM_MAX_TOKENS,
  };
}

function buildEmbeddingConfig(base: BaseConfig, issues: string[]): EmbeddingConfig {
  let apiKey: string | undefined;
  switch (base.EMBEDDING_PROVIDER) {
    case 'openai':
      apiKey = requireKey('OPENAI_API_KEY', base, 'EMBEDDING_PROVIDER is openai', issues);
      break;
    case 'cohere':
      apiKey = requireKey('COHERE_API_KEY', base, 'EMBEDDING_PROVIDER is cohere', issues);
      break;
    case 'ollama':
      apiKey = undefined;
      break;
  }

  return {
    provider: base.EMBEDDING_PROVIDER,
    model: base.EMBEDDING_MODEL || DEFAULT_EMBEDDING_MODELS[base.EMBEDDING_PROVIDER],
    apiKey,
    baseUrl: base.LLM_BASE_URL,
  };
}

/**
 * Parse and validate configuration from an environment map.
 * Every problem is collected before throwing so one run reports them all.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      'Configuration validation failed:',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const base = parsed.data;
  const issues: string[] = [];
  const knexConfig = buildKnexConfig(base, issues);
  const llmConfig = buildLLMConfig(base, issues);
  const embeddingConfig = buildEmbeddingConfig(base, issues);

  if (issues.length > 0) {
    throw new ConfigError('Configuration validation failed:', issues);
  }

  return {
    DATABASE_TYPE: base.DATABASE_TYPE,
    VECTOR_STORE_PATH: base.VECTOR_STORE_PATH,
    VECTOR_COLLECTION: base.VECTOR_COLLECTION,
    SIMILARITY_THRESHOLD: base.SIMILARITY_THRESHOLD,
    MAX_RETRIEVED_DOCS: base.MAX_RETRIEVED_DOCS,
    MAX_QUERY_HISTORY: base.MAX_QUERY_HISTORY,
    LOG_LEVEL: base.LOG_LEVEL,
    PORT: base.PORT,
    KNEX_CONFIG: knexConfig,
    LLM_CONFIG: llmConfig,
    EMBEDDING_CONFIG: embeddingConfig,
  };
}

let cachedConfig: Config | null = null;

/**
 * Process-wide configuration, read once from the environment (`.env` included).
 */
export function getConfig(): Config {
  if (cachedConfig) return cachedConfig;

  cachedConfig = loadConfig(process.env);
  return cachedConfig;
}
