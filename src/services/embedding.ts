/**
 * Embedding service for schema documents and questions.
 * Generates vector embeddings over the provider HTTP APIs.
 */

import { z } from 'zod';
import type { EmbeddingConfig } from '../config.js';
import { logger } from '../utils/logger.js';
import { EmbeddingError, describeError } from '../types/errors.js';

/**
 * Turns text into a vector.
 */
export interface Embedder {
  embed(text: string): Promise<number[]>;
}

/**
 * Calculate cosine similarity between two vectors.
 * Returns a value between -1 (opposite) and 1 (identical), or 0 when either is all zeros.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error('Vectors must have the same length');
  }

  let dotProduct = 0;
  let magnitudeA = 0;
  let magnitudeB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    magnitudeA += a[i] * a[i];
    magnitudeB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(magnitudeA) * Math.sqrt(magnitudeB);
  if (magnitude === 0) return 0;

  return dotProduct / magnitude;
}

const Vector = z.array(z.number()).min(1);

const OpenAIEmbeddingResponse = z.object({
  data: z.array(z.object({ embedding: Vector })).min(1),
});

const CohereEmbeddingResponse = z.object({
  embeddings: z.array(Vector).min(1),
});

const OllamaEmbeddingResponse = z.object({
  embedding: Vector,
});

const OPENAI_EMBEDDINGS_URL = 'https://api.openai.com/v1/embeddings';
const COHERE_EMBED_URL = 'https://api.cohere.ai/v1/embed';

type FetchLike = typeof fetch;

/**
 * Embedder for the configured provider (OpenAI, Cohere or a local Ollama server).
 */
export class EmbeddingService implements Embedder {
  constructor(
    private readonly config: EmbeddingConfig,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  async embed(text: string): Promise<number[]> {
    const { provider, model } = this.config;
    logger.debug(`Generating embedding with ${provider}/${model}`);

    try {
      switch (provider) {
        case 'openai':
          return await this.openai(text);
        case 'cohere':
          return await this.cohere(text);
        case 'ollama':
          return await this.ollama(text);
      }
    } catch (error) {
      logger.error(`Embedding generation failed: ${describeError(error)}`);
      if (error instanceof EmbeddingError) throw error;
      throw new EmbeddingError(`Failed to generate embedding: ${describeError(error)}`);
    }
  }

  private async openai(text: string): Promise<number[]> {
    const data = await this.post(
      OPENAI_EMBEDDINGS_URL,
      { input: text, model: this.config.model },
      OpenAIEmbeddingResponse,
      'OpenAI'
    );
    return data.data[0].embedding;
  }

  private async cohere(text: string): Promise<number[]> {
    const data = await this.post(
      COHERE_EMBED_URL,
      { texts: [text], model: this.config.model, input_type: 'search_query' },
      CohereEmbeddingResponse,
      'Cohere'
    );
    return data.embeddings[0];
  }

  private async ollama(text: string): Promise<number[]> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/api/embeddings`;
    const data = await this.post(
      url,
      { model: this.config.model, prompt: text },
      OllamaEmbeddingResponse,
      'Ollama'
    );
    return data.embedding;
  }

  private async post<T>(
    url: string,
    body: Record<string, unknown>,
    schema: z.ZodType<T>,
    label: string
  ): Promise<T> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.apiKey) {
      headers.Authorization = `Bearer ${this.config.apiKey}`;
    }

    const response = await this.fetchImpl(url, {
      method: 'POST',
      headers,
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      const detail = await response.text();
      throw new EmbeddingError(`${label} API error: ${response.status} - ${detail}`);
    }

    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      throw new EmbeddingError(`${label} API returned an unexpected embedding payload`);
    }
    return parsed.data;
  }
}
