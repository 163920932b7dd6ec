import { describe, it, expect, vi, type Mock } from 'vitest';
import { EmbeddingService, cosineSimilarity } from './embedding.js';
import type { EmbeddingConfig } from '../config.js';
import { EmbeddingError } from '../types/errors.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function serviceWith(config: EmbeddingConfig, response: Response) {
  const fetchImpl = vi.fn<typeof fetch>(async () => response);
  return { service: new EmbeddingService(config, fetchImpl), fetchImpl };
}

function requestOf(fetchImpl: Mock<typeof fetch>) {
  const [url, init] = fetchImpl.mock.calls[0];
  return { url, body: JSON.parse(String(init?.body)), headers: init?.headers };
}

describe('EmbeddingService', () => {
  it('calls the Ollama embeddings endpoint', async () => {
    const { service, fetchImpl } = serviceWith(
      { provider: 'ollama', model: 'nomic-embed-text', baseUrl: 'http://localhost:11434/' },
      jsonResponse({ embedding: [0.1, 0.2] })
    );

    expect(await service.embed('hello')).toEqual([0.1, 0.2]);

    const request = requestOf(fetchImpl);
    expect(request.url).toBe('http://localhost:11434/api/embeddings');
    expect(request.body).toEqual({ model: 'nomic-embed-text', prompt: 'hello' });
    expect(request.headers).toEqual({ 'Content-Type': 'application/json' });
  });

  it('sends the OpenAI key as a bearer token', async () => {
    const { service, fetchImpl } = serviceWith(
      {
        provider: 'openai',
        model: 'text-embedding-3-small',
        apiKey: 'test-key',
        baseUrl: 'http://localhost:11434',
      },
      jsonResponse({ data: [{ embedding: [1, 2, 3] }] })
    );

    expect(await service.embed('hello')).toEqual([1, 2, 3]);

    const request = requestOf(fetchImpl);
    expect(request.url).toBe('https://api.openai.com/v1/embeddings');
    expect(request.body).toEqual({ input: 'hello', model: 'text-embedding-3-small' });
    expect(request.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-key',
    });
  });

  it('embeds with Cohere as a search query', async () => {
    const { service, fetchImpl } = serviceWith(
      {
        provider: 'cohere',
        model: 'embed-english-v3.0',
        apiKey: 'test-key',
        baseUrl: 'http://localhost:11434',
      },
      jsonResponse({ embeddings: [[0.5, 0.5]] })
    );

    expect(await service.embed('hello')).toEqual([0.5, 0.5]);
    expect(requestOf(fetchImpl).body).toEqual({
      texts: ['hello'],
      model: 'embed-english-v3.0',
      input_type: 'search_query',
    });
  });

  it('reports HTTP errors', async () => {
    const { service } = serviceWith(
      { provider: 'openai', model: 'm', apiKey: 'test-key', baseUrl: 'http://localhost:11434' },
      new Response('quota exceeded', { status: 429 })
    );

    await expect(service.embed('hello')).rejects.toThrow(
      new EmbeddingError('OpenAI API error: 429 - quota exceeded')
    );
  });

  it('rejects unexpected payloads', async () => {
    const { service } = serviceWith(
      { provider: 'openai', model: 'm', apiKey: 'test-key', baseUrl: 'http://localhost:11434' },
      jsonResponse({ data: [] })
    );

    await expect(service.embed('hello')).rejects.toThrow(
      'OpenAI API returned an unexpected embedding payload'
    );
  });

  it('wraps transport failures', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw new Error('connect ECONNREFUSED');
    });
    const service = new EmbeddingService(
      { provider: 'ollama', model: 'nomic-embed-text', baseUrl: 'http://localhost:11434' },
      fetchImpl
    );

    const error = await service.embed('hello').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(EmbeddingError);
    expect(error).toMatchObject({
      message: 'Failed to generate embedding: connect ECONNREFUSED',
    });
  });
});

describe('cosineSimilarity', () => {
  it('is 1 for identical directions and 0 for orthogonal ones', () => {
    expect(cosineSimilarity([2, 0], [5, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('is 0 against a zero vector', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('rejects vectors of different lengths', () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow('Vectors must have the same length');
  });
});
