/**
 * LLM integration layer using Vercel AI SDK.
 * Supports Anthropic, OpenAI and local Ollama models (through its OpenAI-compatible endpoint).
 */

import { generateText } from 'ai';
import type { LanguageModel } from 'ai';
import { z } from 'zod';
import type { LLMConfig } from '../config.js';
import { logger } from '../utils/logger.js';
import { LLMError, describeError } from '../types/errors.js';
import type { TextCompleter } from './pipeline/types.js';

export interface LLMServiceOptions {
  /** Attempts before giving up. Defaults to 3. */
  maxRetries?: number;
  /** Delay before the first retry; doubles on every further attempt. Defaults to 1000. */
  retryDelayMs?: number;
  /** Used for the Ollama availability check. */
  fetchImpl?: typeof fetch;
}

const OllamaTagsSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

/**
 * Initialize the language model for the configured provider.
 */
export async function initializeModel(config: LLMConfig): Promise<LanguageModel> {
  logger.info(`Initializing LLM: ${config.provider}/${config.model}`);

  switch (config.provider) {
    case 'anthropic': {
      const { createAnthropic } = await import('@ai-sdk/anthropic');
      return createAnthropic({ apiKey: config.apiKey })(config.model);
    }

    case 'openai': {
      const { createOpenAI } = await import('@ai-sdk/openai');
      return createOpenAI({ apiKey: config.apiKey })(config.model);
    }

    case 'ollama': {
      const { createOpenAI } = await import('@ai-sdk/openai');
      const ollama = createOpenAI({
        baseURL: `${config.baseUrl.replace(/\/+$/, '')}/v1`,
        apiKey: 'ollama',
      });
      return ollama.chat(config.model);
    }
  }
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Text completion with exponential-backoff retries.
 */
export class LLMService implements TextCompleter {
  private model: Promise<LanguageModel> | null = null;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly config: LLMConfig,
    options: LLMServiceOptions = {}
  ) {
    this.maxRetries = Math.max(1, options.maxRetries ?? 3);
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * Fail early when the model cannot be used: the Ollama server must be up with the
   * model pulled, and every provider must produce a model instance.
   */
  async verify(): Promise<void> {
    if (this.config.provider === 'ollama') {
      await this.verifyOllama();
    }
    await this.getModel();
  }

  private async verifyOllama(): Promise<void> {
    const baseUrl = this.config.baseUrl.replace(/\/+$/, '');
    const model = this.config.model;

    let response: Response;
    try {
      response = await this.fetchImpl(`${baseUrl}/api/tags`, {
        signal: AbortSignal.timeout(5000),
      });
    } catch (error) {
      throw new LLMError(
        `Ollama service is not reachable at ${baseUrl} (start it with 'ollama serve'): ${describeError(error)}`
      );
    }
    if (!response.ok) {
      throw new LLMError(`Ollama service at ${baseUrl} answered ${response.status}`);
    }

    const body: unknown = await response.json().catch(() => undefined);
    const tags = OllamaTagsSchema.safeParse(body);
    if (!tags.success) {
      throw new LLMError(`Ollama service at ${baseUrl} returned an unexpected model list`);
    }
    if (!tags.data.models.some((entry) => entry.name.startsWith(model))) {
      throw new LLMError(`Model '${model}' is not available. Pull it with 'ollama pull ${model}'`);
    }
  }

  /**
   * Lazily created model, shared by every call.
   */
  private getModel(): Promise<LanguageModel> {
    if (!this.model) {
      this.model = initializeModel(this.config).catch((error: unknown) => {
        this.model = null;
        throw new LLMError(`Failed to initialize LLM: ${describeError(error)}`);
      });
    }
    return this.model;
  }

  async complete(prompt: string): Promise<string> {
    const model = await this.getModel();

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      try {
        const result = await generateText({
          model,
          prompt,
          temperature: this.config.temperature,
          maxOutputTokens: this.config.maxTokens,
          maxRetries: 0,
        });

        logger.info(
          `LLM API call successful - Input: ${result.usage.inputTokens}, Output: ${result.usage.outputTokens}`
        );
        return result.text.trim();
      } catch (error) {
        logger.warn(
          `LLM API call failed (attempt ${attempt + 1}/${this.maxRetries}): ${describeError(error)}`
        );

        if (attempt === this.maxRetries - 1) {
          throw new LLMError(
            `LLM API failed after ${this.maxRetries} attempts: ${describeError(error)}`
          );
        }

        const waitMs = this.retryDelayMs * 2 ** attempt;
        logger.info(`Retrying in ${waitMs}ms...`);
        await sleep(waitMs);
      }
    }

    throw new LLMError('Unexpected error in LLMService.complete');
  }
}
