/**
 * LLM client for narrative generation.
 *
 * OPTIONAL: without a key the server writes template narratives. With one,
 * narratives come from the Anthropic Messages API. Calls carry a client-side
 * timeout and are not retried; callers fall back to templates on any failure.
 */

import type Anthropic from '@anthropic-ai/sdk';
import { logger } from '../utils/logger.js';

export interface LLMClientConfig {
  anthropicApiKey?: string | undefined;
  /** Model ID; defaults to the sonnet model */
  model?: string | undefined;
  /** Abort requests after this many milliseconds */
  timeoutMs?: number | undefined;
}

export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

export interface GenerateOptions {
  maxTokens?: number;
  /** Temperature for sampling (0-1) */
  temperature?: number;
  systemPrompt?: string;
}

/**
 * What the insight summarizer needs from a text generator
 */
export interface NarrativeGenerator {
  isAvailable(): boolean;
  generate(prompt: string, options?: GenerateOptions): Promise<LLMResponse>;
}

export enum LLMErrorCode {
  NO_API_KEY = 'NO_API_KEY',
  API_ERROR = 'API_ERROR',
  RATE_LIMIT = 'RATE_LIMIT',
  TIMEOUT = 'TIMEOUT',
  INVALID_RESPONSE = 'INVALID_RESPONSE',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

export class LLMError extends Error {
  constructor(
    message: string,
    public code: LLMErrorCode,
    public details?: unknown
  ) {
    super(message);
    this.name = 'LLMError';
  }
}

export const DEFAULT_MODEL = 'claude-3-5-sonnet-20241022';

export const DEFAULT_TIMEOUT_MS = 30_000;

const DEFAULT_MAX_TOKENS = 1024;

/**
 * Status code carried by SDK API errors, if any
 */
function errorStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'APIConnectionTimeoutError' || /timed? ?out/i.test(error.message));
}

export class LLMClient implements NarrativeGenerator {
  private readonly apiKey: string | null;
  private readonly model: string;
  private readonly timeoutMs: number;
  private anthropicClient: Anthropic | null = null;

  constructor(config?: LLMClientConfig) {
    this.apiKey = config?.anthropicApiKey || null;
    this.model = config?.model ?? DEFAULT_MODEL;
    this.timeoutMs = config?.timeoutMs ?? DEFAULT_TIMEOUT_MS;

    if (this.apiKey) {
      logger.info('LLM client initialized with API key', { model: this.model, timeoutMs: this.timeoutMs });
    } else {
      logger.info('LLM client initialized without API key; narratives use templates');
    }
  }

  /**
   * Lazy-load the Anthropic SDK so template-only deployments never touch it
   */
  private async getAnthropicClient(): Promise<Anthropic> {
    if (!this.apiKey) {
      throw new LLMError(
        'No API key available. Set ANTHROPIC_API_KEY or anthropicApiKey in assessment.config.json.',
        LLMErrorCode.NO_API_KEY
      );
    }

    if (!this.anthropicClient) {
      try {
        const { default: AnthropicSdk } = await import('@anthropic-ai/sdk');
        this.anthropicClient = new AnthropicSdk({
          apiKey: this.apiKey,
          timeout: this.timeoutMs,
          maxRetries: 0,
        });
        logger.debug('Anthropic client initialized');
      } catch (error) {
        throw new LLMError(
          'Failed to initialize Anthropic SDK',
          LLMErrorCode.CONFIGURATION_ERROR,
          error
        );
      }
    }

    return this.anthropicClient;
  }

  public isAvailable(): boolean {
    return this.apiKey !== null;
  }

  /**
   * Single generation attempt
   *
   * @throws {LLMError} On a missing key, API failure, timeout or empty response
   */
  public async generate(prompt: string, options: GenerateOptions = {}): Promise<LLMResponse> {
    this.validatePrompt(prompt);

    const startTime = Date.now();
    const maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;

    logger.info('Starting LLM generation', {
      model: this.model,
      maxTokens,
      promptLength: prompt.length,
    });

    try {
      const client = await this.getAnthropicClient();
      const response = await client.messages.create({
        model: this.model,
        max_tokens: maxTokens,
        temperature: options.temperature ?? 0.7,
        ...(options.systemPrompt !== undefined && { system: options.systemPrompt }),
        messages: [{ role: 'user', content: prompt }],
      });

      const content = this.extractContent(response);
      const usage = {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      };

      logger.info('LLM generation completed', {
        model: this.model,
        elapsedMs: Date.now() - startTime,
        inputTokens: usage.inputTokens,
        outputTokens: usage.outputTokens,
        contentLength: content.length,
      });

      return { content, model: response.model, usage };
    } catch (error) {
      throw this.wrapError(error, Date.now() - startTime);
    }
  }

  private wrapError(error: unknown, elapsedMs: number): LLMError {
    if (error instanceof LLMError) {
      return error;
    }

    const status = errorStatus(error);

    if (status === 429) {
      logger.warn('Rate limit exceeded', error, { elapsedMs });
      return new LLMError('Rate limit exceeded. Please try again later.', LLMErrorCode.RATE_LIMIT, error);
    }

    if (isTimeout(error)) {
      logger.warn('LLM request timed out', error, { elapsedMs, timeoutMs: this.timeoutMs });
      return new LLMError(`Request timed out after ${this.timeoutMs}ms`, LLMErrorCode.TIMEOUT, error);
    }

    if (status !== undefined) {
      logger.error('API error during generation', error, { status, elapsedMs });
      const message = error instanceof Error ? error.message : 'Unknown error';
      return new LLMError(`API error: ${message}`, LLMErrorCode.API_ERROR, error);
    }

    logger.error('Unknown error during generation', error, { elapsedMs });
    return new LLMError('Failed to generate response', LLMErrorCode.API_ERROR, error);
  }

  private extractContent(response: Anthropic.Message): string {
    for (const block of response.content) {
      if (block.type === 'text' && block.text.trim().length > 0) {
        return block.text;
      }
    }
    throw new LLMError(
      'Invalid API response: no text content found',
      LLMErrorCode.INVALID_RESPONSE,
      { stopReason: response.stop_reason }
    );
  }

  public validatePrompt(prompt: string): void {
    if (!prompt || prompt.trim().length === 0) {
      throw new LLMError('Prompt cannot be empty', LLMErrorCode.CONFIGURATION_ERROR);
    }

    if (prompt.length > 100000) {
      logger.warn('Very long prompt detected', undefined, { length: prompt.length });
    }
  }
}

export function createClient(config?: LLMClientConfig): LLMClient {
  return new LLMClient(config);
}
