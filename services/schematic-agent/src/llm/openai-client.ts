/**
 * Schematic Agent - OpenAI Chat Completions Client
 *
 * fetch-based client with:
 * - JSON validation with re-prompting
 * - Retry with exponential backoff
 * - Rate limit (429 / Retry-After) handling
 * - Request timeout via AbortController
 * - Token estimation
 */

import { z } from 'zod';
import { config } from '../config.js';
import log from '../utils/logger.js';
import { LLMServiceError, RateLimitError, TimeoutError } from '../utils/errors.js';
import {
  FinishReason,
  LLMClient,
  LLMErrorDetails,
  LLMMessage,
  LLMOptions,
  LLMResponse,
  RateLimitState,
  TokenUsage,
  ValidatedResponse,
} from './types.js';

// ============================================================================
// Constants
// ============================================================================

const PROVIDER = 'OpenAI';
const DEFAULT_MAX_TOKENS = 4096;
const RETRY_DELAY_BASE = 1000; // 1 second
const TOKENS_PER_CHAR_ESTIMATE = 0.25; // Conservative estimate
const RATE_LIMIT_WINDOW_MS = 60000;

export interface OpenAIClientOptions {
  apiKey: string;
  model: string;
  baseUrl: string;
  timeoutMs: number;
  maxRetries: number;
  /** Base for exponential backoff between retries */
  retryDelayMs?: number;
}

// ============================================================================
// API Response Schema
// ============================================================================

const ChatCompletionSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        index: z.number().optional(),
        message: z
          .object({
            role: z.string(),
            content: z.string().nullable(),
          })
          .optional(),
        finish_reason: z.string().nullable().optional(),
      })
    )
    .optional(),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

// ============================================================================
// Token Estimation
// ============================================================================

/**
 * Estimate token count for messages
 * Uses conservative approximation: ~4 characters per token for English text
 */
export function estimateTokens(messages: LLMMessage[]): number {
  let totalChars = 0;

  for (const message of messages) {
    totalChars += message.content.length;
    totalChars += message.role.length + 10; // Role overhead
    if (message.name) {
      totalChars += message.name.length + 5;
    }
  }

  return Math.ceil(totalChars * TOKENS_PER_CHAR_ESTIMATE);
}

// ============================================================================
// Error Handling
// ============================================================================

export function parseError(error: unknown, statusCode?: number): LLMErrorDetails {
  if (error instanceof Error) {
    const message = error.message.toLowerCase();

    if (statusCode === 429 || message.includes('rate limit')) {
      return {
        code: 'RATE_LIMIT',
        message: 'Rate limit exceeded',
        retryable: true,
        retryAfterMs: 60000,
      };
    }

    if (statusCode === 401 || message.includes('unauthorized') || message.includes('api key')) {
      return {
        code: 'AUTHENTICATION',
        message: 'Invalid or missing API key',
        retryable: false,
      };
    }

    if (statusCode === 400 && message.includes('context length')) {
      return {
        code: 'CONTEXT_LENGTH',
        message: 'Input exceeds model context length',
        retryable: false,
      };
    }

    if (statusCode !== undefined && statusCode >= 500) {
      return {
        code: 'SERVER_ERROR',
        message: `Server error ${statusCode}: ${error.message}`,
        retryable: true,
      };
    }

    if (error.name === 'AbortError' || message.includes('timeout') || message.includes('timed out')) {
      return {
        code: 'TIMEOUT',
        message: 'Request timed out',
        retryable: true,
        retryAfterMs: 5000,
      };
    }

    if (message.includes('network') || message.includes('econnrefused') || message.includes('fetch')) {
      return {
        code: 'NETWORK_ERROR',
        message: `Network error - unable to reach ${PROVIDER}`,
        retryable: true,
        retryAfterMs: 5000,
      };
    }

    return {
      code: 'UNKNOWN',
      message: error.message,
      retryable: false,
    };
  }

  return {
    code: 'UNKNOWN',
    message: String(error),
    retryable: false,
  };
}

function mapFinishReason(reason: string | null | undefined): FinishReason {
  switch (reason) {
    case 'stop':
      return 'stop';
    case 'length':
      return 'length';
    case 'content_filter':
      return 'content_filter';
    default:
      return 'stop';
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ============================================================================
// Client
// ============================================================================

export class OpenAIChatClient implements LLMClient {
  private readonly options: OpenAIClientOptions;
  private readonly retryDelayMs: number;
  private readonly rateLimitState: RateLimitState = {
    requestCount: 0,
    tokenCount: 0,
    windowStart: Date.now(),
  };

  constructor(options: OpenAIClientOptions) {
    this.options = options;
    this.retryDelayMs = options.retryDelayMs ?? RETRY_DELAY_BASE;
  }

  get model(): string {
    return this.options.model;
  }

  private checkRateLimit(estimatedTokens: number): void {
    const now = Date.now();

    // Reset window if expired
    if (now - this.rateLimitState.windowStart > RATE_LIMIT_WINDOW_MS) {
      this.rateLimitState.requestCount = 0;
      this.rateLimitState.tokenCount = 0;
      this.rateLimitState.windowStart = now;
    }

    if (this.rateLimitState.retryAfter && now < this.rateLimitState.retryAfter) {
      const waitTime = Math.ceil((this.rateLimitState.retryAfter - now) / 1000);
      throw new RateLimitError(waitTime, { operation: 'checkRateLimit' });
    }

    this.rateLimitState.requestCount++;
    this.rateLimitState.tokenCount += estimatedTokens;
  }

  private handleRateLimitResponse(retryAfterHeader: string | null): number {
    const parsed = retryAfterHeader ? parseInt(retryAfterHeader, 10) : NaN;
    const retryAfterSeconds = Number.isFinite(parsed) ? parsed : 60;
    this.rateLimitState.retryAfter = Date.now() + retryAfterSeconds * 1000;
    return retryAfterSeconds;
  }

  /**
   * Make a basic chat-completions call
   */
  async callLLM(messages: LLMMessage[], options: LLMOptions = {}): Promise<LLMResponse> {
    const model = options.model || this.options.model;
    const timeout = options.timeout || this.options.timeoutMs;
    const maxRetries = this.options.maxRetries;
    const startTime = Date.now();

    if (!this.options.apiKey) {
      throw new LLMServiceError(PROVIDER, 'API key not configured', {
        operation: 'callLLM',
        suggestion: 'Set OPENAI_API_KEY environment variable',
      });
    }

    const estimatedInputTokens = estimateTokens(messages);
    this.checkRateLimit(estimatedInputTokens);

    const requestBody = {
      model,
      messages: messages.map((m) => ({
        role: m.role,
        content: m.content,
        ...(m.name && { name: m.name }),
      })),
      temperature: options.temperature ?? 0.2,
      max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      top_p: options.topP,
      stop: options.stopSequences,
      ...(options.responseFormat === 'json' && {
        response_format: { type: 'json_object' },
      }),
    };

    log.debug('LLM request', {
      model,
      messageCount: messages.length,
      estimatedTokens: estimatedInputTokens,
      operation: 'callLLM',
    });

    const url = `${this.options.baseUrl.replace(/\/+$/, '')}/chat/completions`;
    let lastError: Error | null = null;
    let timedOut = false;
    let attempts = 0;

    while (attempts < maxRetries) {
      attempts++;

      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);

      try {
        const response = await fetch(url, {
          method: 'POST',
          headers: {
            Authorization: `Bearer ${this.options.apiKey}`,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify(requestBody),
          signal: controller.signal,
        });

        clearTimeout(timeoutId);

        if (response.status === 429) {
          const retryAfter = this.handleRateLimitResponse(response.headers.get('Retry-After'));

          if (attempts < maxRetries) {
            log.warn('Rate limited, retrying', { attempt: attempts, retryAfter });
            await sleep(retryAfter * 1000);
            continue;
          }

          throw new RateLimitError(retryAfter, { operation: 'callLLM', model });
        }

        if (!response.ok) {
          const errorBody = await response.text();
          const errorDetails = parseError(new Error(errorBody), response.status);

          if (errorDetails.retryable && attempts < maxRetries) {
            log.warn('Retryable error, retrying', {
              attempt: attempts,
              code: errorDetails.code,
              message: errorDetails.message,
            });
            await sleep(this.retryDelayMs * Math.pow(2, attempts - 1));
            continue;
          }

          throw new LLMServiceError(PROVIDER, errorDetails.message, {
            operation: 'callLLM',
            model,
            statusCode: response.status,
            errorCode: errorDetails.code,
          });
        }

        const parsed = ChatCompletionSchema.safeParse(await response.json());
        if (!parsed.success) {
          throw new LLMServiceError(PROVIDER, 'Malformed chat completion response', {
            operation: 'callLLM',
            model,
          });
        }
        const data = parsed.data;
        const latencyMs = Date.now() - startTime;

        const choice = data.choices?.[0];
        if (!choice) {
          throw new LLMServiceError(PROVIDER, 'No response choice returned', {
            operation: 'callLLM',
            model,
          });
        }

        const usage: TokenUsage = {
          promptTokens: data.usage?.prompt_tokens || estimatedInputTokens,
          completionTokens: data.usage?.completion_tokens || 0,
          totalTokens: data.usage?.total_tokens || estimatedInputTokens,
        };

        const llmResponse: LLMResponse = {
          id: data.id || `chat-${Date.now()}`,
          model: data.model || model,
          content: choice.message?.content || '',
          finishReason: mapFinishReason(choice.finish_reason),
          usage,
          latencyMs,
        };

        log.info('LLM response received', {
          model,
          latencyMs,
          promptTokens: usage.promptTokens,
          completionTokens: usage.completionTokens,
          operation: 'callLLM',
        });

        return llmResponse;
      } catch (error) {
        clearTimeout(timeoutId);
        lastError = error instanceof Error ? error : new Error(String(error));

        if (error instanceof LLMServiceError || error instanceof RateLimitError) {
          throw error;
        }

        const errorDetails = parseError(error);
        timedOut = errorDetails.code === 'TIMEOUT';
        if (errorDetails.retryable && attempts < maxRetries) {
          log.warn('Request failed, retrying', {
            attempt: attempts,
            error: lastError.message,
          });
          await sleep(this.retryDelayMs * Math.pow(2, attempts - 1));
          continue;
        }

        if (timedOut) {
          throw new TimeoutError('callLLM', timeout, { operation: 'callLLM', model, attempts });
        }

        throw new LLMServiceError(PROVIDER, lastError.message, {
          operation: 'callLLM',
          model,
          attempts,
        });
      }
    }

    throw new LLMServiceError(PROVIDER, lastError?.message || 'Max retries exceeded', {
      operation: 'callLLM',
      model,
      attempts,
    });
  }

  /**
   * Make an LLM call with JSON validation, re-prompting on unparseable replies
   */
  async callLLMWithValidation<T>(
    messages: LLMMessage[],
    validator: (response: string) => T | null,
    options: LLMOptions = {},
    maxRetries = 3
  ): Promise<ValidatedResponse<T>> {
    let attempts = 0;
    let lastRaw = '';
    let lastError = '';
    let conversation = messages;

    const llmOptions: LLMOptions = {
      ...options,
      responseFormat: 'json',
    };

    while (attempts < maxRetries) {
      attempts++;

      const response = await this.callLLM(conversation, llmOptions);
      lastRaw = response.content;

      const validated = validator(response.content);
      if (validated !== null) {
        log.debug('LLM validation succeeded', {
          attempts,
          operation: 'callLLMWithValidation',
        });

        return {
          success: true,
          data: validated,
          raw: response.content,
          attempts,
        };
      }

      lastError = 'Validation returned null - response did not match expected schema';
      log.warn('LLM response validation failed', {
        attempt: attempts,
        error: lastError,
        operation: 'callLLMWithValidation',
      });

      if (attempts < maxRetries) {
        conversation = [
          ...conversation,
          {
            role: 'assistant',
            content: response.content,
          },
          {
            role: 'user',
            content: `The previous response could not be parsed correctly. Please ensure your response is valid JSON that matches the requested schema. Error: ${lastError}`,
          },
        ];
      }
    }

    return {
      success: false,
      raw: lastRaw,
      attempts,
      error: lastError,
    };
  }
}

/**
 * Client configured from the environment, with per-call overrides
 */
export function createLLMClient(overrides: Partial<OpenAIClientOptions> = {}): OpenAIChatClient {
  return new OpenAIChatClient({
    apiKey: config.llm.apiKey,
    model: config.llm.model,
    baseUrl: config.llm.baseUrl,
    timeoutMs: config.llm.timeoutMs,
    maxRetries: config.llm.maxRetries,
    ...overrides,
  });
}
