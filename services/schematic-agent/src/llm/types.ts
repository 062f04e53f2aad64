/**
 * Schematic Agent - LLM Type Definitions
 *
 * Types for the chat-completions client and prompt management
 */

// ============================================================================
// Message Types
// ============================================================================

export type LLMRole = 'system' | 'user' | 'assistant';

export interface LLMMessage {
  role: LLMRole;
  content: string;
  name?: string;
}

// ============================================================================
// Request/Response Types
// ============================================================================

export interface LLMOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  topP?: number;
  stopSequences?: string[];
  responseFormat?: 'text' | 'json';
  timeout?: number;
}

export interface LLMResponse {
  id: string;
  model: string;
  content: string;
  finishReason: FinishReason;
  usage: TokenUsage;
  latencyMs: number;
}

export type FinishReason = 'stop' | 'length' | 'content_filter' | 'error';

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

// ============================================================================
// Validation Types
// ============================================================================

export interface ValidatedResponse<T> {
  success: boolean;
  data?: T;
  raw: string;
  attempts: number;
  error?: string;
}

/**
 * The seam agents depend on. Tests substitute an in-memory implementation.
 */
export interface LLMClient {
  callLLM(messages: LLMMessage[], options?: LLMOptions): Promise<LLMResponse>;
  callLLMWithValidation<T>(
    messages: LLMMessage[],
    validator: (response: string) => T | null,
    options?: LLMOptions,
    maxRetries?: number
  ): Promise<ValidatedResponse<T>>;
}

// ============================================================================
// Rate Limiting / Errors
// ============================================================================

export interface RateLimitState {
  requestCount: number;
  tokenCount: number;
  windowStart: number;
  retryAfter?: number;
}

export interface LLMErrorDetails {
  code: LLMErrorCode;
  message: string;
  retryable: boolean;
  retryAfterMs?: number;
}

export type LLMErrorCode =
  | 'RATE_LIMIT'
  | 'CONTEXT_LENGTH'
  | 'AUTHENTICATION'
  | 'SERVER_ERROR'
  | 'TIMEOUT'
  | 'NETWORK_ERROR'
  | 'UNKNOWN';
