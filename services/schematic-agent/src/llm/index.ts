/**
 * Schematic Agent - LLM Module
 *
 * Chat-completions client with the prompts used by the Architect and
 * Validator agents.
 *
 * Usage:
 * ```typescript
 * import { createLLMClient, architectPrompts } from './llm/index.js';
 *
 * const client = createLLMClient();
 * const result = await client.callLLMWithValidation(
 *   architectPrompts.placementPrompt(title, parts),
 *   architectPrompts.validatePlacementResponse,
 *   { temperature: 0.1 }
 * );
 * ```
 */

export { OpenAIChatClient, createLLMClient, estimateTokens, parseError } from './openai-client.js';
export type { OpenAIClientOptions } from './openai-client.js';

export type {
  FinishReason,
  LLMClient,
  LLMMessage,
  LLMOptions,
  LLMResponse,
  LLMRole,
  TokenUsage,
  ValidatedResponse,
} from './types.js';

export * as architectPrompts from './prompts/architect-prompts.js';
export * as validatorPrompts from './prompts/validator-prompts.js';
export { extractJsonObject } from './prompts/json-reply.js';
