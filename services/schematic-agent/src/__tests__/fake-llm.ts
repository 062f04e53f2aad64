import type { LLMClient, LLMMessage, LLMOptions, LLMResponse, ValidatedResponse } from '../llm/types.js';

export interface RecordedCall {
  messages: LLMMessage[];
  options?: LLMOptions;
}

/**
 * In-memory LLMClient replaying queued replies in order.
 */
export class FakeLLMClient implements LLMClient {
  readonly calls: RecordedCall[] = [];
  private readonly replies: string[];

  constructor(replies: string[] = []) {
    this.replies = [...replies];
  }

  queue(...replies: string[]): void {
    this.replies.push(...replies);
  }

  async callLLM(messages: LLMMessage[], options?: LLMOptions): Promise<LLMResponse> {
    this.calls.push({ messages: [...messages], options });
    const content = this.replies.shift();
    if (content === undefined) {
      throw new Error('FakeLLMClient: no reply queued');
    }
    return {
      id: `fake-${this.calls.length}`,
      model: 'fake-model',
      content,
      finishReason: 'stop',
      usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
      latencyMs: 0,
    };
  }

  async callLLMWithValidation<T>(
    messages: LLMMessage[],
    validator: (response: string) => T | null,
    options?: LLMOptions,
    maxRetries = 3
  ): Promise<ValidatedResponse<T>> {
    let raw = '';
    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      const response = await this.callLLM(messages, options);
      raw = response.content;
      const data = validator(raw);
      if (data !== null) {
        return { success: true, data, raw, attempts: attempt };
      }
    }
    return { success: false, raw, attempts: maxRetries, error: 'Validation returned null' };
  }
}
