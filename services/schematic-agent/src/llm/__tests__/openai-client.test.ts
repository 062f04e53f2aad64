import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OpenAIChatClient, estimateTokens, parseError } from '../openai-client.js';
import { LLMServiceError, RateLimitError } from '../../utils/errors.js';
import type { LLMMessage } from '../types.js';

const fetchMock = vi.fn<typeof fetch>();

function completion(content: string, finishReason = 'stop'): Response {
  return new Response(
    JSON.stringify({
      id: 'chatcmpl-1',
      model: 'gpt-test',
      choices: [{ index: 0, message: { role: 'assistant', content }, finish_reason: finishReason }],
      usage: { prompt_tokens: 11, completion_tokens: 7, total_tokens: 18 },
    }),
    { status: 200, headers: { 'Content-Type': 'application/json' } }
  );
}

function errorResponse(status: number, body: string, headers: Record<string, string> = {}): Response {
  return new Response(body, { status, headers });
}

function requestBody(call: number): unknown {
  return JSON.parse(String(fetchMock.mock.calls[call]?.[1]?.body));
}

function client(overrides: Partial<ConstructorParameters<typeof OpenAIChatClient>[0]> = {}): OpenAIChatClient {
  return new OpenAIChatClient({
    apiKey: 'test-key',
    model: 'gpt-test',
    baseUrl: 'https://llm.test/v1/',
    timeoutMs: 5000,
    maxRetries: 3,
    retryDelayMs: 0,
    ...overrides,
  });
}

const MESSAGES: LLMMessage[] = [
  { role: 'system', content: 'You are terse.' },
  { role: 'user', content: 'Say hi' },
];

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('OpenAIChatClient.callLLM', () => {
  it('posts a chat completion request and maps the reply', async () => {
    fetchMock.mockResolvedValueOnce(completion('hi', 'length'));

    const response = await client().callLLM(MESSAGES, { maxTokens: 100 });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://llm.test/v1/chat/completions');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ Authorization: 'Bearer test-key', 'Content-Type': 'application/json' });
    expect(requestBody(0)).toEqual({
      model: 'gpt-test',
      messages: [
        { role: 'system', content: 'You are terse.' },
        { role: 'user', content: 'Say hi' },
      ],
      temperature: 0.2,
      max_tokens: 100,
    });

    expect(response.content).toBe('hi');
    expect(response.finishReason).toBe('length');
    expect(response.usage).toEqual({ promptTokens: 11, completionTokens: 7, totalTokens: 18 });
  });

  it('requests a JSON object response format', async () => {
    fetchMock.mockResolvedValueOnce(completion('{}'));
    await client().callLLM(MESSAGES, { responseFormat: 'json', temperature: 0 });
    expect(requestBody(0)).toMatchObject({ temperature: 0, response_format: { type: 'json_object' } });
  });

  it('refuses to call without an API key', async () => {
    await expect(client({ apiKey: '' }).callLLM(MESSAGES)).rejects.toThrow(
      'External service error (LLM/OpenAI): API key not configured'
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('retries server errors and succeeds', async () => {
    fetchMock
      .mockResolvedValueOnce(errorResponse(503, 'overloaded'))
      .mockResolvedValueOnce(completion('recovered'));

    const response = await client().callLLM(MESSAGES);
    expect(response.content).toBe('recovered');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('does not retry authentication failures', async () => {
    fetchMock.mockResolvedValueOnce(errorResponse(401, 'bad key'));

    const error = await client().callLLM(MESSAGES).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(LLMServiceError);
    expect(error instanceof LLMServiceError && error.context.errorCode).toBe('AUTHENTICATION');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('waits out a 429 using Retry-After', async () => {
    fetchMock
      .mockResolvedValueOnce(errorResponse(429, 'slow down', { 'Retry-After': '0' }))
      .mockResolvedValueOnce(completion('after wait'));

    const response = await client().callLLM(MESSAGES);
    expect(response.content).toBe('after wait');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('raises RateLimitError when the last attempt is rate limited', async () => {
    fetchMock.mockResolvedValueOnce(errorResponse(429, 'slow down', { 'Retry-After': '7' }));
    await expect(client({ maxRetries: 1 }).callLLM(MESSAGES)).rejects.toBeInstanceOf(RateLimitError);
  });

  it('rejects a malformed completion body', async () => {
    fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ choices: 'nope' }), { status: 200 }));
    await expect(client().callLLM(MESSAGES)).rejects.toThrow(
      'External service error (LLM/OpenAI): Malformed chat completion response'
    );
  });

  it('retries network failures before giving up', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));
    await expect(client({ maxRetries: 2 }).callLLM(MESSAGES)).rejects.toThrow(
      'External service error (LLM/OpenAI): fetch failed'
    );
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});

describe('OpenAIChatClient.callLLMWithValidation', () => {
  const parseOk = (raw: string): { ok: boolean } | null => {
    try {
      const value: unknown = JSON.parse(raw);
      return typeof value === 'object' && value !== null && 'ok' in value && typeof value.ok === 'boolean'
        ? { ok: value.ok }
        : null;
    } catch {
      return null;
    }
  };

  it('re-prompts after an unparseable reply', async () => {
    fetchMock.mockResolvedValueOnce(completion('not json')).mockResolvedValueOnce(completion('{"ok": true}'));

    const result = await client().callLLMWithValidation(MESSAGES, parseOk);

    expect(result).toEqual({ success: true, data: { ok: true }, raw: '{"ok": true}', attempts: 2 });
    expect(requestBody(1)).toMatchObject({
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: 'You are terse.' },
        { role: 'user', content: 'Say hi' },
        { role: 'assistant', content: 'not json' },
        {
          role: 'user',
          content:
            'The previous response could not be parsed correctly. Please ensure your response is valid JSON that matches the requested schema. Error: Validation returned null - response did not match expected schema',
        },
      ],
    });
  });

  it('gives up after the retry budget', async () => {
    fetchMock.mockImplementation(async () => completion('still not json'));

    const result = await client().callLLMWithValidation(MESSAGES, parseOk, {}, 2);

    expect(result).toEqual({
      success: false,
      raw: 'still not json',
      attempts: 2,
      error: 'Validation returned null - response did not match expected schema',
    });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});

describe('helpers', () => {
  it('estimates tokens at four characters each', () => {
    expect(estimateTokens([{ role: 'user', content: 'abcd' }])).toBe(5);
  });

  it('classifies errors', () => {
    expect(parseError(new Error('x'), 429).code).toBe('RATE_LIMIT');
    expect(parseError(new Error('maximum context length exceeded'), 400).code).toBe('CONTEXT_LENGTH');
    expect(parseError(new Error('bad gateway'), 502)).toEqual({
      code: 'SERVER_ERROR',
      message: 'Server error 502: bad gateway',
      retryable: true,
    });
    expect(parseError(Object.assign(new Error('aborted'), { name: 'AbortError' })).code).toBe('TIMEOUT');
    expect(parseError('weird').code).toBe('UNKNOWN');
  });
});
