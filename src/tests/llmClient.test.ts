/**
 * Tests for Shared LLM Client
 *
 * Validates the unified LLM client supporting Gemini, Anthropic and OpenAI.
 * Provider SDKs are mocked; no request leaves the process.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

const { generateContentMock, anthropicCreateMock, openaiCreateMock } = vi.hoisted(() => ({
  generateContentMock: vi.fn(),
  anthropicCreateMock: vi.fn(),
  openaiCreateMock: vi.fn()
}));

vi.mock('@google/genai', () => ({
  GoogleGenAI: vi.fn(function () {
    return { models: { generateContent: generateContentMock } };
  })
}));

vi.mock('@anthropic-ai/sdk', () => ({
  default: vi.fn(function () {
    return { messages: { create: anthropicCreateMock } };
  })
}));

vi.mock('openai', () => ({
  default: vi.fn(function () {
    return { chat: { completions: { create: openaiCreateMock } } };
  })
}));

import { createModelCall, LLMClient, normalizeProviderError } from '../shared/llm/client';
import {
  AuthenticationError,
  ErrorHandler,
  ResponseEmptyError,
  ResponseTruncatedError,
  TransientServiceError
} from '../shared/errors';

function geminiResponse(text: string | undefined) {
  return {
    text,
    modelVersion: 'gemini-2.5-flash',
    usageMetadata: { promptTokenCount: 10, candidatesTokenCount: 5, totalTokenCount: 15 },
    candidates: [{ finishReason: 'STOP' }]
  };
}

describe('LLMClient', () => {
  beforeEach(() => {
    generateContentMock.mockReset();
    anthropicCreateMock.mockReset();
    openaiCreateMock.mockReset();
  });

  describe('gemini', () => {
    const client = new LLMClient({ provider: 'gemini', apiKey: 'test-key' });

    it('uses the provider defaults', () => {
      expect(client.getConfig()).toEqual({
        provider: 'gemini',
        apiKey: 'test-key',
        model: 'gemini-2.5-flash',
        temperature: 0,
        maxTokens: 8192
      });
    });

    it('requests JSON output with the response schema', async () => {
      generateContentMock.mockResolvedValue(geminiResponse('{"ok":true}'));
      const schema = { required: ['ok'] };

      const response = await client.complete({
        messages: [{ role: 'user', content: 'Tailor this' }],
        jsonMode: true,
        responseSchema: schema
      });

      expect(response).toEqual({
        content: '{"ok":true}',
        model: 'gemini-2.5-flash',
        usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 },
        finishReason: 'STOP'
      });
      expect(generateContentMock).toHaveBeenCalledWith({
        model: 'gemini-2.5-flash',
        contents: [{ role: 'user', parts: [{ text: 'Tailor this' }] }],
        config: {
          temperature: 0,
          maxOutputTokens: 8192,
          responseMimeType: 'application/json',
          responseSchema: schema
        }
      });
    });

    it('passes the system prompt as a system instruction', async () => {
      generateContentMock.mockResolvedValue(geminiResponse('text'));

      await client.complete({
        messages: [{ role: 'user', content: 'Hi' }],
        systemPrompt: 'Be brief'
      });

      expect(generateContentMock).toHaveBeenCalledWith(expect.objectContaining({
        config: { temperature: 0, maxOutputTokens: 8192, systemInstruction: 'Be brief' }
      }));
    });

    it('throws ResponseEmptyError when the model returns no text', async () => {
      generateContentMock.mockResolvedValue(geminiResponse(undefined));

      await expect(client.complete({ messages: [{ role: 'user', content: 'Hi' }] }))
        .rejects.toBeInstanceOf(ResponseEmptyError);
    });

    it('rejects a reply cut off at the token limit as a per-row failure', async () => {
      generateContentMock.mockResolvedValue({
        ...geminiResponse('{"TAILORED_RESUME":"Jane Doe, Backend Eng'),
        candidates: [{ finishReason: 'MAX_TOKENS' }]
      });

      try {
        await client.complete({ messages: [{ role: 'user', content: 'Hi' }] });
        expect.unreachable('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ResponseTruncatedError);
        if (error instanceof ResponseTruncatedError) {
          expect(error.finishReason).toBe('MAX_TOKENS');
          expect(error.userMessage).toBe('The model reply was cut off at the output token limit.');
          expect(error.context).toEqual({ provider: 'gemini', model: 'gemini-2.5-flash', maxTokens: 8192, outputTokens: 5 });
          expect(ErrorHandler.isFatal(error)).toBe(false);
        }
      }
    });

    it('maps a rejected key to AuthenticationError', async () => {
      generateContentMock.mockRejectedValue(
        Object.assign(new Error('API key not valid. Please pass a valid API key.'), { status: 400 })
      );

      await expect(client.complete({ messages: [{ role: 'user', content: 'Hi' }] }))
        .rejects.toBeInstanceOf(AuthenticationError);
    });

    it('maps other failures to TransientServiceError', async () => {
      generateContentMock.mockRejectedValue(Object.assign(new Error('Internal error'), { status: 500 }));

      await expect(client.complete({ messages: [{ role: 'user', content: 'Hi' }] }))
        .rejects.toThrow('The gemini API call failed: Internal error');
    });

    it('rejects a request without a user message', async () => {
      await expect(client.complete({ messages: [{ role: 'system', content: 'Only system' }] }))
        .rejects.toThrow('Request must include at least one user message');
      expect(generateContentMock).not.toHaveBeenCalled();
    });
  });

  describe('anthropic', () => {
    it('joins text blocks and omits an unset system prompt', async () => {
      anthropicCreateMock.mockResolvedValue({
        content: [{ type: 'text', text: '{"a":' }, { type: 'text', text: '1}' }],
        model: 'claude-sonnet-4-20250514',
        usage: { input_tokens: 3, output_tokens: 4 },
        stop_reason: 'end_turn'
      });
      const client = new LLMClient({ provider: 'anthropic', apiKey: 'test-key' });

      const response = await client.complete({ messages: [{ role: 'user', content: 'Hi' }] });

      expect(response.content).toBe('{"a":1}');
      expect(response.usage).toEqual({ inputTokens: 3, outputTokens: 4, totalTokens: 7 });
      expect(anthropicCreateMock).toHaveBeenCalledWith({
        model: 'claude-sonnet-4-20250514',
        max_tokens: 8192,
        temperature: 0,
        messages: [{ role: 'user', content: 'Hi' }]
      });
    });

    it('rejects a reply that stopped at max_tokens', async () => {
      anthropicCreateMock.mockResolvedValue({
        content: [{ type: 'text', text: '{"TAILORED_RESUME":"Jane' }],
        model: 'claude-sonnet-4-20250514',
        usage: { input_tokens: 3, output_tokens: 8192 },
        stop_reason: 'max_tokens'
      });
      const client = new LLMClient({ provider: 'anthropic', apiKey: 'test-key' });

      await expect(client.complete({ messages: [{ role: 'user', content: 'Hi' }] }))
        .rejects.toBeInstanceOf(ResponseTruncatedError);
    });
  });

  describe('openai', () => {
    it('enables JSON mode for models that support it', async () => {
      openaiCreateMock.mockResolvedValue({
        choices: [{ message: { content: '{"a":1}' }, finish_reason: 'stop' }],
        model: 'gpt-4o',
        usage: { prompt_tokens: 1, completion_tokens: 2, total_tokens: 3 }
      });
      const client = new LLMClient({ provider: 'openai', apiKey: 'test-key' });

      await client.complete({ messages: [{ role: 'user', content: 'Reply in JSON' }], jsonMode: true });

      expect(openaiCreateMock).toHaveBeenCalledWith({
        model: 'gpt-4o',
        messages: [{ role: 'user', content: 'Reply in JSON' }],
        temperature: 0,
        max_tokens: 8192,
        response_format: { type: 'json_object' }
      });
    });

    it('rejects a reply that stopped for length', async () => {
      openaiCreateMock.mockResolvedValue({
        choices: [{ message: { content: '{"TAILORED_RESUME":"Jane' }, finish_reason: 'length' }],
        model: 'gpt-4o',
        usage: { prompt_tokens: 1, completion_tokens: 8192, total_tokens: 8193 }
      });
      const client = new LLMClient({ provider: 'openai', apiKey: 'test-key' });

      await expect(client.complete({ messages: [{ role: 'user', content: 'Reply in JSON' }] }))
        .rejects.toThrow('The model reply was cut off at the output token limit.');
    });
  });
});

describe('createModelCall', () => {
  beforeEach(() => {
    generateContentMock.mockReset();
  });

  it('sends the prompt as a single user message in JSON mode and returns the text', async () => {
    generateContentMock.mockResolvedValue(geminiResponse('{"TAILORED_RESUME":"R"}'));
    const modelCall = createModelCall(new LLMClient({ provider: 'gemini', apiKey: 'test-key' }));

    expect(await modelCall('Tailor this')).toBe('{"TAILORED_RESUME":"R"}');
    expect(generateContentMock).toHaveBeenCalledWith(expect.objectContaining({
      contents: [{ role: 'user', parts: [{ text: 'Tailor this' }] }],
      config: expect.objectContaining({ responseMimeType: 'application/json' })
    }));
  });
});

describe('normalizeProviderError', () => {
  it('passes application errors through unchanged', () => {
    const error = ErrorHandler.createServiceError('Service unavailable', 'status 503');
    expect(normalizeProviderError(error, 'gemini', 'gemini-2.5-flash')).toBe(error);
  });

  it('treats 401 and 403 responses as authentication failures', () => {
    for (const status of [401, 403]) {
      const error = normalizeProviderError(
        Object.assign(new Error('Forbidden'), { status }),
        'openai',
        'gpt-4o'
      );
      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error.userMessage).toBe('The openai API rejected the configured API key.');
      expect(error.recoverable).toBe(false);
    }
  });

  it('recognises invalid-key messages without a status', () => {
    expect(normalizeProviderError(new Error('Incorrect API key provided'), 'openai', 'gpt-4o'))
      .toBeInstanceOf(AuthenticationError);
  });

  it('treats anything else as a recoverable service error', () => {
    const error = normalizeProviderError('connection reset', 'anthropic', 'claude-sonnet-4-20250514');

    expect(error).toBeInstanceOf(TransientServiceError);
    expect(error.userMessage).toBe('The anthropic API call failed: connection reset');
    expect(error.recoverable).toBe(true);
    expect(ErrorHandler.isFatal(error)).toBe(false);
  });
});
