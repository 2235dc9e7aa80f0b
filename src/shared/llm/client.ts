/**
 * LLM Client
 *
 * Unified client for Gemini, Anthropic and OpenAI LLM providers.
 * One network call per request: no retry, no cache, no timeout of its own.
 * Provider failures are normalised into the shared error model.
 */

import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { GoogleGenAI } from '@google/genai';
import type { Content, Schema } from '@google/genai';
import {
  LLMConfig,
  LLMProvider,
  LLMRequest,
  LLMResponse,
  ModelCall,
  DEFAULT_LLM_CONFIG
} from './types';
import { AppError, ErrorHandler } from '../errors';
import { loggers } from '../../logger';

const AUTH_FAILURE_STATUSES = new Set([401, 403]);
const AUTH_FAILURE_MESSAGE = /api key not valid|invalid api key|incorrect api key|invalid x-api-key|api_key_invalid/i;
// Gemini, OpenAI and Anthropic spellings of "stopped at the output token limit"
const TRUNCATED_FINISH_REASONS = new Set(['MAX_TOKENS', 'length', 'max_tokens']);

/**
 * Unified LLM client supporting Gemini, Anthropic and OpenAI
 */
export class LLMClient {
  private config: LLMConfig;
  private geminiClient?: GoogleGenAI;
  private anthropicClient?: Anthropic;
  private openaiClient?: OpenAI;

  constructor(config: Partial<LLMConfig> & { apiKey: string }) {
    const provider: LLMProvider = config.provider ?? 'gemini';

    // Merge with defaults
    const defaults = DEFAULT_LLM_CONFIG[provider];
    this.config = {
      ...defaults,
      ...config,
      provider
    };

    // Initialize the appropriate client
    switch (this.config.provider) {
      case 'gemini':
        this.geminiClient = new GoogleGenAI({ apiKey: this.config.apiKey });
        break;
      case 'anthropic':
        this.anthropicClient = new Anthropic({ apiKey: this.config.apiKey });
        break;
      case 'openai':
        this.openaiClient = new OpenAI({ apiKey: this.config.apiKey });
        break;
    }
  }

  /**
   * Send a completion request to the LLM
   */
  async complete(request: LLMRequest): Promise<LLMResponse> {
    const temperature = request.temperature ?? this.config.temperature;
    const maxTokens = request.maxTokens ?? this.config.maxTokens;
    const model = request.model ?? this.config.model;
    const provider = this.config.provider;

    if (!request.messages.some(m => m.role === 'user')) {
      throw new Error('Request must include at least one user message');
    }

    const start = Date.now();
    loggers.llm.debug(
      { provider, model, temperature, maxTokens, messages: request.messages.length },
      'LLM request start'
    );

    let response: LLMResponse;
    try {
      response = await this.dispatch(request, temperature, maxTokens, model);
    } catch (error) {
      throw normalizeProviderError(error, provider, model);
    }

    if (!response.content.trim()) {
      throw ErrorHandler.createEmptyResponseError(
        `Provider ${provider} returned no text (finish reason: ${response.finishReason ?? 'unknown'})`,
        { provider, model }
      );
    }

    // Truncated replies fail the row even when the partial text would parse
    if (response.finishReason && TRUNCATED_FINISH_REASONS.has(response.finishReason)) {
      throw ErrorHandler.createTruncatedResponseError(response.finishReason, {
        provider,
        model,
        maxTokens,
        outputTokens: response.usage?.outputTokens
      });
    }

    loggers.llm.debug(
      {
        model: response.model,
        finish: response.finishReason ?? 'unknown',
        elapsedMs: Date.now() - start,
        usage: response.usage
      },
      'LLM request end'
    );

    return response;
  }

  /**
   * Route the request to the configured provider
   */
  private dispatch(
    request: LLMRequest,
    temperature: number,
    maxTokens: number,
    model: string
  ): Promise<LLMResponse> {
    switch (this.config.provider) {
      case 'gemini':
        return this.callGemini(request, temperature, maxTokens, model);
      case 'anthropic':
        return this.callAnthropic(request, temperature, maxTokens, model);
      default:
        return this.callOpenAI(request, temperature, maxTokens, model);
    }
  }

  /**
   * Call Gemini API
   */
  private async callGemini(
    request: LLMRequest,
    temperature: number,
    maxTokens: number,
    model: string
  ): Promise<LLMResponse> {
    if (!this.geminiClient) {
      throw new Error('Gemini client not initialized');
    }

    // Gemini names the assistant role "model" and takes the system prompt separately
    const contents: Content[] = request.messages
      .filter(m => m.role !== 'system')
      .map(m => ({
        role: m.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: m.content }]
      }));

    const response = await this.geminiClient.models.generateContent({
      model,
      contents,
      config: {
        temperature,
        maxOutputTokens: maxTokens,
        ...(request.systemPrompt && { systemInstruction: request.systemPrompt }),
        ...(request.jsonMode && { responseMimeType: 'application/json' }),
        ...(request.jsonMode && request.responseSchema && { responseSchema: request.responseSchema })
      }
    });

    const usage = response.usageMetadata;
    return {
      content: response.text ?? '',
      model: response.modelVersion ?? model,
      usage: usage ? {
        inputTokens: usage.promptTokenCount ?? 0,
        outputTokens: usage.candidatesTokenCount ?? 0,
        totalTokens: usage.totalTokenCount ?? 0
      } : undefined,
      finishReason: response.candidates?.[0]?.finishReason
    };
  }

  /**
   * Call Anthropic API
   */
  private async callAnthropic(
    request: LLMRequest,
    temperature: number,
    maxTokens: number,
    model: string
  ): Promise<LLMResponse> {
    if (!this.anthropicClient) {
      throw new Error('Anthropic client not initialized');
    }

    const anthropicMessages: Anthropic.MessageParam[] = [];
    for (const message of request.messages) {
      if (message.role === 'user' || message.role === 'assistant') {
        anthropicMessages.push({ role: message.role, content: message.content });
      }
    }

    const response = await this.anthropicClient.messages.create({
      model,
      max_tokens: maxTokens,
      temperature,
      ...(request.systemPrompt && { system: request.systemPrompt }),
      messages: anthropicMessages
    });

    // Extract text content
    const text = response.content
      .map(block => (block.type === 'text' ? block.text : ''))
      .join('');

    return {
      content: text,
      model: response.model,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens
      },
      finishReason: response.stop_reason || undefined
    };
  }

  /**
   * Call OpenAI API
   */
  private async callOpenAI(
    request: LLMRequest,
    temperature: number,
    maxTokens: number,
    model: string
  ): Promise<LLMResponse> {
    if (!this.openaiClient) {
      throw new Error('OpenAI client not initialized');
    }

    // Build messages array with system prompt if provided
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];

    if (request.systemPrompt) {
      messages.push({
        role: 'system',
        content: request.systemPrompt
      });
    }

    for (const message of request.messages) {
      if (message.role === 'assistant') {
        messages.push({ role: 'assistant', content: message.content });
      } else if (message.role === 'system') {
        messages.push({ role: 'system', content: message.content });
      } else {
        messages.push({ role: 'user', content: message.content });
      }
    }

    const requestOptions: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model,
      messages,
      temperature,
      max_tokens: maxTokens
    };

    // JSON mode requires the prompt to mention JSON, which the tailoring prompts do
    if (request.jsonMode && supportsJsonMode(model)) {
      requestOptions.response_format = { type: 'json_object' };
    }

    const response = await this.openaiClient.chat.completions.create(requestOptions);

    const choice = response.choices[0];

    return {
      content: choice?.message.content ?? '',
      model: response.model,
      usage: response.usage ? {
        inputTokens: response.usage.prompt_tokens,
        outputTokens: response.usage.completion_tokens,
        totalTokens: response.usage.total_tokens
      } : undefined,
      finishReason: choice?.finish_reason || undefined
    };
  }

  /**
   * Get current configuration
   */
  getConfig(): LLMConfig {
    return { ...this.config };
  }
}

/**
 * OpenAI models that accept response_format json_object
 */
function supportsJsonMode(model: string): boolean {
  return model.includes('gpt-4-turbo') ||
    model.includes('gpt-4o') ||
    model.includes('gpt-4.1') ||
    model.includes('gpt-3.5-turbo-1106') ||
    model.includes('gpt-3.5-turbo-0125');
}

/**
 * Read the HTTP status the provider SDKs attach to their errors
 */
function getErrorStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Map a provider SDK failure onto the shared error model.
 * Credential failures are fatal; every other failure is a per-row service error.
 */
export function normalizeProviderError(error: unknown, provider: LLMProvider, model: string): AppError {
  if (error instanceof AppError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const status = getErrorStatus(error);
  const context = { provider, model, status };

  if ((status !== undefined && AUTH_FAILURE_STATUSES.has(status)) || AUTH_FAILURE_MESSAGE.test(message)) {
    return ErrorHandler.createAuthenticationError(
      `The ${provider} API rejected the configured API key.`,
      message,
      context
    );
  }

  return ErrorHandler.createServiceError(
    `The ${provider} API call failed: ${message}`,
    message,
    context
  );
}

/**
 * Create an LLM client from validated configuration
 */
export function createLLMClient(config: LLMConfig): LLMClient {
  return new LLMClient(config);
}

/**
 * Options for binding a client into a ModelCall
 */
export interface ModelCallOptions {
  systemPrompt?: string;
  responseSchema?: Schema;
}

/**
 * Bind a client into the prompt-to-text capability the pipeline consumes
 */
export function createModelCall(client: LLMClient, options: ModelCallOptions = {}): ModelCall {
  return async (prompt: string): Promise<string> => {
    const response = await client.complete({
      messages: [{ role: 'user', content: prompt }],
      systemPrompt: options.systemPrompt,
      jsonMode: true,
      responseSchema: options.responseSchema
    });
    return response.content;
  };
}
