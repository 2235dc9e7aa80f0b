/**
 * LLM Types
 *
 * Type definitions for LLM configuration and responses.
 * Supports Gemini, Anthropic and OpenAI providers.
 */

import type { Schema } from '@google/genai';

/**
 * Supported LLM providers
 */
export type LLMProvider = 'gemini' | 'anthropic' | 'openai';

/**
 * LLM configuration
 */
export interface LLMConfig {
  provider: LLMProvider;
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
}

/**
 * Default configurations for each provider
 */
export const DEFAULT_LLM_CONFIG: Record<LLMProvider, Omit<LLMConfig, 'apiKey'>> = {
  gemini: {
    provider: 'gemini',
    model: 'gemini-2.5-flash',
    temperature: 0,
    maxTokens: 8192
  },
  anthropic: {
    provider: 'anthropic',
    model: 'claude-sonnet-4-20250514',
    temperature: 0,
    maxTokens: 8192
  },
  openai: {
    provider: 'openai',
    model: 'gpt-4o',
    temperature: 0,
    maxTokens: 8192
  }
};

/**
 * Message role for chat-based LLM interactions
 */
export type MessageRole = 'system' | 'user' | 'assistant';

/**
 * Message structure for LLM interactions
 */
export interface LLMMessage {
  role: MessageRole;
  content: string;
}

/**
 * LLM request parameters
 */
export interface LLMRequest {
  messages: LLMMessage[];
  temperature?: number;
  maxTokens?: number;
  systemPrompt?: string;
  model?: string; // Override the default model for this request
  /** Ask the provider for a JSON body where it supports one */
  jsonMode?: boolean;
  /** Structured output schema; only Gemini enforces it */
  responseSchema?: Schema;
}

/**
 * LLM response structure
 */
export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
  finishReason?: string;
}

/**
 * Prompt in, raw model text out. The pipeline only ever sees this shape,
 * so tests can hand it a deterministic stub.
 */
export type ModelCall = (prompt: string) => Promise<string>;
