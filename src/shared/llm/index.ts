/**
 * LLM Module
 *
 * Unified LLM client and utilities for Gemini, Anthropic and OpenAI.
 */

export * from './types';
export * from './client';
export * from './prompts';
