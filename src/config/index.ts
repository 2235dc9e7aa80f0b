/**
 * Environment Configuration
 *
 * Loads and validates environment variables, providing a typed configuration object.
 * Fails fast on a missing API key so that no row is processed without credentials.
 *
 * Usage:
 *   import { loadConfig } from './config';
 *   const config = loadConfig();
 */

import 'dotenv/config';
import { ConfigurationError, ErrorHandler } from '../shared/errors';
import { DEFAULT_LLM_CONFIG, LLMConfig, LLMProvider } from '../shared/llm/types';

// =============================================================================
// Types
// =============================================================================

/**
 * What happens to a row whose model call or response parsing failed.
 * - mark: keep the row and write error markers in the output columns
 * - skip: drop the row from the output and log it
 */
export type RowFailurePolicy = 'mark' | 'skip';

export interface PathsConfig {
  resumeFile: string;
  inputCsv: string;
  /** Explicit output path; null means the variant's default file */
  outputCsv: string | null;
}

export interface PipelineConfig {
  failurePolicy: RowFailurePolicy;
}

export interface Config {
  llm: LLMConfig;
  paths: PathsConfig;
  pipeline: PipelineConfig;
}

type Env = Record<string, string | undefined>;

export const DEFAULT_RESUME_FILE = 'resume.pdf';
export const DEFAULT_INPUT_CSV = 'jobs_summary.csv';

const API_KEY_VARIABLES: Record<LLMProvider, string> = {
  gemini: 'GEMINI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY'
};

// =============================================================================
// Validation Helpers
// =============================================================================

/**
 * Get an environment variable with a default value
 */
function getEnvWithDefault(env: Env, key: string, defaultValue: string): string {
  return env[key]?.trim() || defaultValue;
}

/**
 * Get a numeric environment variable
 */
function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key]?.trim();
  if (!value) return defaultValue;
  const parsed = Number(value);
  if (isNaN(parsed)) {
    throw ErrorHandler.createConfigurationError(
      `Invalid numeric value for ${key}: "${value}". Expected a number.`,
      `${key} is not numeric`,
      { key }
    );
  }
  return parsed;
}

/**
 * Validate LLM provider value
 */
function parseLLMProvider(value: string): LLMProvider {
  const valid: LLMProvider[] = ['gemini', 'anthropic', 'openai'];
  const provider = valid.find(candidate => candidate === value.toLowerCase());
  if (!provider) {
    throw ErrorHandler.createConfigurationError(
      `Unknown LLM_PROVIDER "${value}". Expected one of: ${valid.join(', ')}.`,
      'LLM_PROVIDER is invalid',
      { provider: value }
    );
  }
  return provider;
}

/**
 * Validate row failure policy value
 */
function parseFailurePolicy(value: string): RowFailurePolicy {
  if (value === 'mark' || value === 'skip') return value;
  throw ErrorHandler.createConfigurationError(
    `Unknown ROW_FAILURE_POLICY "${value}". Expected "mark" or "skip".`,
    'ROW_FAILURE_POLICY is invalid',
    { policy: value }
  );
}

// =============================================================================
// Configuration Loader
// =============================================================================

/**
 * Build the run configuration from the environment (and .env, loaded on import).
 * Throws ConfigurationError when the chosen provider has no API key.
 */
export function loadConfig(env: Env = process.env): Config {
  const provider = parseLLMProvider(getEnvWithDefault(env, 'LLM_PROVIDER', 'gemini'));
  const keyVariable = API_KEY_VARIABLES[provider];
  const apiKey = env[keyVariable]?.trim() || '';

  if (!apiKey) {
    throw ErrorHandler.createConfigurationError(
      `${keyVariable} not found. Please set it in your .env file.`,
      `Missing required environment variable: ${keyVariable}`,
      { provider }
    );
  }

  const defaults = DEFAULT_LLM_CONFIG[provider];

  return {
    llm: {
      provider,
      apiKey,
      model: getEnvWithDefault(env, 'LLM_MODEL', defaults.model),
      temperature: getEnvNumber(env, 'LLM_TEMPERATURE', defaults.temperature),
      maxTokens: getEnvNumber(env, 'LLM_MAX_TOKENS', defaults.maxTokens)
    },
    paths: {
      resumeFile: getEnvWithDefault(env, 'RESUME_FILE', DEFAULT_RESUME_FILE),
      inputCsv: getEnvWithDefault(env, 'INPUT_CSV', DEFAULT_INPUT_CSV),
      outputCsv: env.OUTPUT_CSV?.trim() || null
    },
    pipeline: {
      failurePolicy: parseFailurePolicy(getEnvWithDefault(env, 'ROW_FAILURE_POLICY', 'mark'))
    }
  };
}

/**
 * Re-export the ConfigurationError for consumers
 */
export { ConfigurationError };
