/**
 * Response Parser
 *
 * Reads the model's reply as the three-field tailoring object. Replies are
 * expected to be JSON but may arrive wrapped in prose or code fences.
 */

import { jsonrepair } from 'jsonrepair';
import { ErrorHandler } from '../shared/errors';
import { validateTailoringResponse } from '../shared/validation';
import { OUTPUT_COLUMNS, TailoringResult } from '../types';
import { loggers } from '../logger';

/**
 * Remove markdown code fences around a JSON body
 */
export function stripCodeFences(text: string): string {
  return text
    .trim()
    // Handle ```json { and ```json{ formats
    .replace(/^```json\s*/i, '')
    // Handle ``` format
    .replace(/^```\s*/, '')
    // Remove trailing ```
    .replace(/\s*```$/, '')
    .trim();
}

/**
 * Substring from the first "{" to the last "}", or null when there is none
 */
export function sliceOuterBraces(text: string): string | null {
  const firstBrace = text.indexOf('{');
  const lastBrace = text.lastIndexOf('}');
  if (firstBrace === -1 || lastBrace <= firstBrace) {
    return null;
  }
  return text.substring(firstBrace, lastBrace + 1);
}

/**
 * Candidate JSON texts, tried in order
 */
const PARSE_STAGES: Array<{ name: string; candidate: (text: string) => string | null }> = [
  { name: 'direct', candidate: text => text.trim() },
  { name: 'code-fence', candidate: stripCodeFences },
  { name: 'outer-braces', candidate: sliceOuterBraces },
  { name: 'repair', candidate: text => jsonrepair(sliceOuterBraces(text) ?? text.trim()) }
];

/**
 * Parse JSON response from LLM, handling potential formatting issues
 * @throws ResponseParseError with the raw text attached when every stage fails
 */
export function parseJsonPayload(text: string): unknown {
  let firstError: string | undefined;

  for (const stage of PARSE_STAGES) {
    try {
      const candidate = stage.candidate(text);
      if (candidate === null) {
        continue;
      }
      const value: unknown = JSON.parse(candidate);
      if (stage.name !== 'direct') {
        loggers.llm.debug({ stage: stage.name }, 'Recovered JSON from noisy response');
      }
      return value;
    } catch (error) {
      if (firstError === undefined) {
        firstError = error instanceof Error ? error.message : String(error);
      }
    }
  }

  throw ErrorHandler.createResponseParseError(firstError ?? 'No JSON object found', text);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a raw model reply into the tailoring result
 * @throws ResponseParseError when the reply is not a JSON object or a field has the wrong type
 * @throws MissingFieldError when any of the three fields is absent
 */
export function parseTailoringResponse(raw: string): TailoringResult {
  const payload = parseJsonPayload(raw);

  if (!isPlainObject(payload)) {
    throw ErrorHandler.createResponseParseError(
      `Expected a JSON object but got ${Array.isArray(payload) ? 'an array' : typeof payload}`,
      raw
    );
  }

  const missing = OUTPUT_COLUMNS.filter(field => payload[field] === undefined || payload[field] === null);
  if (missing.length > 0) {
    throw ErrorHandler.createMissingFieldError([...missing]);
  }

  const validation = validateTailoringResponse(payload);
  if (!validation.isValid) {
    throw ErrorHandler.createResponseParseError(
      validation.errors.map(error => `${error.field}: ${error.message}`).join('; '),
      raw
    );
  }

  const result = validation.data;
  if (result.ATS_MATCH_SCORE < 0 || result.ATS_MATCH_SCORE > 100) {
    loggers.llm.warn({ score: result.ATS_MATCH_SCORE }, 'ATS match score outside 0-100');
  }
  return result;
}
