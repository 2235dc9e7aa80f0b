/**
 * Validation Schemas
 *
 * Zod schemas for the model's tailoring response.
 */

import { z } from 'zod';

/**
 * Match score as sent by the model: an integer, a float or a numeric string.
 * Always coerced to an integer.
 */
export const AtsScoreSchema = z
  .union([
    z.number().finite(),
    z.string().trim().regex(/^-?\d+(\.\d+)?$/, 'Score must be numeric').transform(Number)
  ])
  .transform(score => Math.round(score));

/**
 * The three fields the tailoring prompt asks for. Extra keys are dropped.
 */
export const TailoringResponseSchema = z.object({
  TAILORED_RESUME: z.string({ invalid_type_error: 'TAILORED_RESUME must be a string' }),
  ATS_MATCH_SCORE: AtsScoreSchema,
  SCORE_REASONING: z.string({ invalid_type_error: 'SCORE_REASONING must be a string' })
});
