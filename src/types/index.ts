/**
 * Shared domain types for the tailoring run
 */

/**
 * Supported resume document formats
 */
export enum FileFormat {
  PDF = 'pdf',
  DOCX = 'docx',
  TXT = 'txt'
}

// ============================================================================
// Input
// ============================================================================

/** Column every job postings file must carry */
export const DESCRIPTION_COLUMN = 'description';

/** Optional column used in prompts and progress lines */
export const TITLE_COLUMN = 'title';

/** Optional column used in progress lines */
export const COMPANY_COLUMN = 'company';

/**
 * One row of the job postings file, keyed by header name.
 * Unknown columns are carried through untouched.
 */
export type JobRecord = Readonly<Record<string, string>>;

// ============================================================================
// Model output
// ============================================================================

export const TAILORED_RESUME = 'TAILORED_RESUME';
export const ATS_MATCH_SCORE = 'ATS_MATCH_SCORE';
export const SCORE_REASONING = 'SCORE_REASONING';

/**
 * Columns appended to every output row, in order
 */
export const OUTPUT_COLUMNS = [TAILORED_RESUME, ATS_MATCH_SCORE, SCORE_REASONING] as const;

export type OutputColumn = typeof OUTPUT_COLUMNS[number];

/**
 * The three fields the model is asked to return
 */
export interface TailoringResult {
  TAILORED_RESUME: string;
  /** Integer, expected within 0-100 */
  ATS_MATCH_SCORE: number;
  SCORE_REASONING: string;
}

// ============================================================================
// Output
// ============================================================================

export type CellValue = string | number;

/**
 * A job record plus the three output columns
 */
export type ResultRow = Readonly<Record<string, CellValue>>;

/**
 * Markers written in place of the model output when a row fails
 */
export const ERROR_MARKERS = {
  TAILORED_RESUME: 'ERROR: API/Processing Failure',
  ATS_MATCH_SCORE: 'ERROR',
  reasoning: (message: string): string => `Processing failed: ${message}`
} as const;
