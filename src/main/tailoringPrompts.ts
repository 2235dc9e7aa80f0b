/**
 * Tailoring Prompts
 *
 * Prompt templates for each script variant. A template is a pure function of
 * the resume text and one job record.
 */

import { Type } from '@google/genai';
import type { Schema } from '@google/genai';
import { buildStructuredPrompt, escapePromptText, PromptSection } from '../shared/llm/prompts';
import {
  ATS_MATCH_SCORE,
  DESCRIPTION_COLUMN,
  JobRecord,
  SCORE_REASONING,
  TAILORED_RESUME,
  TITLE_COLUMN
} from '../types';

export type TailorVariantId = 'optimiser' | 'tailor' | 'tailor-refined';

export interface TailorVariant {
  id: TailorVariantId;
  /** Shown in the start banner */
  label: string;
  /** Output file used when OUTPUT_CSV is not set */
  outputFile: string;
  buildPrompt: (resumeText: string, job: JobRecord) => string;
}

/**
 * Structured output schema sent to providers that enforce one
 */
export const TAILORING_RESPONSE_SCHEMA: Schema = {
  type: Type.OBJECT,
  properties: {
    [TAILORED_RESUME]: { type: Type.STRING },
    [ATS_MATCH_SCORE]: { type: Type.INTEGER },
    [SCORE_REASONING]: { type: Type.STRING }
  },
  required: [TAILORED_RESUME, ATS_MATCH_SCORE, SCORE_REASONING]
};

const JSON_OUTPUT_FORMAT =
  `Respond with a single JSON object and nothing else. It must have exactly these keys: ` +
  `"${TAILORED_RESUME}" (string), "${ATS_MATCH_SCORE}" (integer from 0 to 100) and ` +
  `"${SCORE_REASONING}" (string).`;

const BULLET_RULE =
  'Every experience bullet MUST start with the middle-dot character (•) followed by a space. ' +
  'Do not use dashes (-) or asterisks (*), and leave no blank lines inside a section.';

/**
 * Job title when the record carries a non-empty one
 */
export function getJobTitle(job: JobRecord): string | undefined {
  const title = job[TITLE_COLUMN];
  return typeof title === 'string' && title.trim() ? title.trim() : undefined;
}

function resumeSection(resumeText: string): PromptSection {
  return { label: "CANDIDATE'S CURRENT RESUME TEXT", body: escapePromptText(resumeText) };
}

// Embedded exactly as read from the CSV
function descriptionSection(job: JobRecord): PromptSection {
  return { label: 'TARGET JOB DESCRIPTION', body: job[DESCRIPTION_COLUMN] ?? '' };
}

/**
 * Single-page ATS optimisation with score and remaining gaps
 */
export function buildOptimiserPrompt(resumeText: string, job: JobRecord): string {
  const title = getJobTitle(job);
  const sections: PromptSection[] = [resumeSection(resumeText)];
  if (title) {
    sections.push({ label: 'TARGET JOB TITLE', body: title });
  }
  sections.push(descriptionSection(job));

  return buildStructuredPrompt(
    'You are an Applicant Tracking System (ATS) optimization expert and professional resume builder. ' +
      "Tailor the candidate's existing resume so it scores as high as possible against the target job description.",
    sections,
    [
      `${TAILORED_RESUME}: revise the Professional Summary, Skills and Experience sections to use the exact keywords, ` +
        'tools and quantified achievements from the job description. Return the full, single-page resume text ready ' +
        'for submission, keeping the original simple text layout while updating the content for relevance.',
      `${ATS_MATCH_SCORE}: an integer from 0 to 100 based on keyword frequency, relevance and formatting ` +
        '(assume simple text formatting passes).',
      `${SCORE_REASONING}: a brief explanation of the score and the top 2-3 gaps that remain.`
    ],
    JSON_OUTPUT_FORMAT
  );
}

/**
 * Hyper-tailoring that keeps the candidate's section headers
 */
export function buildTailorPrompt(resumeText: string, job: JobRecord): string {
  return buildStructuredPrompt(
    'You are an expert ATS (Applicant Tracking System) specialist and resume writer. ' +
      "Hyper-tailor the candidate's resume for the target job to maximize the ATS match score.",
    [
      resumeSection(resumeText),
      { label: 'TARGET JOB TITLE', body: getJobTitle(job) ?? 'N/A' },
      descriptionSection(job)
    ],
    [
      `${TAILORED_RESUME}: rewrite the entire resume. Use the existing section headers exactly as they appear ` +
        '(for example Career Objective, TECHNICAL SKILLS, PROFESSIONAL EXPERIENCE, EDUCATION). In TECHNICAL SKILLS keep ' +
        "the original categories and their 'Category:' colon layout. Work the job description's most critical keywords " +
        `into the objective and the experience section. ${BULLET_RULE} Leave out the contact line (name, email, phone).`,
      `${ATS_MATCH_SCORE}: a numerical match percentage from 0 to 100.`,
      `${SCORE_REASONING}: a brief, professional explanation in 2-3 sentences covering the main alignment points ` +
        'and any core skill gaps.'
    ],
    JSON_OUTPUT_FORMAT
  );
}

/**
 * Tailoring focused on keywords, action verbs and measurable impact
 */
export function buildRefinedTailorPrompt(resumeText: string, job: JobRecord): string {
  return buildStructuredPrompt(
    'You are an expert ATS (Applicant Tracking System) specialist and professional resume writer. ' +
      "Rewrite the candidate's resume against the target job description to maximize the ATS match score " +
      'and its appeal to human recruiters.',
    [
      resumeSection(resumeText),
      { label: 'TARGET JOB TITLE', body: getJobTitle(job) ?? 'N/A' },
      descriptionSection(job)
    ],
    [
      `${TAILORED_RESUME}: the complete revised resume as clean text that can be pasted into a document. ` +
        "Keep the candidate's section headers exactly as written. Turn the objective into a sharp professional " +
        'summary of at most 4-5 lines. Integrate the hard and soft skills named in the job description into the ' +
        'summary and the experience bullets. Start every experience bullet with a strong action verb (Led, Developed, ' +
        'Optimized, Reduced) and avoid vague phrases such as "Responsible for". Prefer measurable outcomes ' +
        `(for example "Reduced latency by 40%"). ${BULLET_RULE}`,
      `${ATS_MATCH_SCORE}: an integer match percentage from 0 to 100 comparing the tailored resume with the job description.`,
      `${SCORE_REASONING}: a brief, professional explanation in 2-3 sentences of how the resume was tailored to the job.`
    ],
    JSON_OUTPUT_FORMAT
  );
}

/**
 * Script variants, one per command-line entry point
 */
export const TAILOR_VARIANTS: Record<TailorVariantId, TailorVariant> = {
  optimiser: {
    id: 'optimiser',
    label: 'AI resume optimiser',
    outputFile: 'job_matches_with_resumes.csv',
    buildPrompt: buildOptimiserPrompt
  },
  tailor: {
    id: 'tailor',
    label: 'Bulk resume tailor',
    outputFile: 'job_matches_with_resumes.csv',
    buildPrompt: buildTailorPrompt
  },
  'tailor-refined': {
    id: 'tailor-refined',
    label: 'Bulk resume tailor (refined prompt)',
    outputFile: 'job_matches_with_resumes1.csv',
    buildPrompt: buildRefinedTailorPrompt
  }
};
