/**
 * Shared command-line runner for the three tailoring scripts.
 *
 * Usage:
 *   bulk-resume-tailor            # reads .env, jobs_summary.csv and resume.pdf
 *   RESUME_FILE=cv.pdf resume-optimiser
 */

import { loadConfig } from '../config';
import { createLLMClient, createModelCall } from '../shared/llm';
import { AppError, ErrorHandler } from '../shared/errors';
import { runTailoringPipeline, RunSummary } from '../main/tailorPipeline';
import { TAILOR_VARIANTS, TAILORING_RESPONSE_SCHEMA, TailorVariantId } from '../main/tailoringPrompts';
import { ATS_MATCH_SCORE, OUTPUT_COLUMNS, SCORE_REASONING, TITLE_COLUMN } from '../types';
import { loggers, serializeError } from '../logger';

type Env = Record<string, string | undefined>;

const RULE = '-'.repeat(50);

/**
 * One preview line per row: title, score and the start of the reasoning
 */
export function formatPreview(summary: RunSummary): string[] {
  return summary.preview.map((row, i) => {
    const title = row[TITLE_COLUMN] ?? '';
    const reasoning = String(row[SCORE_REASONING] ?? '');
    const shortReasoning = reasoning.length > 80 ? `${reasoning.substring(0, 80)}...` : reasoning;
    return `${i + 1}. ${title || 'N/A'} | ${ATS_MATCH_SCORE}=${row[ATS_MATCH_SCORE] ?? ''} | ${shortReasoning}`;
  });
}

function reportSummary(summary: RunSummary): void {
  const log = loggers.cli;
  log.info(RULE);
  log.info(
    { total: summary.total, succeeded: summary.succeeded, failed: summary.failed, skipped: summary.skipped },
    `SUCCESS! ${summary.total} jobs processed (${summary.succeeded} tailored, ${summary.failed} failed).`
  );
  log.info(`Tailored resumes and ATS scores saved to: ${summary.outputPath}`);
  log.info(`New columns added: ${OUTPUT_COLUMNS.join(', ')}`);
  if (summary.preview.length > 0) {
    log.info(`Preview of the first ${summary.preview.length} results:\n${formatPreview(summary).join('\n')}`);
  }
}

/**
 * Run one variant end to end.
 * @returns the process exit code: 1 after a fatal error, 0 otherwise
 */
export async function runTailorCli(variantId: TailorVariantId, env: Env = process.env): Promise<number> {
  const variant = TAILOR_VARIANTS[variantId];
  const log = loggers.cli;

  try {
    const config = loadConfig(env);
    const client = createLLMClient(config.llm);
    const modelCall = createModelCall(client, { responseSchema: TAILORING_RESPONSE_SCHEMA });
    const outputPath = config.paths.outputCsv ?? variant.outputFile;

    log.info(
      { variant: variant.id, provider: config.llm.provider, model: config.llm.model },
      `${variant.label}: ${config.paths.inputCsv} + ${config.paths.resumeFile} -> ${outputPath}`
    );

    const summary = await runTailoringPipeline({
      resumePath: config.paths.resumeFile,
      inputPath: config.paths.inputCsv,
      outputPath,
      buildPrompt: variant.buildPrompt,
      modelCall,
      failurePolicy: config.pipeline.failurePolicy
    });

    reportSummary(summary);
    return 0;
  } catch (error) {
    const appError = error instanceof AppError ? error : ErrorHandler.createUnexpectedError(error);
    ErrorHandler.logError(appError, { variant: variant.id });
    log.fatal(`FATAL ERROR: ${ErrorHandler.formatUserMessage(appError)}`);
    return 1;
  }
}

/**
 * Entry-point glue: run the variant and set the exit code once it settles
 */
export function startCli(variantId: TailorVariantId): void {
  runTailorCli(variantId).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      loggers.cli.fatal({ err: serializeError(error) }, 'Unhandled failure');
      process.exitCode = 1;
    }
  );
}
