/**
 * Tailor Pipeline
 *
 * load resume + jobs → for each job: prompt → model → parse → record → write once.
 *
 * Rows are processed strictly one after another. A failing row is recorded
 * according to the failure policy and never stops the run; only fatal errors
 * (bad input file, unreadable resume, rejected API key) abort it, and an
 * aborted run writes nothing.
 */

import type { RowFailurePolicy } from '../config';
import type { ModelCall } from '../shared/llm/types';
import { ErrorHandler } from '../shared/errors';
import { COMPANY_COLUMN, JobRecord, ResultRow, TailoringResult } from '../types';
import { extractResumeText } from './fileExtractor';
import { readJobRecords } from './jobsCsv';
import { parseTailoringResponse } from './responseParser';
import { ResultSink } from './resultSink';
import { getJobTitle } from './tailoringPrompts';
import { loggers } from '../logger';

export type PipelineState = 'RUNNING' | 'DONE' | 'FAILED';

export interface TailorPipelineOptions {
  resumePath: string;
  inputPath: string;
  outputPath: string;
  buildPrompt: (resumeText: string, job: JobRecord) => string;
  modelCall: ModelCall;
  failurePolicy: RowFailurePolicy;
  /** Defaults to reading the document from disk */
  extractResume?: (filePath: string) => Promise<string>;
}

export interface RunSummary {
  state: 'DONE';
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
  outputPath: string;
  columns: readonly string[];
  /** First rows of the written table */
  preview: readonly ResultRow[];
}

const PREVIEW_ROWS = 5;

/**
 * Prompt, call and parse for a single job
 */
export async function tailorJob(
  resumeText: string,
  job: JobRecord,
  buildPrompt: TailorPipelineOptions['buildPrompt'],
  modelCall: ModelCall
): Promise<TailoringResult> {
  const prompt = buildPrompt(resumeText, job);
  const raw = await modelCall(prompt);
  return parseTailoringResponse(raw);
}

function describeJob(job: JobRecord): string {
  const title = getJobTitle(job) ?? 'N/A';
  const company = job[COMPANY_COLUMN]?.trim();
  return company ? `${title} at ${company}` : title;
}

/**
 * Run the whole tailoring pass and write the output file
 * @throws SourceFileError, SchemaError, ExtractionError or AuthenticationError; nothing is written then
 */
export async function runTailoringPipeline(options: TailorPipelineOptions): Promise<RunSummary> {
  const log = loggers.pipeline;
  const setState = (state: PipelineState): void => {
    log.debug({ state }, `Pipeline ${state}`);
  };

  setState('RUNNING');
  try {
    // Input is validated before anything else so a bad file never costs an API call
    const source = readJobRecords(options.inputPath);
    const extractResume = options.extractResume ?? extractResumeText;
    const resumeText = await extractResume(options.resumePath);

    const sink = new ResultSink(source.columns, options.failurePolicy);
    const total = source.size;
    log.info({ total }, `Starting AI resume tailoring for ${total} jobs...`);

    let index = 0;
    for (const job of source) {
      index++;
      log.info({ row: index, total }, `[${index}/${total}] Tailoring resume for: ${describeJob(job)}`);

      try {
        const result = await tailorJob(resumeText, job, options.buildPrompt, options.modelCall);
        sink.recordSuccess(job, result);
      } catch (error) {
        if (ErrorHandler.isFatal(error)) {
          throw error;
        }
        const rowError = error instanceof Error ? error : new Error(String(error));
        const kept = sink.recordFailure(job, rowError);
        ErrorHandler.logError(rowError, { row: index, policy: options.failurePolicy });
        log.warn(
          { row: index, kept },
          kept
            ? `Row ${index} failed; marked with error placeholders: ${rowError.message}`
            : `Skipping row ${index}: ${rowError.message}`
        );
      }
    }

    await sink.write(options.outputPath);
    setState('DONE');

    const stats = sink.getStats();
    return {
      state: 'DONE',
      total,
      ...stats,
      outputPath: options.outputPath,
      columns: sink.columns,
      preview: sink.getRows().slice(0, PREVIEW_ROWS)
    };
  } catch (error) {
    setState('FAILED');
    throw error;
  }
}
