/**
 * Bulk resume tailoring: public API for running the pipeline programmatically.
 */

export * from './types';
export { loadConfig } from './config';
export type { Config, PathsConfig, PipelineConfig, RowFailurePolicy } from './config';
export { extractResumeText, FileExtractor } from './main/fileExtractor';
export { readJobRecords, parseJobRecords, JobRecordSource, stringifyCSV, writeCSV } from './main/jobsCsv';
export { parseTailoringResponse, parseJsonPayload } from './main/responseParser';
export { ResultSink } from './main/resultSink';
export { runTailoringPipeline, tailorJob } from './main/tailorPipeline';
export type { RunSummary, TailorPipelineOptions, PipelineState } from './main/tailorPipeline';
export { TAILOR_VARIANTS, TAILORING_RESPONSE_SCHEMA } from './main/tailoringPrompts';
export type { TailorVariant, TailorVariantId } from './main/tailoringPrompts';
export { createLLMClient, createModelCall, LLMClient } from './shared/llm';
export type { LLMConfig, LLMProvider, ModelCall } from './shared/llm';
export * from './shared/errors';
export { runTailorCli } from './cli/runTailorCli';
