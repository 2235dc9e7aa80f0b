/**
 * Result Sink
 *
 * Accumulates one output row per input row, in input order, and writes the
 * whole table once at the end of the run. Nothing is written incrementally.
 */

import type { RowFailurePolicy } from '../config';
import {
  ERROR_MARKERS,
  JobRecord,
  OUTPUT_COLUMNS,
  ResultRow,
  TailoringResult
} from '../types';
import { stringifyCSV, writeCSV } from './jobsCsv';

export interface ResultStats {
  succeeded: number;
  failed: number;
  skipped: number;
}

export class ResultSink {
  private readonly rows: ResultRow[] = [];
  private readonly stats: ResultStats = { succeeded: 0, failed: 0, skipped: 0 };
  readonly columns: readonly string[];

  constructor(
    inputColumns: readonly string[],
    private readonly policy: RowFailurePolicy
  ) {
    const outputColumns: readonly string[] = OUTPUT_COLUMNS;
    // An input column that shares a name with an output column is overwritten in place
    this.columns = [
      ...inputColumns,
      ...outputColumns.filter(column => !inputColumns.includes(column))
    ];
  }

  /**
   * Append a row carrying the model output
   */
  recordSuccess(job: JobRecord, result: TailoringResult): void {
    this.rows.push(Object.freeze({
      ...job,
      TAILORED_RESUME: result.TAILORED_RESUME,
      ATS_MATCH_SCORE: result.ATS_MATCH_SCORE,
      SCORE_REASONING: result.SCORE_REASONING
    }));
    this.stats.succeeded++;
  }

  /**
   * Apply the failure policy to a row whose model call or parsing failed
   * @returns true when the row was kept with error markers
   */
  recordFailure(job: JobRecord, error: Error): boolean {
    this.stats.failed++;

    if (this.policy === 'skip') {
      this.stats.skipped++;
      return false;
    }

    this.rows.push(Object.freeze({
      ...job,
      TAILORED_RESUME: ERROR_MARKERS.TAILORED_RESUME,
      ATS_MATCH_SCORE: ERROR_MARKERS.ATS_MATCH_SCORE,
      SCORE_REASONING: ERROR_MARKERS.reasoning(error.message)
    }));
    return true;
  }

  getRows(): readonly ResultRow[] {
    return this.rows;
  }

  getStats(): ResultStats {
    return { ...this.stats };
  }

  toCSV(): string {
    return stringifyCSV(this.columns, this.rows);
  }

  /**
   * Write the full table to disk
   */
  async write(filePath: string): Promise<void> {
    await writeCSV(filePath, this.columns, this.rows);
  }
}
