/**
 * Jobs CSV
 *
 * Reads job postings from a CSV file and writes the augmented result table.
 * Expected input format:
 *   title,company,description
 *   Senior Engineer,Example Corp,"Full job description..."
 */

import * as fs from 'fs';
import { CellValue, DESCRIPTION_COLUMN, JobRecord } from '../types';
import { ErrorHandler } from '../shared/errors';
import { loggers } from '../logger';

/**
 * Columns the tailoring run cannot do without
 */
export const REQUIRED_COLUMNS: readonly string[] = [DESCRIPTION_COLUMN];

/**
 * Ordered, restartable sequence of job records.
 * Records are built on demand each time the source is iterated.
 */
export class JobRecordSource implements Iterable<JobRecord> {
  constructor(
    readonly columns: readonly string[],
    private readonly rows: readonly string[][]
  ) {}

  /**
   * Number of data rows (header excluded)
   */
  get size(): number {
    return this.rows.length;
  }

  *[Symbol.iterator](): Iterator<JobRecord> {
    for (const row of this.rows) {
      yield this.toRecord(row);
    }
  }

  private toRecord(row: string[]): JobRecord {
    const record: Record<string, string> = {};
    this.columns.forEach((column, index) => {
      // Short rows are padded, extra cells beyond the header are dropped
      record[column] = index < row.length ? row[index] : '';
    });
    return Object.freeze(record);
  }
}

/**
 * Parses CSV content into rows
 * Handles quoted fields with commas, doubled quotes and newlines.
 * A quote only opens a quoted field at the start of that field; elsewhere it is literal.
 * @throws SourceFileError when a quoted field is still open at the end of the input
 */
export function parseCSV(content: string, sourceName = '<input>'): string[][] {
  const rows: string[][] = [];
  let currentRow: string[] = [];
  let currentField = '';
  let inQuotes = false;
  let atFieldStart = true;
  let line = 1;
  let quoteLine = 0;
  let i = 0;

  const endField = (): void => {
    currentRow.push(currentField);
    currentField = '';
    atFieldStart = true;
  };

  const endRow = (): void => {
    endField();
    // Skip empty rows
    if (currentRow.some(field => field.length > 0)) {
      rows.push(currentRow);
    }
    currentRow = [];
    line++;
  };

  while (i < content.length) {
    const char = content[i];
    const nextChar = content[i + 1];

    if (inQuotes) {
      if (char === '"' && nextChar === '"') {
        // Escaped quote
        currentField += '"';
        i += 2;
      } else if (char === '"') {
        // End of quoted field
        inQuotes = false;
        i++;
      } else {
        if (char === '\n') {
          line++;
        }
        currentField += char;
        i++;
      }
      continue;
    }

    if (char === '"' && atFieldStart) {
      // Start of quoted field
      inQuotes = true;
      atFieldStart = false;
      quoteLine = line;
      i++;
      continue;
    }

    if (char === ',') {
      // Field separator
      endField();
      i++;
      continue;
    }

    if (char === '\r' && nextChar === '\n') {
      endRow();
      i += 2;
      continue;
    }

    if (char === '\n' || char === '\r') {
      endRow();
      i++;
      continue;
    }

    currentField += char;
    atFieldStart = false;
    i++;
  }

  if (inQuotes) {
    throw ErrorHandler.createSourceFileError(
      `Input CSV '${sourceName}' has a quoted field opened on line ${quoteLine} that is never closed.`,
      `Malformed CSV: unclosed quote starting on line ${quoteLine}`,
      { sourceName, line: quoteLine }
    );
  }

  // Handle last field/row
  if (currentField.length > 0 || currentRow.length > 0) {
    endRow();
  }

  return rows;
}

/**
 * Build a record source from CSV text and check the required columns
 * @throws SourceFileError when there is no header row or a quoted field is never closed
 * @throws SchemaError when a required column is missing or a column name repeats
 */
export function parseJobRecords(content: string, sourceName = '<input>'): JobRecordSource {
  const rows = parseCSV(content.replace(/^\uFEFF/, ''), sourceName);

  if (rows.length === 0) {
    throw ErrorHandler.createSourceFileError(
      `Input CSV '${sourceName}' is empty.`,
      'CSV file is empty',
      { sourceName }
    );
  }

  const [header, ...dataRows] = rows;
  const columns = header.map(name => name.trim());
  const duplicates = columns.filter((column, index) => columns.indexOf(column) !== index);
  if (duplicates.length > 0) {
    throw ErrorHandler.createDuplicateColumnError([...new Set(duplicates)], columns, { sourceName });
  }

  const missing = REQUIRED_COLUMNS.filter(column => !columns.includes(column));

  if (missing.length > 0) {
    throw ErrorHandler.createSchemaError(missing, columns, { sourceName });
  }

  loggers.csv.debug({ sourceName, columns, rows: dataRows.length }, 'Parsed job postings');
  return new JobRecordSource(columns, dataRows);
}

/**
 * Reads job postings from a CSV file
 * @throws SourceFileError when the file is missing, unreadable or empty
 * @throws SchemaError when a required column is missing
 */
export function readJobRecords(filePath: string): JobRecordSource {
  if (!fs.existsSync(filePath)) {
    throw ErrorHandler.createSourceFileError(
      `Input file '${filePath}' not found. Please check the file name.`,
      `File not found: ${filePath}`,
      { filePath }
    );
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw ErrorHandler.createSourceFileError(
      `Input file '${filePath}' could not be read.`,
      `Could not read file: ${error instanceof Error ? error.message : String(error)}`,
      { filePath }
    );
  }

  return parseJobRecords(content, filePath);
}

/**
 * Quote a value when it would otherwise break the row structure
 */
export function formatCSVField(value: CellValue): string {
  const text = typeof value === 'number' ? String(value) : value;
  if (/[",\r\n]/.test(text) || text !== text.trim()) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * Serialises a table with a header row
 */
export function stringifyCSV(
  columns: readonly string[],
  rows: Iterable<Readonly<Record<string, CellValue>>>
): string {
  const lines = [columns.map(formatCSVField).join(',')];
  for (const row of rows) {
    lines.push(columns.map(column => formatCSVField(row[column] ?? '')).join(','));
  }
  return lines.join('\n') + '\n';
}

/**
 * Writes the whole table in one go
 */
export async function writeCSV(
  filePath: string,
  columns: readonly string[],
  rows: Iterable<Readonly<Record<string, CellValue>>>
): Promise<void> {
  await fs.promises.writeFile(filePath, stringifyCSV(columns, rows), 'utf-8');
  loggers.csv.debug({ filePath, columns: columns.length }, 'Wrote CSV');
}
