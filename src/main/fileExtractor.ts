/**
 * File Extractor
 *
 * Extracts text content from the resume document.
 * Supports PDF, DOCX, and TXT formats; the document must carry a text layer.
 */

import * as fs from 'fs';
import * as path from 'path';
import pdfParse from 'pdf-parse';
import mammoth from 'mammoth';
import { FileFormat } from '../types';
import { ErrorHandler } from '../shared/errors';
import { loggers } from '../logger';

export interface ExtractionResult {
  text: string;
  pageCount?: number;
}

/**
 * FileExtractor class for extracting text from various document formats
 */
export class FileExtractor {
  /**
   * Extracts text content from a file, detecting its format from the extension
   * @throws ExtractionError when the file is missing, unsupported, unreadable or has no text
   */
  async extractText(filePath: string): Promise<ExtractionResult> {
    if (!fs.existsSync(filePath)) {
      throw ErrorHandler.createExtractionError(
        `Resume file not found at: ${filePath}`,
        `File not found: ${filePath}`,
        { filePath }
      );
    }

    const format = this.detectFormat(filePath);
    if (!format) {
      throw ErrorHandler.createExtractionError(
        `Unsupported resume format: ${path.extname(filePath) || '(no extension)'}`,
        `Unsupported file format for ${filePath}`,
        { filePath }
      );
    }

    let result: ExtractionResult;
    try {
      result = await this.extractByFormat(filePath, format);
    } catch (error) {
      throw ErrorHandler.createExtractionError(
        `Error reading ${format.toUpperCase()} resume: ${filePath}`,
        `Could not read file: ${error instanceof Error ? error.message : String(error)}`,
        { filePath, format }
      );
    }

    if (result.text.length === 0) {
      throw ErrorHandler.createExtractionError(
        `The resume at ${filePath} contains no selectable text.`,
        `Document has no extractable text (scanned image without a text layer?)`,
        { filePath, format, pageCount: result.pageCount }
      );
    }

    loggers.extractor.debug(
      { filePath, format, pageCount: result.pageCount, characters: result.text.length },
      'Extracted resume text'
    );
    return result;
  }

  /**
   * Detects file format from file extension
   * @param fileName - Name or path of the file
   * @returns Detected FileFormat or null if unsupported
   */
  detectFormat(fileName: string): FileFormat | null {
    const ext = path.extname(fileName).toLowerCase();
    switch (ext) {
      case '.pdf':
        return FileFormat.PDF;
      case '.docx':
        return FileFormat.DOCX;
      case '.txt':
      case '.md':
        return FileFormat.TXT;
      default:
        return null;
    }
  }

  private extractByFormat(filePath: string, format: FileFormat): Promise<ExtractionResult> {
    switch (format) {
      case FileFormat.PDF:
        return this.extractFromPDF(filePath);
      case FileFormat.DOCX:
        return this.extractFromDOCX(filePath);
      case FileFormat.TXT:
        return this.extractFromTXT(filePath);
    }
  }

  /**
   * Extracts text from PDF files, pages in document order
   */
  private async extractFromPDF(filePath: string): Promise<ExtractionResult> {
    const buffer = fs.readFileSync(filePath);
    const data = await pdfParse(buffer);

    return {
      text: cleanExtractedText(data.text),
      pageCount: data.numpages
    };
  }

  /**
   * Extracts text from DOCX files
   */
  private async extractFromDOCX(filePath: string): Promise<ExtractionResult> {
    const result = await mammoth.extractRawText({ path: filePath });

    if (result.messages.length > 0) {
      loggers.extractor.warn({ filePath, messages: result.messages }, 'DOCX conversion warnings');
    }

    return {
      text: cleanExtractedText(result.value)
    };
  }

  /**
   * Extracts text from plain text files
   */
  private async extractFromTXT(filePath: string): Promise<ExtractionResult> {
    const text = fs.readFileSync(filePath, 'utf-8');

    return {
      text: cleanExtractedText(text)
    };
  }
}

/**
 * Cleans extracted text by normalizing whitespace and removing artifacts
 */
export function cleanExtractedText(text: string): string {
  return text
    // Normalize line endings
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n')
    // Remove leading/trailing whitespace from each line
    .split('\n')
    .map(line => line.trim())
    .join('\n')
    // Collapse runs of blank lines
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

// Export singleton instance
export const fileExtractor = new FileExtractor();

/**
 * Extract the resume once for the whole run
 */
export async function extractResumeText(filePath: string): Promise<string> {
  const result = await fileExtractor.extractText(filePath);
  return result.text;
}
