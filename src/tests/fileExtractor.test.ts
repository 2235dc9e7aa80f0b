/**
 * Tests for resume text extraction
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';

const { pdfParseMock, extractRawTextMock } = vi.hoisted(() => ({
  pdfParseMock: vi.fn(),
  extractRawTextMock: vi.fn()
}));

vi.mock('pdf-parse', () => ({ default: pdfParseMock }));
vi.mock('mammoth', () => ({ default: { extractRawText: extractRawTextMock } }));

import { cleanExtractedText, extractResumeText, FileExtractor } from '../main/fileExtractor';
import { ExtractionError } from '../shared/errors';
import { FileFormat } from '../types';
import { loggers } from '../logger';

describe('cleanExtractedText', () => {
  it('normalises line endings, trims lines and collapses blank runs', () => {
    expect(cleanExtractedText('  Jane Doe  \r\n\r\n\r\n\r\nEngineer\r')).toBe('Jane Doe\n\nEngineer');
  });
});

describe('FileExtractor', () => {
  const extractor = new FileExtractor();
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'resume-extract-'));
    pdfParseMock.mockReset();
    extractRawTextMock.mockReset();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('detects formats by extension', () => {
    expect(extractor.detectFormat('cv.PDF')).toBe(FileFormat.PDF);
    expect(extractor.detectFormat('cv.docx')).toBe(FileFormat.DOCX);
    expect(extractor.detectFormat('cv.md')).toBe(FileFormat.TXT);
    expect(extractor.detectFormat('cv.odt')).toBeNull();
  });

  it('reads a plain text resume', async () => {
    const filePath = path.join(tempDir, 'resume.txt');
    fs.writeFileSync(filePath, 'Jane Doe\n  Python, SQL  \n');

    expect(await extractResumeText(filePath)).toBe('Jane Doe\nPython, SQL');
  });

  it('concatenates PDF text through the parser', async () => {
    const filePath = path.join(tempDir, 'resume.pdf');
    fs.writeFileSync(filePath, 'placeholder');
    pdfParseMock.mockResolvedValue({ text: 'Page one\n\n\n\nPage two', numpages: 2, info: { Title: 'CV' } });

    const result = await extractor.extractText(filePath);

    expect(result.text).toBe('Page one\n\nPage two');
    expect(result.pageCount).toBe(2);
  });

  it('reports a missing file', async () => {
    const filePath = path.join(tempDir, 'resume.pdf');

    await expect(extractor.extractText(filePath)).rejects.toThrow(`Resume file not found at: ${filePath}`);
    await expect(extractor.extractText(filePath)).rejects.toBeInstanceOf(ExtractionError);
  });

  it('rejects an unsupported extension', async () => {
    const filePath = path.join(tempDir, 'resume.odt');
    fs.writeFileSync(filePath, 'text');

    await expect(extractor.extractText(filePath)).rejects.toThrow('Unsupported resume format: .odt');
  });

  it('wraps parser failures', async () => {
    const filePath = path.join(tempDir, 'resume.pdf');
    fs.writeFileSync(filePath, 'not a pdf');
    pdfParseMock.mockRejectedValue(new Error('Invalid PDF structure'));

    try {
      await extractor.extractText(filePath);
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ExtractionError);
      if (error instanceof ExtractionError) {
        expect(error.userMessage).toBe(`Error reading PDF resume: ${filePath}`);
        expect(error.technicalDetails).toBe('Could not read file: Invalid PDF structure');
        expect(error.recoverable).toBe(false);
      }
    }
  });

  it('rejects a document without selectable text', async () => {
    const filePath = path.join(tempDir, 'scan.pdf');
    fs.writeFileSync(filePath, 'placeholder');
    pdfParseMock.mockResolvedValue({ text: '  \n \n', numpages: 1, info: {} });

    await expect(extractor.extractText(filePath)).rejects.toThrow(
      `The resume at ${filePath} contains no selectable text.`
    );
  });

  describe('DOCX resumes', () => {
    it('returns the cleaned raw text', async () => {
      const filePath = path.join(tempDir, 'resume.docx');
      fs.writeFileSync(filePath, 'placeholder');
      extractRawTextMock.mockResolvedValue({ value: '  Jane Doe \r\n\r\n\r\nBackend Engineer  ', messages: [] });

      const result = await extractor.extractText(filePath);

      expect(result.text).toBe('Jane Doe\n\nBackend Engineer');
      expect(result.pageCount).toBeUndefined();
      expect(extractRawTextMock).toHaveBeenCalledWith({ path: filePath });
    });

    it('logs conversion warnings and still returns the text', async () => {
      const filePath = path.join(tempDir, 'resume.docx');
      fs.writeFileSync(filePath, 'placeholder');
      const messages = [{ type: 'warning', message: 'Unrecognised paragraph style: Heading Custom' }];
      extractRawTextMock.mockResolvedValue({ value: 'Jane Doe', messages });
      const warn = vi.spyOn(loggers.extractor, 'warn');

      expect(await extractResumeText(filePath)).toBe('Jane Doe');
      expect(warn).toHaveBeenCalledWith({ filePath, messages }, 'DOCX conversion warnings');
    });

    it('does not warn for a clean conversion', async () => {
      const filePath = path.join(tempDir, 'resume.docx');
      fs.writeFileSync(filePath, 'placeholder');
      extractRawTextMock.mockResolvedValue({ value: 'Jane Doe', messages: [] });
      const warn = vi.spyOn(loggers.extractor, 'warn');

      await extractor.extractText(filePath);

      expect(warn).not.toHaveBeenCalled();
    });

    it('rejects a document without text', async () => {
      const filePath = path.join(tempDir, 'resume.docx');
      fs.writeFileSync(filePath, 'placeholder');
      extractRawTextMock.mockResolvedValue({ value: '', messages: [] });

      await expect(extractor.extractText(filePath)).rejects.toBeInstanceOf(ExtractionError);
      await expect(extractor.extractText(filePath)).rejects.toThrow(
        `The resume at ${filePath} contains no selectable text.`
      );
    });

    it('wraps converter failures', async () => {
      const filePath = path.join(tempDir, 'resume.docx');
      fs.writeFileSync(filePath, 'not a zip');
      extractRawTextMock.mockRejectedValue(new Error("Can't find end of central directory"));

      try {
        await extractor.extractText(filePath);
        expect.unreachable('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ExtractionError);
        if (error instanceof ExtractionError) {
          expect(error.userMessage).toBe(`Error reading DOCX resume: ${filePath}`);
          expect(error.technicalDetails).toBe("Could not read file: Can't find end of central directory");
        }
      }
    });
  });
});
