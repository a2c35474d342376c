/**
 * Document Reader
 *
 * Turns a file on disk into chunker input. PDFs are read page by page with
 * pdfjs-dist; Markdown and plain text are read whole.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';

import { z } from 'zod';

import type { DocumentText, PageText } from '../chunking/types.js';
import type { Logger } from '../logging/logger.js';
import { resolveLogger } from '../logging/logger.js';

// =============================================================================
// Types
// =============================================================================

export const DocumentFormat = {
  PDF: 'pdf',
  MARKDOWN: 'markdown',
  TEXT: 'text',
} as const;

export type DocumentFormat = (typeof DocumentFormat)[keyof typeof DocumentFormat];

export const DocumentFormatSchema = z.enum(['pdf', 'markdown', 'text']);

const FORMAT_BY_EXTENSION: Readonly<Record<string, DocumentFormat>> = {
  '.pdf': DocumentFormat.PDF,
  '.md': DocumentFormat.MARKDOWN,
  '.markdown': DocumentFormat.MARKDOWN,
  '.txt': DocumentFormat.TEXT,
};

export const SUPPORTED_EXTENSIONS: readonly string[] = Object.keys(FORMAT_BY_EXTENSION);

export interface ExtractedDocument {
  path: string;
  format: DocumentFormat;
  document: DocumentText;
}

export interface DocumentReader {
  read(path: string): Promise<ExtractedDocument>;
}

// =============================================================================
// Error Types
// =============================================================================

export const DocumentReadErrorCode = {
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',
  UNSUPPORTED_FORMAT: 'UNSUPPORTED_FORMAT',
  /** Missing `%PDF-` header or unparseable structure */
  INVALID_PDF: 'INVALID_PDF',
  PASSWORD_PROTECTED: 'PASSWORD_PROTECTED',
  READ_ERROR: 'READ_ERROR',
  EXTRACTION_FAILED: 'EXTRACTION_FAILED',
} as const;

export type DocumentReadErrorCode =
  (typeof DocumentReadErrorCode)[keyof typeof DocumentReadErrorCode];

export const DocumentReadErrorCodeSchema = z.enum([
  'FILE_NOT_FOUND',
  'UNSUPPORTED_FORMAT',
  'INVALID_PDF',
  'PASSWORD_PROTECTED',
  'READ_ERROR',
  'EXTRACTION_FAILED',
]);

export class DocumentReadError extends Error {
  readonly code: DocumentReadErrorCode;
  readonly filePath: string | undefined;
  override readonly cause: Error | undefined;

  constructor(
    message: string,
    code: DocumentReadErrorCode,
    options?: { filePath?: string | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'DocumentReadError';
    this.code = code;
    this.filePath = options?.filePath;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DocumentReadError);
    }
  }

  /**
   * Wrap an unknown error, detecting the code from its name and message
   */
  static fromError(error: unknown, filePath?: string): DocumentReadError {
    if (error instanceof DocumentReadError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const cause = error instanceof Error ? error : undefined;
    const name = error instanceof Error ? error.name : '';
    const lower = message.toLowerCase();

    let code: DocumentReadErrorCode = DocumentReadErrorCode.EXTRACTION_FAILED;
    if (lower.includes('enoent') || lower.includes('no such file')) {
      code = DocumentReadErrorCode.FILE_NOT_FOUND;
    } else if (lower.includes('eacces') || lower.includes('eisdir') || lower.includes('permission')) {
      code = DocumentReadErrorCode.READ_ERROR;
    } else if (name === 'PasswordException' || lower.includes('password')) {
      code = DocumentReadErrorCode.PASSWORD_PROTECTED;
    } else if (name === 'InvalidPDFException' || lower.includes('invalid pdf')) {
      code = DocumentReadErrorCode.INVALID_PDF;
    }

    return new DocumentReadError(message, code, { filePath, cause });
  }
}

export function isDocumentReadError(error: unknown): error is DocumentReadError {
  return error instanceof DocumentReadError;
}

// =============================================================================
// Page Text Assembly
// =============================================================================

/**
 * The fields of a pdfjs text item that line assembly reads
 */
export interface PositionedText {
  str: string;
  hasEOL: boolean;
  /** Transform matrix; index 5 is the baseline y */
  transform: readonly number[];
}

/** Baseline shift, in PDF units, that starts a new line */
const LINE_Y_TOLERANCE = 1;

/**
 * Rebuild page lines from text items. A line ends at an item flagged
 * `hasEOL` or when the baseline moves.
 */
export function assemblePageText(items: readonly PositionedText[]): string {
  const lines: string[] = [];
  let current = '';
  let lastY: number | undefined;

  for (const item of items) {
    const y = item.transform[5];
    if (
      current.length > 0 &&
      y !== undefined &&
      lastY !== undefined &&
      Math.abs(y - lastY) > LINE_Y_TOLERANCE
    ) {
      lines.push(current);
      current = '';
    }

    current += item.str;
    if (y !== undefined) {
      lastY = y;
    }

    if (item.hasEOL) {
      lines.push(current);
      current = '';
    }
  }

  if (current.length > 0) {
    lines.push(current);
  }
  return lines.map((line) => line.trimEnd()).join('\n');
}

// =============================================================================
// Reader
// =============================================================================

const PDF_MAGIC = '%PDF-';

export function detectFormat(filePath: string): DocumentFormat | undefined {
  return FORMAT_BY_EXTENSION[extname(filePath).toLowerCase()];
}

export interface FileDocumentReaderOptions {
  logger?: Logger;
}

/**
 * @example
 * ```typescript
 * const reader = new FileDocumentReader();
 * const { document } = await reader.read('manuals/rm0008.pdf');
 * ```
 */
export class FileDocumentReader implements DocumentReader {
  private readonly logger: Logger;

  constructor(options: FileDocumentReaderOptions = {}) {
    this.logger = resolveLogger('ingest:reader', options.logger);
  }

  async read(filePath: string): Promise<ExtractedDocument> {
    const format = detectFormat(filePath);
    if (!format) {
      throw new DocumentReadError(
        `Unsupported file type "${extname(filePath) || filePath}"; expected one of ${SUPPORTED_EXTENSIONS.join(', ')}`,
        DocumentReadErrorCode.UNSUPPORTED_FORMAT,
        { filePath }
      );
    }

    let data: Buffer;
    try {
      data = await readFile(filePath);
    } catch (error) {
      throw DocumentReadError.fromError(error, filePath);
    }

    if (format !== DocumentFormat.PDF) {
      return { path: filePath, format, document: { kind: 'text', text: data.toString('utf-8') } };
    }

    const pages = await this.extractPdfPages(new Uint8Array(data), filePath);
    this.logger.debug('Extracted PDF', { path: filePath, pages: pages.length });
    return { path: filePath, format, document: { kind: 'pages', pages } };
  }

  private async extractPdfPages(data: Uint8Array, filePath: string): Promise<PageText[]> {
    const header = String.fromCharCode(...data.slice(0, PDF_MAGIC.length));
    if (header !== PDF_MAGIC) {
      throw new DocumentReadError(
        'Not a PDF file: missing %PDF- header',
        DocumentReadErrorCode.INVALID_PDF,
        { filePath }
      );
    }

    try {
      const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');
      const pdf = await pdfjs.getDocument({
        data,
        useWorkerFetch: false,
        isEvalSupported: false,
        useSystemFonts: true,
      }).promise;

      const pages: PageText[] = [];
      try {
        for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
          const page = await pdf.getPage(pageNumber);
          const content = await page.getTextContent();
          const items: PositionedText[] = [];
          for (const item of content.items) {
            if ('str' in item) {
              items.push(item);
            }
          }
          pages.push({ pageNumber, text: assemblePageText(items) });
          page.cleanup();
        }
      } finally {
        await pdf.destroy();
      }
      return pages;
    } catch (error) {
      throw DocumentReadError.fromError(error, filePath);
    }
  }
}
