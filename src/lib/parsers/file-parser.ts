/**
 * File Parser Utility
 *
 * Extracts plain text from uploaded files:
 * - PDF (.pdf), one `--- Page N ---` marker per page
 * - Word documents (.docx)
 * - Plain text (.txt) and Markdown (.md)
 */

import mammoth from 'mammoth';
import { ExtractionFailure, ValidationError, toErrorMessage } from '@/lib/errors';
import { loggers } from '@/lib/logger';
import { MAX_UPLOAD_BYTES } from '@/lib/rag/config';

const log = loggers.parser.child({ service: 'FileParser' });

// pdf-parse v2.x has a class-based API
// Use dynamic import to avoid type definition issues
interface PDFPageText {
  num: number;
  text: string;
}

interface PDFParserInstance {
  load(): Promise<void>;
  getText(): Promise<{ text: string; pages?: PDFPageText[] }>;
  destroy(): Promise<void> | void;
}

interface PDFParseConstructor {
  new (options: { data: Uint8Array }): PDFParserInstance;
}

let PDFParseClass: PDFParseConstructor | null = null;

async function getPDFParser(): Promise<PDFParseConstructor> {
  if (!PDFParseClass) {
    const mod = await import('pdf-parse');
    // Cast through unknown to avoid private property type conflicts
    PDFParseClass = (mod as unknown as { PDFParse: PDFParseConstructor }).PDFParse;
  }
  return PDFParseClass;
}

// =============================================================================
// Types
// =============================================================================

/**
 * Turns uploaded bytes into text, with page markers where the format has pages.
 */
export interface TextExtractor {
  extract(bytes: Uint8Array, filename: string): Promise<string>;
}

export const SUPPORTED_EXTENSIONS = ['.pdf', '.txt', '.md', '.docx'] as const;
export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

export const MAX_FILE_SIZE = MAX_UPLOAD_BYTES;

// =============================================================================
// File Type Detection
// =============================================================================

/**
 * Get file extension from filename.
 */
export function getFileExtension(filename: string): string {
  const lastDot = filename.lastIndexOf('.');
  if (lastDot === -1) return '';
  return filename.slice(lastDot).toLowerCase();
}

function toSupportedExtension(filename: string): SupportedExtension | undefined {
  const ext = getFileExtension(filename);
  return SUPPORTED_EXTENSIONS.find((supported) => supported === ext);
}

/**
 * Check if file type is supported.
 */
export function isSupportedFileType(filename: string): boolean {
  return toSupportedExtension(filename) !== undefined;
}

export function formatPageMarker(pageNumber: number): string {
  return `--- Page ${pageNumber} ---`;
}

// =============================================================================
// Parsers
// =============================================================================

/**
 * Parse PDF file, prefixing each page's text with its marker.
 */
async function parsePDF(bytes: Uint8Array): Promise<string> {
  const PDFParse = await getPDFParser();
  const parser = new PDFParse({ data: bytes });

  try {
    await parser.load();
    const result = await parser.getText();

    if (!result.pages || result.pages.length === 0) {
      return `${formatPageMarker(1)}\n${result.text}`;
    }

    return result.pages
      .map((page) => `${formatPageMarker(page.num)}\n${page.text}`)
      .join('\n');
  } finally {
    await parser.destroy();
  }
}

/**
 * Parse DOCX file. Word documents carry no page boundaries.
 */
async function parseDOCX(bytes: Uint8Array): Promise<string> {
  const result = await mammoth.extractRawText({ buffer: Buffer.from(bytes) });
  return result.value;
}

function parseText(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('utf-8');
}

async function parseByExtension(ext: SupportedExtension, bytes: Uint8Array): Promise<string> {
  switch (ext) {
    case '.pdf':
      return parsePDF(bytes);
    case '.docx':
      return parseDOCX(bytes);
    case '.txt':
    case '.md':
      return parseText(bytes);
  }
}

// =============================================================================
// Main Parser
// =============================================================================

/**
 * Validate file before parsing.
 *
 * @throws ValidationError for an unsupported extension, an empty file or one over the size limit
 */
export function validateFile(file: { name: string; size: number }, maxBytes: number = MAX_FILE_SIZE): SupportedExtension {
  const ext = toSupportedExtension(file.name);

  if (!ext) {
    throw new ValidationError(
      `Unsupported file type: ${getFileExtension(file.name) || 'none'}. Supported types: ${SUPPORTED_EXTENSIONS.join(', ')}`
    );
  }

  if (file.size > maxBytes) {
    throw new ValidationError(`File too large. Maximum size: ${maxBytes / 1024 / 1024}MB`);
  }

  if (file.size === 0) {
    throw new ValidationError('File is empty');
  }

  return ext;
}

/**
 * Extract text content from a file.
 *
 * @param bytes - File contents
 * @param filename - Original filename (for type detection)
 * @throws ValidationError if the file is rejected before parsing
 * @throws ExtractionFailure if parsing fails or yields no text
 */
export async function extractText(
  bytes: Uint8Array,
  filename: string,
  maxBytes: number = MAX_FILE_SIZE
): Promise<string> {
  const ext = validateFile({ name: filename, size: bytes.byteLength }, maxBytes);
  const start = Date.now();

  let text: string;
  try {
    text = await parseByExtension(ext, bytes);
  } catch (error) {
    log.warn({ filename, error: toErrorMessage(error) }, 'File parsing failed');
    throw new ExtractionFailure(`Failed to extract text from ${filename}: ${toErrorMessage(error)}`, error);
  }

  // Page markers alone are not content
  if (!text.replace(/---\s*Page\s+\d+\s*---/g, '').trim()) {
    throw new ExtractionFailure(`No text content could be extracted from ${filename}`);
  }

  log.debug({ filename, chars: text.length, duration_ms: Date.now() - start }, 'Extracted text');
  return text.replace(/\r\n/g, '\n');
}

/**
 * Default extractor backed by pdf-parse, mammoth and UTF-8 decoding.
 */
export class FileTextExtractor implements TextExtractor {
  constructor(private maxBytes: number = MAX_FILE_SIZE) {}

  extract(bytes: Uint8Array, filename: string): Promise<string> {
    return extractText(bytes, filename, this.maxBytes);
  }
}
