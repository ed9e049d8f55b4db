/**
 * Document Chunker
 *
 * Splits extracted text into overlapping, page-attributed chunks for retrieval.
 * Windows end at the last sentence terminator when one falls past the window
 * midpoint, so most chunks close on a full sentence.
 */

import type { ChunkMetadata, DocumentChunk } from '@/types/rag';
import { DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE, MIN_CHUNK_LENGTH } from './config';

// =============================================================================
// Types
// =============================================================================

export interface TextChunk {
  content: string;
  chunkIndex: number;
  /** Offsets into the normalized text of the page the chunk came from */
  startOffset: number;
  endOffset: number;
}

export interface PageChunk extends TextChunk {
  pageNumber: number;
}

export interface PageText {
  pageNumber: number;
  text: string;
}

export interface ChunkOptions {
  chunkSize: number;
  chunkOverlap: number;
  /** Chunks shorter than this after trimming are dropped */
  minChunkLength: number;
}

export interface ChunkSource {
  documentId: string;
  filename: string;
}

// =============================================================================
// Default Options
// =============================================================================

const DEFAULT_CHUNK_OPTIONS: ChunkOptions = {
  chunkSize: DEFAULT_CHUNK_SIZE,
  chunkOverlap: DEFAULT_CHUNK_OVERLAP,
  minChunkLength: MIN_CHUNK_LENGTH,
};

const PAGE_MARKER = /---\s*Page\s+(\d+)\s*---/g;

// Letters, digits, whitespace and common punctuation survive normalization
const UNSAFE_CHARACTERS = /[^\p{L}\p{N}_\s\-.,!?;:()[\]{}"']/gu;

// =============================================================================
// Text Normalization
// =============================================================================

/**
 * Replace characters outside the safe set with spaces and collapse whitespace.
 */
export function normalizeText(text: string): string {
  return text.replace(UNSAFE_CHARACTERS, ' ').replace(/\s+/g, ' ').trim();
}

/**
 * Split text on `--- Page N ---` markers.
 *
 * Text without markers is page 1. Non-blank text before the first marker
 * is kept as page 0.
 */
export function splitPages(text: string): PageText[] {
  const markers = Array.from(text.matchAll(PAGE_MARKER));

  if (markers.length === 0) {
    return [{ pageNumber: 1, text }];
  }

  const pages: PageText[] = [];
  const preamble = text.slice(0, markers[0].index ?? 0);
  if (preamble.trim()) {
    pages.push({ pageNumber: 0, text: preamble });
  }

  markers.forEach((marker, i) => {
    const start = (marker.index ?? 0) + marker[0].length;
    const next = markers[i + 1];
    const end = next ? next.index ?? text.length : text.length;
    pages.push({ pageNumber: Number.parseInt(marker[1], 10), text: text.slice(start, end) });
  });

  return pages;
}

// =============================================================================
// Chunking Functions
// =============================================================================

/**
 * Cut normalized text into windows of at most `chunkSize` characters.
 * Consecutive windows share exactly `chunkOverlap` characters, and every
 * window starts at least one character after the previous one.
 */
function splitWindows(
  text: string,
  chunkSize: number,
  chunkOverlap: number
): Array<{ content: string; startOffset: number; endOffset: number }> {
  const windows: Array<{ content: string; startOffset: number; endOffset: number }> = [];
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + chunkSize, text.length);

    if (end < text.length) {
      const window = text.slice(start, end);
      const breakPoint = Math.max(
        window.lastIndexOf('.'),
        window.lastIndexOf('?'),
        window.lastIndexOf('!')
      );
      if (breakPoint > Math.floor(chunkSize / 2)) {
        end = start + breakPoint + 1;
      }
    }

    windows.push({ content: text.slice(start, end), startOffset: start, endOffset: end });

    if (end >= text.length) break;
    start = Math.max(end - chunkOverlap, start + 1);
  }

  return windows;
}

/**
 * Split one run of text into overlapping chunks.
 */
export function chunkText(text: string, options: Partial<ChunkOptions> = {}): TextChunk[] {
  const { chunkSize, chunkOverlap, minChunkLength } = { ...DEFAULT_CHUNK_OPTIONS, ...options };
  const normalized = normalizeText(text);

  if (!normalized) {
    return [];
  }

  const chunks: TextChunk[] = [];
  for (const window of splitWindows(normalized, chunkSize, chunkOverlap)) {
    const content = window.content.trim();
    if (content.length < minChunkLength) continue;

    chunks.push({
      content,
      chunkIndex: chunks.length,
      startOffset: window.startOffset,
      endOffset: window.endOffset,
    });
  }

  return chunks;
}

/**
 * Chunk each page separately so no chunk spans a page boundary.
 * Chunk indices run continuously across pages.
 */
export function chunkPages(text: string, options: Partial<ChunkOptions> = {}): PageChunk[] {
  const chunks: PageChunk[] = [];

  for (const page of splitPages(text)) {
    for (const chunk of chunkText(page.text, options)) {
      chunks.push({ ...chunk, chunkIndex: chunks.length, pageNumber: page.pageNumber });
    }
  }

  return chunks;
}

/**
 * Create storable chunks for a document.
 */
export function chunkDocument(
  text: string,
  source: ChunkSource,
  options: Partial<ChunkOptions> = {}
): DocumentChunk[] {
  return chunkPages(text, options).map((chunk) => {
    const metadata: ChunkMetadata = {
      filename: source.filename,
      chunkLength: chunk.content.length,
      pageNumber: chunk.pageNumber,
    };

    return {
      id: `${source.documentId}_${chunk.chunkIndex}`,
      documentId: source.documentId,
      content: chunk.content,
      pageNumber: chunk.pageNumber,
      chunkIndex: chunk.chunkIndex,
      metadata,
    };
  });
}

/**
 * Number of distinct pages represented in a chunk list.
 */
export function countDistinctPages(chunks: ReadonlyArray<{ pageNumber: number }>): number {
  return new Set(chunks.map((chunk) => chunk.pageNumber)).size;
}
