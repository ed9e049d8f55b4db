/**
 * In-process stand-ins for the embedding service and generation backends.
 */

import type { LLMAdapter, LLMCompletionRequest, LLMCompletionResponse } from '@/types/llm';
import type { RetrievedChunk } from '@/types/rag';
import type { Embedder } from '../embeddings';
import { MemoryVectorStore, type VectorRecord } from '../vector-store';
import type { TextExtractor } from '@/lib/parsers';

export const VOCABULARY = ['revenue', 'warranty', 'refund', 'office', 'holiday', 'security', 'salary', 'travel'];

/**
 * Counts vocabulary words, so texts sharing words are similar and texts
 * sharing none get a zero vector (similarity 0 to everything).
 */
export class KeywordEmbedder implements Embedder {
  readonly model = 'keyword-test';
  readonly dimensions = VOCABULARY.length;
  calls = 0;

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.calls++;
    return texts.map((text) => keywordVector(text));
  }
}

export function keywordVector(text: string): number[] {
  const words = text.toLowerCase().match(/[a-z]+/g) ?? [];
  return VOCABULARY.map((term) => words.filter((word) => word === term).length);
}

type Reply = string | Error | (() => Promise<string>);

/**
 * Adapter that replays scripted replies and records requests.
 */
export class ScriptedAdapter implements LLMAdapter {
  readonly model = 'scripted';
  requests: LLMCompletionRequest[] = [];

  constructor(
    readonly provider: string,
    private reply: Reply,
    private configured = true
  ) {}

  isConfigured(): boolean {
    return this.configured;
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    this.requests.push(request);
    if (this.reply instanceof Error) throw this.reply;
    const content = typeof this.reply === 'function' ? await this.reply() : this.reply;
    return { content, finishReason: 'stop', usage: { promptTokens: 1, completionTokens: 1, totalTokens: 2 } };
  }
}

/**
 * Extractor that decodes bytes as UTF-8, skipping file-type handling.
 */
export class PlainTextExtractor implements TextExtractor {
  async extract(bytes: Uint8Array): Promise<string> {
    return Buffer.from(bytes).toString('utf-8');
  }
}

export function retrievedChunk(overrides: Partial<RetrievedChunk> & { content: string }): RetrievedChunk {
  const pageNumber = overrides.pageNumber ?? 1;
  return {
    id: 'doc-1_0',
    documentId: 'doc-1',
    pageNumber,
    chunkIndex: 0,
    metadata: { filename: 'handbook.txt', chunkLength: overrides.content.length, pageNumber },
    similarity: 0.9,
    rank: 1,
    ...overrides,
  };
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Memory store whose writes take `delayMs` before they are applied.
 */
export class SlowStore extends MemoryVectorStore {
  constructor(public delayMs: number) {
    super();
  }

  async add(records: VectorRecord[], signal?: AbortSignal): Promise<void> {
    await sleep(this.delayMs);
    return super.add(records, signal);
  }
}

/**
 * Memory store that commits at once but never acknowledges the write.
 */
export class UnacknowledgedStore extends MemoryVectorStore {
  async add(records: VectorRecord[]): Promise<void> {
    await super.add(records);
    return new Promise<void>(() => {});
  }
}
