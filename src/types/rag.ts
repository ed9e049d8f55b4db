/**
 * RAG data model shared by the chunker, the vector index and the database schema.
 */

export interface ChunkMetadata {
  filename: string;
  chunkLength: number;
  pageNumber: number;
}

/**
 * A stored unit of a document. `id` is `${documentId}_${chunkIndex}`.
 */
export interface DocumentChunk {
  id: string;
  documentId: string;
  content: string;
  pageNumber: number;
  chunkIndex: number;
  metadata: ChunkMetadata;
}

export interface RetrievedChunk extends DocumentChunk {
  /** 1 - cosine distance */
  similarity: number;
  /** 1-based position in the result list */
  rank: number;
}
