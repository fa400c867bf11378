import type { ProgressSink } from '../common/index.js';

export type Embedding = number[];

export interface KnowledgeChunk {
  readonly id: string;
  readonly entryId: string;
  readonly index: number;
  readonly text: string;
  readonly embedding: Embedding;
  readonly startPosition?: number;
  readonly endPosition?: number;
}

export interface KnowledgeEntry {
  readonly id: string;
  readonly fileName: string;
  readonly originalText: string;
  readonly originalTextEmbedding: Embedding;
  readonly chunks: readonly KnowledgeChunk[];
  readonly createdAt: Date;
  readonly fileSizeBytes: number;
}

export interface KnowledgeEntrySummary {
  id: string;
  fileName: string;
  chunkCount: number;
  fileSizeBytes: number;
  createdAt: Date;
}

export interface ChunkWithSource {
  chunk: KnowledgeChunk;
  sourceFileName: string;
}

export interface RetrievedMatch {
  chunkId: string;
  chunkText: string;
  similarityScore: number;
  sourceFileName: string;
}

export type EmbedFn = (text: string, signal?: AbortSignal) => Promise<Embedding>;

export interface IngestOptions {
  /** Size of the uploaded file; defaults to the UTF-8 length of the text. */
  fileSizeBytes?: number;
  maxChunkChars?: number;
  onProgress?: ProgressSink;
  signal?: AbortSignal;
}
