import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'node:crypto';
import { EmbeddingUnavailableError } from '../ai/index.js';
import {
  ProgressReporter,
  WriteLock,
  describeError,
} from '../common/index.js';
import type { AppConfig, KnowledgeConfig } from '../config/index.js';
import { KEY_VALUE_STORE_TOKEN } from '../storage/index.js';
import type { KeyValueStore } from '../storage/index.js';
import { DEFAULT_MAX_CHUNK_CHARS, chunkTextWithOffsets } from './chunker.js';
import { DimensionMismatchError } from './knowledge.errors.js';
import {
  deserializeEntries,
  serializeEntries,
} from './knowledge.serializer.js';
import type {
  ChunkWithSource,
  EmbedFn,
  Embedding,
  IngestOptions,
  KnowledgeChunk,
  KnowledgeEntry,
} from './knowledge.types.js';

export const KNOWLEDGE_STORAGE_KEY = 'knowledgebase';
export const DEFAULT_EMBED_CHAR_LIMIT = 8000;

/** Upload, Extract, Embed, Index, Finalize */
export const INGEST_TOTAL_STEPS = 5;

function hasMixedDimensions(entries: readonly KnowledgeEntry[]): boolean {
  const lengths = new Set(
    entries.flatMap((entry) => [
      entry.originalTextEmbedding.length,
      ...entry.chunks.map((chunk) => chunk.embedding.length),
    ]),
  );
  return lengths.size > 1;
}

/**
 * Owns the ingested documents. Writes are serialized through a lock and
 * replace the entry array wholesale, so a reader holding the previous array
 * always sees a complete collection.
 */
@Injectable()
export class KnowledgeStoreService {
  private readonly logger = new Logger(KnowledgeStoreService.name);
  private readonly writeLock = new WriteLock();
  private entries: readonly KnowledgeEntry[] = [];
  private loading: Promise<void> | null = null;
  private reembeddingRequired = false;

  constructor(
    @Inject(KEY_VALUE_STORE_TOKEN) private readonly storage: KeyValueStore,
    private readonly configService: ConfigService<AppConfig>,
  ) {}

  get requiresReembedding(): boolean {
    return this.reembeddingRequired;
  }

  markRequiresReembedding(): void {
    if (!this.reembeddingRequired) {
      this.logger.warn(
        'Stored chunk embeddings no longer match the embedding model; documents must be re-ingested',
      );
    }
    this.reembeddingRequired = true;
  }

  async ingest(
    fileName: string,
    rawText: string,
    embed: EmbedFn,
    options: IngestOptions = {},
  ): Promise<KnowledgeEntry> {
    const settings = this.settings();
    const progress = new ProgressReporter(
      options.onProgress,
      INGEST_TOTAL_STEPS,
      this.logger,
    );
    const entryId = randomUUID();

    progress.report('Generating Embeddings', 2, 'Creating document embedding...');
    const originalTextEmbedding = await this.embedOrFail(
      embed,
      rawText.slice(0, settings.embedCharLimit),
      options.signal,
      `document ${fileName}`,
    );

    const spans = chunkTextWithOffsets(
      rawText,
      options.maxChunkChars ?? settings.chunkSize,
    );
    progress.report(
      'Indexing',
      3,
      `Generating embeddings for ${spans.length} chunks...`,
    );

    const chunks: KnowledgeChunk[] = [];
    for (const [index, span] of spans.entries()) {
      progress.report(
        'Indexing',
        3,
        `Processing chunk ${index + 1} of ${spans.length}...`,
      );
      const embedding = await this.embedOrFail(
        embed,
        span.text,
        options.signal,
        `chunk ${index + 1} of ${fileName}`,
      );
      if (embedding.length !== originalTextEmbedding.length) {
        throw new DimensionMismatchError(
          originalTextEmbedding.length,
          embedding.length,
        );
      }
      chunks.push(
        Object.freeze({
          id: randomUUID(),
          entryId,
          index,
          text: span.text,
          embedding,
          startPosition: span.startPosition,
          endPosition: span.endPosition,
        }),
      );
    }

    const entry: KnowledgeEntry = Object.freeze({
      id: entryId,
      fileName,
      originalText: rawText,
      originalTextEmbedding,
      chunks: Object.freeze(chunks),
      createdAt: new Date(),
      fileSizeBytes: options.fileSizeBytes ?? Buffer.byteLength(rawText, 'utf8'),
    });

    progress.report('Finalizing', 4, 'Saving to knowledgebase...');
    await this.writeLock.run(async () => {
      await this.ensureLoaded();
      this.checkDimensions(originalTextEmbedding);
      const next = [...this.entries, entry];
      await this.persist(next);
      this.entries = next;
    });

    this.logger.log(`Indexed ${fileName} as ${entryId} (${chunks.length} chunks)`);
    progress.complete(
      `Added ${fileName} with ${chunks.length} chunks to knowledgebase.`,
    );
    return entry;
  }

  async listEntries(): Promise<KnowledgeEntry[]> {
    await this.ensureLoaded();
    return [...this.entries];
  }

  async getEntry(entryId: string): Promise<KnowledgeEntry | undefined> {
    await this.ensureLoaded();
    return this.entries.find((entry) => entry.id === entryId);
  }

  /**
   * Removes an entry and its chunks. Unknown ids are a no-op.
   * @returns whether an entry was removed
   */
  delete(entryId: string): Promise<boolean> {
    return this.writeLock.run(async () => {
      await this.ensureLoaded();
      const next = this.entries.filter((entry) => entry.id !== entryId);
      if (next.length === this.entries.length) {
        return false;
      }

      await this.persist(next);
      this.entries = next;
      if (next.length === 0) {
        this.reembeddingRequired = false;
      }
      this.logger.log(`Deleted knowledge entry ${entryId}`);
      return true;
    });
  }

  async allChunksWithSource(): Promise<ChunkWithSource[]> {
    await this.ensureLoaded();
    const snapshot = this.entries;
    return snapshot.flatMap((entry) =>
      entry.chunks.map((chunk) => ({
        chunk,
        sourceFileName: entry.fileName,
      })),
    );
  }

  private async embedOrFail(
    embed: EmbedFn,
    text: string,
    signal: AbortSignal | undefined,
    label: string,
  ): Promise<Embedding> {
    try {
      return await embed(text, signal);
    } catch (error) {
      if (error instanceof EmbeddingUnavailableError) {
        throw error;
      }
      throw new EmbeddingUnavailableError(
        `Failed to embed ${label}: ${describeError(error)}`,
        { cause: error },
      );
    }
  }

  private checkDimensions(embedding: Embedding): void {
    const existing = this.entries[0]?.originalTextEmbedding;
    if (existing && existing.length !== embedding.length) {
      this.markRequiresReembedding();
    }
  }

  private settings(): KnowledgeConfig {
    return (
      this.configService.get<KnowledgeConfig>('knowledge') ?? {
        chunkSize: DEFAULT_MAX_CHUNK_CHARS,
        embedCharLimit: DEFAULT_EMBED_CHAR_LIMIT,
      }
    );
  }

  private async persist(entries: readonly KnowledgeEntry[]): Promise<void> {
    await this.storage.set(KNOWLEDGE_STORAGE_KEY, serializeEntries(entries));
  }

  private ensureLoaded(): Promise<void> {
    if (!this.loading) {
      this.loading = this.load().catch((error: unknown) => {
        this.loading = null;
        throw error;
      });
    }
    return this.loading;
  }

  private async load(): Promise<void> {
    const stored = await this.storage.get(KNOWLEDGE_STORAGE_KEY);
    if (!stored) {
      this.entries = [];
      return;
    }

    try {
      this.entries = deserializeEntries(stored);
      this.logger.log(`Loaded ${this.entries.length} knowledge entries`);
      if (hasMixedDimensions(this.entries)) {
        this.markRequiresReembedding();
      }
    } catch (error) {
      this.logger.error(
        `Stored knowledge base is unreadable, starting empty: ${describeError(error)}`,
      );
      this.entries = [];
    }
  }
}
