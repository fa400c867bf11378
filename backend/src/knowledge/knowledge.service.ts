import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { AIService } from '../ai/index.js';
import { ProgressReporter, type ProgressSink } from '../common/index.js';
import type { DocumentUpload } from '../documents/dto/document-upload.dto.js';
import { TEXT_EXTRACTOR_TOKEN } from '../documents/text-extractor.js';
import type { TextExtractor } from '../documents/text-extractor.js';
import {
  INGEST_TOTAL_STEPS,
  KnowledgeStoreService,
} from './knowledge-store.service.js';
import { DEFAULT_TOP_K, RetrieverService } from './retriever.service.js';
import type {
  KnowledgeEntry,
  KnowledgeEntrySummary,
  RetrievedMatch,
} from './knowledge.types.js';

@Injectable()
export class KnowledgeService {
  private readonly logger = new Logger(KnowledgeService.name);

  constructor(
    private readonly aiService: AIService,
    private readonly store: KnowledgeStoreService,
    private readonly retriever: RetrieverService,
    @Inject(TEXT_EXTRACTOR_TOKEN)
    private readonly extractor: TextExtractor,
  ) {}

  get requiresReembedding(): boolean {
    return this.store.requiresReembedding;
  }

  async ingestDocument(
    upload: DocumentUpload,
    onProgress?: ProgressSink,
  ): Promise<KnowledgeEntry> {
    const progress = new ProgressReporter(
      onProgress,
      INGEST_TOTAL_STEPS,
      this.logger,
    );
    progress.report('Uploading', 0, `File ${upload.fileName} uploaded successfully.`);
    progress.report('Extracting Text', 1, `Processing ${upload.fileName}...`);

    const text = await this.extractor.extract(upload.content, upload.kind);
    if (text.trim().length === 0) {
      throw new BadRequestException(
        `No text could be extracted from ${upload.fileName}`,
      );
    }

    return this.store.ingest(
      upload.fileName,
      text,
      (input, signal) => this.aiService.embed(input, signal),
      { fileSizeBytes: upload.content.length, onProgress },
    );
  }

  async listEntries(): Promise<KnowledgeEntrySummary[]> {
    const entries = await this.store.listEntries();
    return entries.map(toSummary);
  }

  getEntry(entryId: string): Promise<KnowledgeEntry | undefined> {
    return this.store.getEntry(entryId);
  }

  deleteEntry(entryId: string): Promise<boolean> {
    return this.store.delete(entryId);
  }

  async search(query: string, topK = DEFAULT_TOP_K): Promise<RetrievedMatch[]> {
    const embedding = await this.aiService.embed(query);
    return this.retriever.retrieve(embedding, topK);
  }
}

export function toSummary(entry: KnowledgeEntry): KnowledgeEntrySummary {
  return {
    id: entry.id,
    fileName: entry.fileName,
    chunkCount: entry.chunks.length,
    fileSizeBytes: entry.fileSizeBytes,
    createdAt: entry.createdAt,
  };
}
