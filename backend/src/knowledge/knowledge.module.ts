import { Module } from '@nestjs/common';
import { AiModule } from '../ai/index.js';
import { DocumentsModule } from '../documents/index.js';
import { StorageModule } from '../storage/index.js';
import { KnowledgeController } from './knowledge.controller.js';
import { KnowledgeStoreService } from './knowledge-store.service.js';
import { KnowledgeService } from './knowledge.service.js';
import { RetrieverService } from './retriever.service.js';

@Module({
  imports: [AiModule, DocumentsModule, StorageModule],
  providers: [KnowledgeStoreService, RetrieverService, KnowledgeService],
  controllers: [KnowledgeController],
  exports: [KnowledgeStoreService, RetrieverService, KnowledgeService],
})
export class KnowledgeModule {}
