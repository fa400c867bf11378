import { Module } from '@nestjs/common';
import { AiModule } from '../ai/index.js';
import { DocumentsModule } from '../documents/index.js';
import { KnowledgeModule } from '../knowledge/index.js';
import { StorageModule } from '../storage/index.js';
import { AnswerOrchestratorService } from './answer-orchestrator.service.js';
import { QuestionDetector } from './question-detector.js';
import { RfpController } from './rfp.controller.js';
import { RfpSessionService } from './rfp-session.service.js';
import { RfpService } from './rfp.service.js';

@Module({
  imports: [AiModule, DocumentsModule, KnowledgeModule, StorageModule],
  providers: [
    {
      provide: QuestionDetector,
      useFactory: () => new QuestionDetector(),
    },
    AnswerOrchestratorService,
    RfpSessionService,
    RfpService,
  ],
  controllers: [RfpController],
  exports: [AnswerOrchestratorService, RfpSessionService, RfpService],
})
export class RfpModule {}
