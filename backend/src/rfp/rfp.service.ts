import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import path from 'node:path';
import { ProgressReporter, type ProgressSink } from '../common/index.js';
import type { AppConfig, RfpConfig } from '../config/index.js';
import type { DocumentUpload } from '../documents/dto/document-upload.dto.js';
import { TEXT_EXTRACTOR_TOKEN } from '../documents/text-extractor.js';
import type { TextExtractor } from '../documents/text-extractor.js';
import {
  AnswerOrchestratorService,
  RFP_TOTAL_STEPS,
} from './answer-orchestrator.service.js';
import { QuestionDetector } from './question-detector.js';
import { assembleResponseDocument } from './response-assembler.js';
import { exportFileName, renderMarkdown } from './response-writer.js';
import { RfpSessionService } from './rfp-session.service.js';
import type {
  AnsweredQuestion,
  ResponseDocument,
  RfpSession,
} from './rfp.types.js';

export interface ProcessUploadOptions {
  projectName?: string;
  topK?: number;
  signal?: AbortSignal;
  onProgress?: ProgressSink;
  onQuestion?: (question: AnsweredQuestion) => void;
}

@Injectable()
export class RfpService {
  private readonly logger = new Logger(RfpService.name);

  constructor(
    private readonly orchestrator: AnswerOrchestratorService,
    private readonly detector: QuestionDetector,
    private readonly sessions: RfpSessionService,
    private readonly configService: ConfigService<AppConfig>,
    @Inject(TEXT_EXTRACTOR_TOKEN)
    private readonly extractor: TextExtractor,
  ) {}

  detectQuestions(text: string): string[] {
    return this.detector.detect(text);
  }

  /**
   * Extracts, answers and saves an RFP. A cancelled run still saves the
   * questions answered so far.
   */
  async process(
    upload: DocumentUpload,
    options: ProcessUploadOptions = {},
  ): Promise<{ session: RfpSession; cancelled: boolean }> {
    const progress = new ProgressReporter(
      options.onProgress,
      RFP_TOTAL_STEPS,
      this.logger,
    );
    progress.report('Uploading', 0, `File ${upload.fileName} uploaded successfully.`);
    progress.report('Extracting Text', 1, `Extracting text from ${upload.fileName}...`);

    const text = await this.extractor.extract(upload.content, upload.kind);
    if (text.trim().length === 0) {
      throw new BadRequestException(
        `No text could be extracted from ${upload.fileName}`,
      );
    }

    const result = await this.orchestrator.processRfp({
      fileName: upload.fileName,
      text,
      topK: options.topK,
      signal: options.signal,
      onProgress: options.onProgress,
      onQuestion: options.onQuestion,
    });

    const session: RfpSession = {
      projectName: options.projectName ?? path.parse(upload.fileName).name,
      fileName: upload.fileName,
      questions: result.questions,
      summary: result.summary,
      processedAt: new Date(),
    };
    await this.sessions.save(session);
    return { session, cancelled: result.cancelled };
  }

  async regenerateAnswer(index: number, topK?: number): Promise<AnsweredQuestion> {
    const session = await this.sessions.require();
    const question = session.questions.find((q) => q.index === index);
    if (!question) {
      throw new NotFoundException(`Question ${index} not found`);
    }

    const regenerated = await this.orchestrator.regenerateAnswer(question, topK);
    return this.sessions.replaceQuestion(regenerated);
  }

  async regenerateSummary(): Promise<string> {
    const session = await this.sessions.require();
    const summary = await this.orchestrator.generateSummary(session.questions);
    await this.sessions.updateSummary(summary);
    return summary;
  }

  async buildResponseDocument(generatedAt = new Date()): Promise<ResponseDocument> {
    const session = await this.sessions.require();
    return assembleResponseDocument(session.questions, session.summary, {
      title: this.configService.get<RfpConfig>('rfp')?.responseTitle,
      generatedAt,
    });
  }

  async exportMarkdown(
    generatedAt = new Date(),
  ): Promise<{ fileName: string; content: string }> {
    const document = await this.buildResponseDocument(generatedAt);
    return {
      fileName: exportFileName(generatedAt),
      content: renderMarkdown(document),
    };
  }
}
