import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  jest,
} from '@jest/globals';
import { BadRequestException, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';

import { AIService } from '../ai/index.js';
import type { ProcessingProgress } from '../common/index.js';
import type { DocumentUpload } from '../documents/dto/document-upload.dto.js';
import {
  TEXT_EXTRACTOR_TOKEN,
  type TextExtractor,
} from '../documents/text-extractor.js';
import { RetrieverService } from '../knowledge/retriever.service.js';
import {
  InMemoryKeyValueStore,
  KEY_VALUE_STORE_TOKEN,
} from '../storage/index.js';
import { AnswerOrchestratorService } from './answer-orchestrator.service.js';
import { QuestionDetector } from './question-detector.js';
import { RfpSessionService } from './rfp-session.service.js';
import { RfpService } from './rfp.service.js';

type EmbedFn = AIService['embed'];
type CompleteFn = AIService['complete'];
type RetrieveFn = RetrieverService['retrieve'];
type ExtractFn = TextExtractor['extract'];

const UPLOAD: DocumentUpload = {
  fileName: 'acme-rfp.pdf',
  kind: 'pdf',
  content: Buffer.from('placeholder pdf bytes', 'utf8'),
};

describe('RfpService', () => {
  let service: RfpService;
  let sessions: RfpSessionService;
  let extract: jest.MockedFunction<ExtractFn>;
  let complete: jest.MockedFunction<CompleteFn>;

  beforeEach(async () => {
    extract = jest.fn<ExtractFn>();
    complete = jest.fn<CompleteFn>();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RfpService,
        AnswerOrchestratorService,
        RfpSessionService,
        { provide: QuestionDetector, useValue: new QuestionDetector() },
        {
          provide: AIService,
          useValue: {
            embed: jest.fn<EmbedFn>().mockResolvedValue([1, 0]),
            complete,
          },
        },
        {
          provide: RetrieverService,
          useValue: { retrieve: jest.fn<RetrieveFn>().mockResolvedValue([]) },
        },
        { provide: TEXT_EXTRACTOR_TOKEN, useValue: { extract } },
        { provide: KEY_VALUE_STORE_TOKEN, useValue: new InMemoryKeyValueStore() },
        {
          provide: ConfigService,
          useValue: new ConfigService({
            rfp: { topK: 5, responseTitle: 'Acme Response' },
          }),
        },
      ],
    }).compile();

    service = module.get<RfpService>(RfpService);
    sessions = module.get<RfpSessionService>(RfpSessionService);

    extract.mockResolvedValue('What is your uptime?\nWho provides support?');
    complete.mockImplementation((prompt) =>
      Promise.resolve(
        prompt.includes('QUESTIONS AND ANSWERS:') ? 'Summary text' : 'Drafted answer',
      ),
    );
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('process', () => {
    it('should extract, answer and save the session', async () => {
      const events: ProcessingProgress[] = [];

      const { session, cancelled } = await service.process(UPLOAD, {
        onProgress: (progress) => events.push(progress),
      });

      expect(extract).toHaveBeenCalledWith(UPLOAD.content, 'pdf');
      expect(cancelled).toBe(false);
      expect(session.projectName).toBe('acme-rfp');
      expect(session.summary).toBe('Summary text');
      expect(session.questions.map((q) => q.questionText)).toEqual([
        'What is your uptime?',
        'Who provides support?',
      ]);
      expect(events.slice(0, 3).map((event) => event.step)).toEqual([
        'Uploading',
        'Extracting Text',
        'Detecting Questions',
      ]);
      await expect(sessions.load()).resolves.toEqual(session);
    });

    it('should use the project name given by the caller', async () => {
      const { session } = await service.process(UPLOAD, {
        projectName: 'Acme 2026',
      });

      expect(session.projectName).toBe('Acme 2026');
    });

    it('should reject a document without text', async () => {
      extract.mockResolvedValue('  \n ');

      await expect(service.process(UPLOAD)).rejects.toThrow(BadRequestException);
      await expect(sessions.load()).resolves.toBeUndefined();
    });
  });

  describe('regenerateAnswer', () => {
    it('should answer the question again and save it', async () => {
      await service.process(UPLOAD);
      await sessions.updateAnswer(1, 'Reviewed answer');
      complete.mockResolvedValue('Fresh answer');

      const regenerated = await service.regenerateAnswer(1);

      expect(regenerated.generatedAnswer).toBe('Fresh answer');
      expect(regenerated.editedAnswer).toBe('Fresh answer');
      const saved = await sessions.require();
      expect(saved.questions[0].editedAnswer).toBe('Fresh answer');
    });

    it('should reject an unknown question', async () => {
      await service.process(UPLOAD);

      await expect(service.regenerateAnswer(5)).rejects.toThrow(
        NotFoundException,
      );
    });
  });

  it('should regenerate the summary from the saved answers', async () => {
    await service.process(UPLOAD);
    complete.mockResolvedValue('Updated summary');

    await expect(service.regenerateSummary()).resolves.toBe('Updated summary');
    await expect(sessions.require()).resolves.toMatchObject({
      summary: 'Updated summary',
    });
  });

  describe('exportMarkdown', () => {
    it('should render the saved session with the configured title', async () => {
      await service.process(UPLOAD);

      const exported = await service.exportMarkdown(
        new Date(Date.UTC(2026, 9, 5, 14, 30, 0)),
      );

      expect(exported.fileName).toBe('RFP_Response_20261005_143000.md');
      expect(exported.content).toContain(
        '# Acme Response\n\n_Generated: October 05, 2026_',
      );
      expect(exported.content).toContain(
        '### Q2: Who provides support?\n\nDrafted answer',
      );
    });

    it('should fail when nothing has been processed', async () => {
      await expect(service.exportMarkdown()).rejects.toThrow(NotFoundException);
    });
  });
});
