import { beforeEach, describe, expect, it } from '@jest/globals';
import { NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import {
  InMemoryKeyValueStore,
  KEY_VALUE_STORE_TOKEN,
} from '../storage/index.js';
import { createPendingQuestion } from './answer-orchestrator.service.js';
import { RFP_SESSION_KEY, RfpSessionService } from './rfp-session.service.js';
import type { AnsweredQuestion, RfpSession } from './rfp.types.js';

const question = (
  index: number,
  confidenceScore: number,
): AnsweredQuestion => ({
  ...createPendingQuestion(`Question number ${index}?`, index),
  generatedAnswer: `Generated ${index}`,
  editedAnswer: `Generated ${index}`,
  relevantContext: [
    {
      chunkId: `chunk-${index}`,
      chunkText: 'Reference text.',
      similarityScore: confidenceScore,
      sourceFileName: 'reference.txt',
    },
  ],
  confidenceScore,
  status: 'completed',
});

const SESSION: RfpSession = {
  projectName: 'acme-rfp',
  fileName: 'acme-rfp.pdf',
  questions: [question(1, 0.9), question(2, 0.3), question(3, 0.49)],
  summary: 'Summary text',
  processedAt: new Date(Date.UTC(2026, 9, 5, 14, 30, 0)),
};

describe('RfpSessionService', () => {
  let service: RfpSessionService;
  let storage: InMemoryKeyValueStore;

  beforeEach(async () => {
    storage = new InMemoryKeyValueStore();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RfpSessionService,
        { provide: KEY_VALUE_STORE_TOKEN, useValue: storage },
      ],
    }).compile();

    service = module.get<RfpSessionService>(RfpSessionService);
  });

  it('should load nothing before a session is saved', async () => {
    await expect(service.load()).resolves.toBeUndefined();
  });

  it('should round-trip a saved session', async () => {
    await service.save(SESSION);

    await expect(service.load()).resolves.toEqual(SESSION);
  });

  it('should ignore an unreadable stored session', async () => {
    await storage.set(RFP_SESSION_KEY, Buffer.from('{"projectName":1}', 'utf8'));

    await expect(service.load()).resolves.toBeUndefined();
  });

  it('should clear the session', async () => {
    await service.save(SESSION);

    await service.clear();

    await expect(service.load()).resolves.toBeUndefined();
  });

  describe('updateAnswer', () => {
    it('should replace the edited answer and keep the generated one', async () => {
      await service.save(SESSION);

      const updated = await service.updateAnswer(2, 'Reviewed answer');

      expect(updated.editedAnswer).toBe('Reviewed answer');
      expect(updated.generatedAnswer).toBe('Generated 2');
      const reloaded = await service.require();
      expect(reloaded.questions.map((q) => q.editedAnswer)).toEqual([
        'Generated 1',
        'Reviewed answer',
        'Generated 3',
      ]);
    });

    it('should reject an unknown question', async () => {
      await service.save(SESSION);

      await expect(service.updateAnswer(9, 'x')).rejects.toThrow(
        NotFoundException,
      );
    });

    it('should reject edits when nothing has been processed', async () => {
      await expect(service.updateAnswer(1, 'x')).rejects.toThrow(
        NotFoundException,
      );
    });
  });

  it('should update the summary', async () => {
    await service.save(SESSION);

    await service.updateSummary('New summary');

    await expect(service.require()).resolves.toMatchObject({
      summary: 'New summary',
    });
  });

  it('should count questions below medium confidence', async () => {
    await expect(service.lowConfidenceCount()).resolves.toBe(0);

    await service.save(SESSION);

    await expect(service.lowConfidenceCount()).resolves.toBe(2);
  });
});
