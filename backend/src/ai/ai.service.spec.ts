import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import { Test, TestingModule } from '@nestjs/testing';
import { AI_PROVIDER_TOKEN } from './ai.constants.js';
import {
  CompletionUnavailableError,
  EmbeddingUnavailableError,
} from './ai.errors.js';
import { AIService } from './ai.service.js';
import type { AiProvider } from './providers/ai-provider.js';

type GenerateTextFn = AiProvider['generateText'];
type EmbedTextFn = AiProvider['embedText'];

describe('AIService', () => {
  let service: AIService;
  let provider: {
    name: string;
    generateText: jest.MockedFunction<GenerateTextFn>;
    embedText: jest.MockedFunction<EmbedTextFn>;
  };

  beforeEach(async () => {
    provider = {
      name: 'test',
      generateText: jest.fn<GenerateTextFn>(),
      embedText: jest.fn<EmbedTextFn>(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [AIService, { provide: AI_PROVIDER_TOKEN, useValue: provider }],
    }).compile();

    service = module.get<AIService>(AIService);
  });

  describe('embed', () => {
    it('should return the vector for a single input', async () => {
      provider.embedText.mockResolvedValue({ embeddings: [[0.1, 0.2]] });
      const controller = new AbortController();

      await expect(service.embed('hello', controller.signal)).resolves.toEqual([
        0.1, 0.2,
      ]);
      expect(provider.embedText).toHaveBeenCalledWith({
        inputs: ['hello'],
        abortSignal: controller.signal,
      });
    });

    it('should wrap provider failures', async () => {
      provider.embedText.mockRejectedValue(new Error('boom'));

      await expect(service.embed('hello')).rejects.toThrow(
        new EmbeddingUnavailableError('Embedding request failed: boom'),
      );
    });

    it('should reject an empty vector', async () => {
      provider.embedText.mockResolvedValue({ embeddings: [[]] });

      await expect(service.embed('hello')).rejects.toThrow(
        EmbeddingUnavailableError,
      );
    });
  });

  describe('complete', () => {
    it('should send the prompt to the provider', async () => {
      provider.generateText.mockResolvedValue({ content: 'Answer' });

      await expect(service.complete('Prompt')).resolves.toBe('Answer');
      expect(provider.generateText).toHaveBeenCalledWith({
        prompt: 'Prompt',
        abortSignal: undefined,
      });
    });

    it('should wrap provider failures', async () => {
      provider.generateText.mockRejectedValue(new Error('timeout'));

      const error = await service.complete('Prompt').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CompletionUnavailableError);
      expect(error).toMatchObject({
        code: 'COMPLETION_UNAVAILABLE',
        message: 'Completion request failed: timeout',
      });
    });
  });
});
