import { Inject, Injectable } from '@nestjs/common';
import { AI_PROVIDER_TOKEN } from './ai.constants.js';
import {
  CompletionUnavailableError,
  EmbeddingUnavailableError,
} from './ai.errors.js';
import type { AiProvider } from './providers/ai-provider.js';
import type {
  CompletionCapability,
  EmbeddingCapability,
  EmbedTextResult,
} from './ai.types.js';
import { describeError } from '../common/app.error.js';

@Injectable()
export class AIService implements EmbeddingCapability, CompletionCapability {
  constructor(
    @Inject(AI_PROVIDER_TOKEN) private readonly provider: AiProvider,
  ) {}

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    let result: EmbedTextResult;
    try {
      result = await this.provider.embedText({
        inputs: [text],
        abortSignal: signal,
      });
    } catch (error) {
      throw new EmbeddingUnavailableError(
        `Embedding request failed: ${describeError(error)}`,
        { cause: error },
      );
    }

    const [embedding] = result.embeddings;
    if (!embedding || embedding.length === 0) {
      throw new EmbeddingUnavailableError(
        'Embedding provider returned an empty vector',
      );
    }
    return embedding;
  }

  async complete(prompt: string, signal?: AbortSignal): Promise<string> {
    try {
      const result = await this.provider.generateText({
        prompt,
        abortSignal: signal,
      });
      return result.content;
    } catch (error) {
      throw new CompletionUnavailableError(
        `Completion request failed: ${describeError(error)}`,
        { cause: error },
      );
    }
  }
}
