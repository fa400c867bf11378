import { Logger } from '@nestjs/common';
import { embedMany, generateText as aiGenerateText } from 'ai';
import type {
  EmbedTextOptions,
  EmbedTextResult,
  GenerateTextOptions,
  GenerateTextResult,
} from '../ai.types.js';
import type { AiProvider } from './ai-provider.js';

const COMPLETION_TEMPERATURE = 0.3;

export type GenerateTextParams = Parameters<typeof aiGenerateText>[0];
export type EmbedManyParams = Parameters<typeof embedMany>[0];

/**
 * Shared AI SDK plumbing. Subclasses only supply the chat and embedding
 * models.
 */
export abstract class AiSdkProvider implements AiProvider {
  abstract readonly name: string;

  protected abstract readonly logger: Logger;

  protected abstract getChatModel(): GenerateTextParams['model'];

  protected abstract getEmbeddingModel(): EmbedManyParams['model'];

  async generateText(
    options: GenerateTextOptions,
  ): Promise<GenerateTextResult> {
    try {
      const result = await aiGenerateText({
        model: this.getChatModel(),
        prompt: options.prompt,
        temperature: COMPLETION_TEMPERATURE,
        abortSignal: options.abortSignal,
      });

      return { content: result.text };
    } catch (error) {
      this.logger.error(
        `${this.name} text generation failed`,
        error instanceof Error ? error.stack : error,
      );
      throw error;
    }
  }

  async embedText(options: EmbedTextOptions): Promise<EmbedTextResult> {
    try {
      const result = await embedMany({
        model: this.getEmbeddingModel(),
        values: options.inputs,
        abortSignal: options.abortSignal,
      });

      return {
        embeddings: result.embeddings.map((embedding) => Array.from(embedding)),
      };
    } catch (error) {
      this.logger.error(
        `${this.name} embedding failed`,
        error instanceof Error ? error.stack : error,
      );
      throw error;
    }
  }
}
