import { Logger } from '@nestjs/common';
import { createOpenAI } from '@ai-sdk/openai';
import type { AiConfig } from '../../config/index.js';
import {
  AiSdkProvider,
  type EmbedManyParams,
  type GenerateTextParams,
} from './ai-sdk.provider.js';

export class OpenAiProvider extends AiSdkProvider {
  public readonly name = 'openai';

  protected readonly logger = new Logger(OpenAiProvider.name);
  private readonly client: ReturnType<typeof createOpenAI>;

  constructor(private readonly config: AiConfig['openai']) {
    super();
    this.client = this.createClient();
    this.logger.log(
      `OpenAI provider initialized with chat model: ${this.resolveChatModel()}, embedding model: ${this.resolveEmbeddingModel()}`,
    );
  }

  protected getChatModel(): GenerateTextParams['model'] {
    return this.client(this.resolveChatModel());
  }

  protected getEmbeddingModel(): EmbedManyParams['model'] {
    return this.client.embedding(this.resolveEmbeddingModel());
  }

  private resolveChatModel() {
    return this.config.chatModel || 'gpt-4o-mini';
  }

  private resolveEmbeddingModel() {
    return this.config.embeddingModel || 'text-embedding-3-small';
  }

  private createClient() {
    if (!this.config.apiKey) {
      throw new Error('OpenAI API key is not configured');
    }

    return createOpenAI({
      apiKey: this.config.apiKey,
    });
  }
}
