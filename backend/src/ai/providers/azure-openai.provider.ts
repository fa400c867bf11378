import { Logger } from '@nestjs/common';
import { createAzure } from '@ai-sdk/azure';
import type { AiConfig } from '../../config/index.js';
import {
  AiSdkProvider,
  type EmbedManyParams,
  type GenerateTextParams,
} from './ai-sdk.provider.js';

/** Azure OpenAI addresses models by deployment name. */
export class AzureOpenAiProvider extends AiSdkProvider {
  public readonly name = 'azure';

  protected readonly logger = new Logger(AzureOpenAiProvider.name);
  private readonly client: ReturnType<typeof createAzure>;

  constructor(private readonly config: AiConfig['azure']) {
    super();
    this.client = this.createClient();
    this.logger.log(
      `Azure OpenAI provider initialized for resource ${config.resourceName ?? '(unset)'}`,
    );
  }

  protected getChatModel(): GenerateTextParams['model'] {
    return this.client(
      this.requireDeployment(this.config.chatDeployment, 'chat'),
    );
  }

  protected getEmbeddingModel(): EmbedManyParams['model'] {
    return this.client.embedding(
      this.requireDeployment(
        this.config.embeddingDeployment,
        'embedding',
      ),
    );
  }

  private requireDeployment(
    deployment: string | undefined,
    kind: 'chat' | 'embedding',
  ): string {
    if (!deployment) {
      throw new Error(`Azure OpenAI ${kind} deployment is not configured`);
    }
    return deployment;
  }

  private createClient() {
    if (!this.config.apiKey || !this.config.resourceName) {
      throw new Error('Azure OpenAI resource name and API key are required');
    }

    return createAzure({
      resourceName: this.config.resourceName,
      apiKey: this.config.apiKey,
    });
  }
}
