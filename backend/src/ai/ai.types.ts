export interface GenerateTextOptions {
  prompt: string;
  abortSignal?: AbortSignal;
}

export interface GenerateTextResult {
  content: string;
}

export interface EmbedTextOptions {
  inputs: string[];
  abortSignal?: AbortSignal;
}

export interface EmbedTextResult {
  embeddings: number[][];
}

/**
 * The two model capabilities the rest of the service depends on.
 * Provider selection happens once in {@link AiModule}.
 */
export interface EmbeddingCapability {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

export interface CompletionCapability {
  complete(prompt: string, signal?: AbortSignal): Promise<string>;
}
