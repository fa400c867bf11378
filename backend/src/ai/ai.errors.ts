import { AppError } from '../common/app.error.js';

export class EmbeddingUnavailableError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EMBEDDING_UNAVAILABLE', message, options);
  }
}

export class CompletionUnavailableError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('COMPLETION_UNAVAILABLE', message, options);
  }
}
