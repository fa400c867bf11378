import { AppError } from '../common/app.error.js';

/**
 * Vectors of different lengths cannot be compared. Seeing this at retrieval
 * time means the embedding model changed after documents were indexed.
 */
export class DimensionMismatchError extends AppError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(
      'DIMENSION_MISMATCH',
      `Embedding dimension mismatch: expected ${expected}, received ${actual}`,
    );
  }
}
