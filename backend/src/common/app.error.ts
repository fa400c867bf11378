export class AppError extends Error {
  public readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : options);
    this.code = code;
    this.name = new.target.name;
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
