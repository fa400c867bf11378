import type { Logger } from '@nestjs/common';
import { describeError } from './app.error.js';

export type ProcessingStatus = 'pending' | 'in-progress' | 'completed' | 'failed';

export interface ProcessingProgress {
  step: string;
  currentItem: number;
  totalItems: number;
  percentComplete: number;
  message: string;
  status: ProcessingStatus;
}

export type ProgressSink = (progress: ProcessingProgress) => void;

/**
 * Forwards pipeline checkpoints to a caller-supplied sink. The sink is an
 * observer only: if it throws, the error is logged and the pipeline goes on.
 */
export class ProgressReporter {
  constructor(
    private readonly sink: ProgressSink | undefined,
    private readonly totalItems: number,
    private readonly logger: Logger,
  ) {}

  report(
    step: string,
    currentItem: number,
    message: string,
    status: ProcessingStatus = 'in-progress',
  ): void {
    if (!this.sink) {
      return;
    }

    const progress: ProcessingProgress = {
      step,
      currentItem,
      totalItems: this.totalItems,
      percentComplete:
        this.totalItems > 0
          ? Math.round((currentItem / this.totalItems) * 1000) / 10
          : 0,
      message,
      status,
    };

    try {
      this.sink(progress);
    } catch (error) {
      this.logger.warn(`Progress sink failed at ${step}: ${describeError(error)}`);
    }
  }

  complete(message: string): void {
    this.report('Complete', this.totalItems, message, 'completed');
  }
}
