import { currentAnswer } from './rfp-prompts.js';
import { IncompleteResponseError } from './rfp.errors.js';
import {
  confidenceLevel,
  type AnsweredQuestion,
  type ResponseDocument,
} from './rfp.types.js';

export const DEFAULT_RESPONSE_TITLE = 'RFP Response';

export interface AssembleOptions {
  title?: string;
  generatedAt?: Date;
}

/**
 * Builds the exportable response from reviewed questions. Questions must be
 * numbered 1..n without gaps and every one of them must be finished.
 */
export function assembleResponseDocument(
  questions: readonly AnsweredQuestion[],
  summary: string,
  options: AssembleOptions = {},
): ResponseDocument {
  const ordered = [...questions].sort((a, b) => a.index - b.index);

  ordered.forEach((question, position) => {
    const expected = position + 1;
    if (question.index !== expected) {
      throw new IncompleteResponseError(
        question.index < expected
          ? `Question ${question.index} appears more than once`
          : `Question ${expected} is missing`,
      );
    }
    if (question.status === 'pending' || question.status === 'in-progress') {
      throw new IncompleteResponseError(
        `Question ${question.index} has not been processed (status: ${question.status})`,
      );
    }
  });

  return {
    title: options.title ?? DEFAULT_RESPONSE_TITLE,
    generatedAt: options.generatedAt ?? new Date(),
    summary,
    questions: ordered.map((question) => ({
      index: question.index,
      questionText: question.questionText,
      answer: currentAnswer(question),
      status: question.status,
      confidenceScore: question.confidenceScore,
      confidenceLevel: confidenceLevel(question.confidenceScore),
    })),
  };
}
