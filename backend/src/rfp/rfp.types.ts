import type { ProcessingProgress, ProcessingStatus } from '../common/index.js';
import type { Embedding, RetrievedMatch } from '../knowledge/index.js';

export interface AnsweredQuestion {
  id: string;
  /** 1-based position in detection order. */
  index: number;
  questionText: string;
  embedding: Embedding;
  generatedAnswer: string;
  /** Reviewer's version of the answer; starts out equal to the generated one. */
  editedAnswer: string;
  relevantContext: RetrievedMatch[];
  confidenceScore: number;
  status: ProcessingStatus;
}

export type ConfidenceLevel = 'high' | 'medium' | 'low';

export const HIGH_CONFIDENCE_THRESHOLD = 0.8;
export const LOW_CONFIDENCE_THRESHOLD = 0.5;

export function confidenceLevel(score: number): ConfidenceLevel {
  if (score >= HIGH_CONFIDENCE_THRESHOLD) {
    return 'high';
  }
  if (score >= LOW_CONFIDENCE_THRESHOLD) {
    return 'medium';
  }
  return 'low';
}

export interface RfpProcessingResult {
  questions: AnsweredQuestion[];
  summary: string;
  /** Set when the caller aborted before every question was answered. */
  cancelled: boolean;
}

export interface RfpSession {
  projectName: string;
  fileName: string;
  questions: AnsweredQuestion[];
  summary: string;
  processedAt: Date;
}

export interface ResponseQuestion {
  index: number;
  questionText: string;
  answer: string;
  status: ProcessingStatus;
  confidenceScore: number;
  confidenceLevel: ConfidenceLevel;
}

export interface ResponseDocument {
  title: string;
  generatedAt: Date;
  summary: string;
  questions: ResponseQuestion[];
}

export interface QuestionView {
  index: number;
  questionText: string;
  generatedAnswer: string;
  editedAnswer: string;
  status: ProcessingStatus;
  confidenceScore: number;
  confidenceLevel: ConfidenceLevel;
  sources: { chunkId: string; sourceFileName: string; similarityScore: number }[];
}

export type RfpSseEvent =
  | { type: 'status'; data: ProcessingProgress }
  | { type: 'question'; data: QuestionView }
  | { type: 'summary'; data: string }
  | {
      type: 'done';
      data: { questionCount: number; lowConfidenceCount: number; cancelled: boolean };
    }
  | { type: 'error'; data: { code: string; message: string; requestId: string } };

export function toQuestionView(question: AnsweredQuestion): QuestionView {
  return {
    index: question.index,
    questionText: question.questionText,
    generatedAnswer: question.generatedAnswer,
    editedAnswer: question.editedAnswer,
    status: question.status,
    confidenceScore: question.confidenceScore,
    confidenceLevel: confidenceLevel(question.confidenceScore),
    sources: question.relevantContext.map((match) => ({
      chunkId: match.chunkId,
      sourceFileName: match.sourceFileName,
      similarityScore: match.similarityScore,
    })),
  };
}

export function countLowConfidence(questions: readonly AnsweredQuestion[]): number {
  return questions.filter(
    (question) => question.confidenceScore < LOW_CONFIDENCE_THRESHOLD,
  ).length;
}
