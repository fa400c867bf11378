import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'node:crypto';
import { AIService } from '../ai/index.js';
import {
  ProgressReporter,
  describeError,
  type ProgressSink,
} from '../common/index.js';
import type { AppConfig, RfpConfig } from '../config/index.js';
import { DimensionMismatchError } from '../knowledge/knowledge.errors.js';
import type { Embedding, RetrievedMatch } from '../knowledge/knowledge.types.js';
import {
  DEFAULT_TOP_K,
  RetrieverService,
} from '../knowledge/retriever.service.js';
import { meanScore } from '../knowledge/similarity.js';
import { QuestionDetector } from './question-detector.js';
import {
  buildAnswerPrompt,
  buildSummaryPrompt,
  failureNotice,
  fallbackSummary,
} from './rfp-prompts.js';
import type { AnsweredQuestion, RfpProcessingResult } from './rfp.types.js';

/** Upload, Extract, Detect, Embed, Retrieve, Answer, Summarize */
export const RFP_TOTAL_STEPS = 7;

export const NO_QUESTIONS_MESSAGE = 'No questions detected in the document.';

export interface ProcessRfpOptions {
  fileName: string;
  text: string;
  topK?: number;
  signal?: AbortSignal;
  onProgress?: ProgressSink;
  /**
   * Called when a question starts (`in-progress`) and again when it reaches
   * a terminal state.
   */
  onQuestion?: (question: AnsweredQuestion) => void;
}

interface AnswerContext {
  topK: number;
  total: number;
  progress: ProgressReporter;
  signal?: AbortSignal;
}

export function createPendingQuestion(
  questionText: string,
  index: number,
): AnsweredQuestion {
  return {
    id: randomUUID(),
    index,
    questionText,
    embedding: [],
    generatedAnswer: '',
    editedAnswer: '',
    relevantContext: [],
    confidenceScore: 0,
    status: 'pending',
  };
}

/**
 * Runs the retrieval-augmented answering pipeline over an RFP. Questions are
 * answered one at a time; a failure on one question is recorded on it and
 * the rest carry on.
 */
@Injectable()
export class AnswerOrchestratorService {
  private readonly logger = new Logger(AnswerOrchestratorService.name);

  constructor(
    private readonly aiService: AIService,
    private readonly retriever: RetrieverService,
    private readonly detector: QuestionDetector,
    private readonly configService: ConfigService<AppConfig>,
  ) {}

  async processRfp(options: ProcessRfpOptions): Promise<RfpProcessingResult> {
    const progress = new ProgressReporter(
      options.onProgress,
      RFP_TOTAL_STEPS,
      this.logger,
    );

    progress.report('Detecting Questions', 2, 'Analyzing document for questions...');
    const detected = this.detector.detect(options.text);
    if (detected.length === 0) {
      this.logger.log(`No questions found in ${options.fileName}`);
      progress.complete(NO_QUESTIONS_MESSAGE);
      return { questions: [], summary: '', cancelled: false };
    }
    this.logger.log(`Detected ${detected.length} questions in ${options.fileName}`);

    const pending = detected.map((text, i) => createPendingQuestion(text, i + 1));
    const { questions, cancelled } = await this.answerQuestions(pending, {
      topK: options.topK,
      signal: options.signal,
      progress,
      onQuestion: options.onQuestion,
    });

    if (cancelled) {
      this.logger.warn(
        `Processing of ${options.fileName} cancelled after ${questions.length} of ${pending.length} questions`,
      );
      progress.report(
        'Cancelled',
        5,
        `Stopped after ${questions.length} of ${pending.length} questions.`,
        'failed',
      );
      return { questions, summary: '', cancelled: true };
    }

    progress.report('Generating Summary', 6, 'Creating executive summary...');
    const summary = await this.generateSummary(questions, options.signal);

    const failed = questions.filter((q) => q.status === 'failed').length;
    progress.complete(
      failed > 0
        ? `Processed ${questions.length} questions (${failed} failed).`
        : `Successfully processed ${questions.length} questions.`,
    );
    return { questions, summary, cancelled: false };
  }

  /**
   * Answers questions in order, stopping before the next question once the
   * signal is aborted.
   */
  async answerQuestions(
    questions: readonly AnsweredQuestion[],
    options: {
      topK?: number;
      signal?: AbortSignal;
      progress?: ProgressReporter;
      onQuestion?: (question: AnsweredQuestion) => void;
    } = {},
  ): Promise<{ questions: AnsweredQuestion[]; cancelled: boolean }> {
    const context: AnswerContext = {
      topK: this.resolveTopK(options.topK),
      total: questions.length,
      progress:
        options.progress ??
        new ProgressReporter(undefined, RFP_TOTAL_STEPS, this.logger),
      signal: options.signal,
    };

    const answered: AnsweredQuestion[] = [];
    for (const question of questions) {
      if (options.signal?.aborted) {
        return { questions: answered, cancelled: true };
      }

      const result = await this.answerQuestion(question, context, (started) =>
        this.notify(options.onQuestion, started),
      );
      answered.push(result);
      this.notify(options.onQuestion, result);
    }
    return { questions: answered, cancelled: false };
  }

  regenerateAnswer(
    question: AnsweredQuestion,
    topK?: number,
    signal?: AbortSignal,
  ): Promise<AnsweredQuestion> {
    return this.answerQuestion(question, {
      topK: this.resolveTopK(topK),
      total: 1,
      progress: new ProgressReporter(undefined, RFP_TOTAL_STEPS, this.logger),
      signal,
    });
  }

  /** Never throws: a failed or empty completion yields the fallback text. */
  async generateSummary(
    questions: readonly AnsweredQuestion[],
    signal?: AbortSignal,
  ): Promise<string> {
    try {
      const summary = await this.aiService.complete(
        buildSummaryPrompt(questions),
        signal,
      );
      if (summary.trim().length > 0) {
        return summary;
      }
      this.logger.warn('Executive summary completion was empty, using fallback');
    } catch (error) {
      this.logger.warn(
        `Executive summary generation failed, using fallback: ${describeError(error)}`,
      );
    }
    return fallbackSummary(questions.length);
  }

  private async answerQuestion(
    pending: AnsweredQuestion,
    context: AnswerContext,
    onStart?: (question: AnsweredQuestion) => void,
  ): Promise<AnsweredQuestion> {
    const question: AnsweredQuestion = { ...pending, status: 'in-progress' };
    onStart?.(question);

    const label = `question ${question.index} of ${context.total}`;
    let embedding: Embedding = question.embedding;
    let matches: RetrievedMatch[] = [];
    let confidenceScore = 0;

    try {
      context.progress.report(
        'Generating Embeddings',
        3,
        `Creating embedding for ${label}...`,
      );
      embedding = await this.aiService.embed(question.questionText, context.signal);

      context.progress.report(
        'Retrieving Context',
        4,
        `Finding relevant context for ${label}...`,
      );
      matches = await this.retriever.retrieve(embedding, context.topK);
      confidenceScore = meanScore(matches.map((match) => match.similarityScore));

      context.progress.report(
        'Generating Answers',
        5,
        `Generating answer for ${label}...`,
      );
      const answer = await this.aiService.complete(
        buildAnswerPrompt(question.questionText, matches),
        context.signal,
      );

      return {
        ...question,
        embedding,
        relevantContext: matches,
        confidenceScore,
        generatedAnswer: answer,
        editedAnswer: answer,
        status: 'completed',
      };
    } catch (error) {
      // a model change affects every question, so stop the run
      if (error instanceof DimensionMismatchError) {
        throw error;
      }

      this.logger.warn(
        `Failed to answer question ${question.index}: ${describeError(error)}`,
      );
      const notice = failureNotice(describeError(error));
      return {
        ...question,
        embedding,
        relevantContext: matches,
        confidenceScore,
        generatedAnswer: notice,
        editedAnswer: notice,
        status: 'failed',
      };
    }
  }

  private notify(
    listener: ((question: AnsweredQuestion) => void) | undefined,
    question: AnsweredQuestion,
  ): void {
    if (!listener) {
      return;
    }
    try {
      listener(question);
    } catch (error) {
      this.logger.warn(
        `Question listener failed for question ${question.index}: ${describeError(error)}`,
      );
    }
  }

  private resolveTopK(topK: number | undefined): number {
    return (
      topK ?? this.configService.get<RfpConfig>('rfp')?.topK ?? DEFAULT_TOP_K
    );
  }
}
