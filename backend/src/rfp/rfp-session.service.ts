import {
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { z } from 'zod';
import { WriteLock, describeError } from '../common/index.js';
import { KEY_VALUE_STORE_TOKEN } from '../storage/index.js';
import type { KeyValueStore } from '../storage/index.js';
import {
  countLowConfidence,
  type AnsweredQuestion,
  type RfpSession,
} from './rfp.types.js';

export const RFP_SESSION_KEY = 'rfp_state';

const answeredQuestionSchema = z.object({
  id: z.string().min(1),
  index: z.number().int().positive(),
  questionText: z.string(),
  embedding: z.array(z.number()),
  generatedAnswer: z.string(),
  editedAnswer: z.string(),
  relevantContext: z.array(
    z.object({
      chunkId: z.string(),
      chunkText: z.string(),
      similarityScore: z.number(),
      sourceFileName: z.string(),
    }),
  ),
  confidenceScore: z.number(),
  status: z.enum(['pending', 'in-progress', 'completed', 'failed']),
});

const rfpSessionSchema = z.object({
  projectName: z.string(),
  fileName: z.string(),
  questions: z.array(answeredQuestionSchema),
  summary: z.string(),
  processedAt: z.coerce.date(),
});

/**
 * Keeps the most recently processed RFP so it can be reviewed, edited and
 * exported across requests.
 */
@Injectable()
export class RfpSessionService {
  private readonly logger = new Logger(RfpSessionService.name);
  private readonly writeLock = new WriteLock();

  constructor(
    @Inject(KEY_VALUE_STORE_TOKEN) private readonly storage: KeyValueStore,
  ) {}

  async load(): Promise<RfpSession | undefined> {
    const stored = await this.storage.get(RFP_SESSION_KEY);
    if (!stored) {
      return undefined;
    }

    try {
      const parsed: unknown = JSON.parse(stored.toString('utf8'));
      return rfpSessionSchema.parse(parsed);
    } catch (error) {
      this.logger.error(
        `Stored RFP session is unreadable, ignoring it: ${describeError(error)}`,
      );
      return undefined;
    }
  }

  save(session: RfpSession): Promise<void> {
    return this.writeLock.run(() => this.write(session));
  }

  clear(): Promise<void> {
    return this.writeLock.run(async () => {
      await this.storage.delete(RFP_SESSION_KEY);
      this.logger.log('RFP session cleared');
    });
  }

  /** Replaces the reviewer's answer; the generated answer is kept. */
  updateAnswer(index: number, answer: string): Promise<AnsweredQuestion> {
    return this.updateQuestion(index, (question) => ({
      ...question,
      editedAnswer: answer,
    }));
  }

  replaceQuestion(question: AnsweredQuestion): Promise<AnsweredQuestion> {
    return this.updateQuestion(question.index, () => question);
  }

  updateSummary(summary: string): Promise<RfpSession> {
    return this.writeLock.run(async () => {
      const session = await this.require();
      const next = { ...session, summary };
      await this.write(next);
      return next;
    });
  }

  async lowConfidenceCount(): Promise<number> {
    const session = await this.load();
    return session ? countLowConfidence(session.questions) : 0;
  }

  async require(): Promise<RfpSession> {
    const session = await this.load();
    if (!session) {
      throw new NotFoundException('No RFP has been processed yet');
    }
    return session;
  }

  private updateQuestion(
    index: number,
    update: (question: AnsweredQuestion) => AnsweredQuestion,
  ): Promise<AnsweredQuestion> {
    return this.writeLock.run(async () => {
      const session = await this.require();
      const existing = session.questions.find((q) => q.index === index);
      if (!existing) {
        throw new NotFoundException(`Question ${index} not found`);
      }

      const updated = update(existing);
      await this.write({
        ...session,
        questions: session.questions.map((q) =>
          q.index === index ? updated : q,
        ),
      });
      return updated;
    });
  }

  private async write(session: RfpSession): Promise<void> {
    await this.storage.set(
      RFP_SESSION_KEY,
      Buffer.from(JSON.stringify(session), 'utf8'),
    );
  }
}
