import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  NotFoundException,
  Param,
  Patch,
  Post,
  Res,
} from '@nestjs/common';
import type { Response } from 'express';
import { randomUUID } from 'node:crypto';
import { ZodError } from 'zod';
import {
  AppError,
  describeError,
  formatZodError,
  statusForAppError,
} from '../common/index.js';
import { toDocumentUpload, type DocumentUpload } from '../documents/index.js';
import {
  detectQuestionsSchema,
  processRfpSchema,
  questionIndexSchema,
  regenerateAnswerSchema,
  updateAnswerSchema,
  type ProcessRfpDto,
} from './dto/rfp-request.dto.js';
import { RfpService } from './rfp.service.js';
import { RfpSessionService } from './rfp-session.service.js';
import {
  countLowConfidence,
  toQuestionView,
  type RfpSession,
  type RfpSseEvent,
} from './rfp.types.js';

const SSE_HEADERS: Record<string, string> = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache, no-transform',
  Connection: 'keep-alive',
};

function toSessionView(session: RfpSession) {
  return {
    projectName: session.projectName,
    fileName: session.fileName,
    processedAt: session.processedAt,
    summary: session.summary,
    lowConfidenceCount: countLowConfidence(session.questions),
    questions: session.questions.map(toQuestionView),
  };
}

@Controller({
  path: 'api/v1/rfp',
})
export class RfpController {
  private readonly logger = new Logger(RfpController.name);

  constructor(
    private readonly rfpService: RfpService,
    private readonly sessions: RfpSessionService,
  ) {}

  @Post('questions/detect')
  @HttpCode(HttpStatus.OK)
  detectQuestions(@Body() body: unknown) {
    const payload = detectQuestionsSchema.parse(body);
    return { data: this.rfpService.detectQuestions(payload.text) };
  }

  /**
   * Streams progress as server-sent events. Closing the connection stops
   * the run before the next question.
   */
  @Post('process')
  async process(@Body() body: unknown, @Res() res: Response): Promise<void> {
    const requestId = randomUUID();

    let payload: ProcessRfpDto;
    let upload: DocumentUpload;
    try {
      payload = processRfpSchema.parse(body);
      upload = toDocumentUpload(payload);
    } catch (error) {
      const rejection = this.describeRejection(error);
      this.logger.warn(`RFP request ${requestId} rejected: ${rejection.message}`);
      res.status(rejection.status).json({ ...rejection.body, requestId });
      return;
    }

    this.logger.log(`RFP request ${requestId} started for ${upload.fileName}`);
    res.writeHead(200, SSE_HEADERS);
    res.flushHeaders?.();

    const abortController = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) {
        this.logger.warn(`RFP request ${requestId} closed by client`);
        abortController.abort();
      }
    });

    const writeEvent = (event: RfpSseEvent) => {
      res.write(`data: ${JSON.stringify(event)}\n\n`);
    };

    try {
      const { session, cancelled } = await this.rfpService.process(upload, {
        projectName: payload.projectName,
        topK: payload.topK,
        signal: abortController.signal,
        onProgress: (progress) => writeEvent({ type: 'status', data: progress }),
        onQuestion: (question) =>
          writeEvent({ type: 'question', data: toQuestionView(question) }),
      });

      writeEvent({ type: 'summary', data: session.summary });
      writeEvent({
        type: 'done',
        data: {
          questionCount: session.questions.length,
          lowConfidenceCount: countLowConfidence(session.questions),
          cancelled,
        },
      });
    } catch (error) {
      const code = error instanceof AppError ? error.code : 'RFP_INTERNAL_ERROR';
      this.logger.error(
        `RFP request ${requestId} failed [${code}]: ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      writeEvent({
        type: 'error',
        data: { code, message: describeError(error), requestId },
      });
    } finally {
      res.end();
    }
  }

  @Get('session')
  async getSession() {
    const session = await this.sessions.load();
    if (!session) {
      throw new NotFoundException('No RFP has been processed yet');
    }
    return toSessionView(session);
  }

  @Delete('session')
  @HttpCode(HttpStatus.NO_CONTENT)
  async clearSession(): Promise<void> {
    await this.sessions.clear();
  }

  @Patch('session/questions/:index')
  async updateAnswer(@Param('index') index: string, @Body() body: unknown) {
    const payload = updateAnswerSchema.parse(body);
    const question = await this.sessions.updateAnswer(
      questionIndexSchema.parse(index),
      payload.answer,
    );
    return toQuestionView(question);
  }

  @Post('session/questions/:index/regenerate')
  @HttpCode(HttpStatus.OK)
  async regenerateAnswer(@Param('index') index: string, @Body() body: unknown) {
    const payload = regenerateAnswerSchema.parse(body);
    const question = await this.rfpService.regenerateAnswer(
      questionIndexSchema.parse(index),
      payload.topK,
    );
    return toQuestionView(question);
  }

  @Post('session/summary')
  @HttpCode(HttpStatus.OK)
  async regenerateSummary() {
    return { summary: await this.rfpService.regenerateSummary() };
  }

  @Get('response')
  getResponse() {
    return this.rfpService.buildResponseDocument();
  }

  @Get('response/export')
  async exportResponse(@Res() res: Response): Promise<void> {
    const { fileName, content } = await this.rfpService.exportMarkdown();
    res
      .status(HttpStatus.OK)
      .set({
        'Content-Type': 'text/markdown; charset=utf-8',
        'Content-Disposition': `attachment; filename="${fileName}"`,
      })
      .send(content);
  }

  private describeRejection(error: unknown): {
    status: HttpStatus;
    message: string;
    body: { code: string; message: string };
  } {
    if (error instanceof ZodError) {
      const message = formatZodError(error);
      return {
        status: HttpStatus.BAD_REQUEST,
        message,
        body: { code: 'BAD_REQUEST', message },
      };
    }
    if (error instanceof AppError) {
      return {
        status: statusForAppError(error),
        message: error.message,
        body: { code: error.code, message: error.message },
      };
    }
    const message = describeError(error);
    return {
      status: HttpStatus.BAD_REQUEST,
      message,
      body: { code: 'RFP_BAD_REQUEST', message },
    };
  }
}
