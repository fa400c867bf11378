import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  Post,
} from '@nestjs/common';
import { toDocumentUpload } from '../documents/index.js';
import { KnowledgeService, toSummary } from './knowledge.service.js';
import {
  ingestDocumentSchema,
  searchKnowledgeSchema,
} from './dto/ingest-document.dto.js';

@Controller('api/v1/knowledge')
export class KnowledgeController {
  constructor(private readonly knowledgeService: KnowledgeService) {}

  @Get('entries')
  async listEntries() {
    const entries = await this.knowledgeService.listEntries();
    return {
      data: entries,
      requiresReembedding: this.knowledgeService.requiresReembedding,
    };
  }

  @Get('entries/:id')
  async getEntry(@Param('id') id: string) {
    const entry = await this.knowledgeService.getEntry(id);
    if (!entry) {
      throw new NotFoundException(`Knowledge entry ${id} not found`);
    }

    return {
      ...toSummary(entry),
      originalText: entry.originalText,
      chunks: entry.chunks.map((chunk) => ({
        id: chunk.id,
        index: chunk.index,
        text: chunk.text,
        startPosition: chunk.startPosition,
        endPosition: chunk.endPosition,
      })),
    };
  }

  @Post('entries')
  @HttpCode(HttpStatus.CREATED)
  async ingestDocument(@Body() body: unknown) {
    const payload = ingestDocumentSchema.parse(body);
    const entry = await this.knowledgeService.ingestDocument(
      toDocumentUpload(payload),
    );
    return toSummary(entry);
  }

  @Delete('entries/:id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async deleteEntry(@Param('id') id: string): Promise<void> {
    await this.knowledgeService.deleteEntry(id);
  }

  @Post('search')
  @HttpCode(HttpStatus.OK)
  async search(@Body() body: unknown) {
    const payload = searchKnowledgeSchema.parse(body);
    const matches = await this.knowledgeService.search(
      payload.query,
      payload.topK,
    );
    return { data: matches };
  }
}
