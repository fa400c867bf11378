import { Injectable, Logger } from '@nestjs/common';
import * as mammoth from 'mammoth';
import pdfParse from 'pdf-parse';
import type { DocumentKind, TextExtractor } from './text-extractor.js';

@Injectable()
export class DocumentTextExtractor implements TextExtractor {
  private readonly logger = new Logger(DocumentTextExtractor.name);

  async extract(content: Buffer, kind: DocumentKind): Promise<string> {
    switch (kind) {
      case 'pdf': {
        const parsed = await pdfParse(content);
        this.logger.debug(`Extracted ${parsed.numpages} PDF pages`);
        return parsed.text;
      }
      case 'docx': {
        const result = await mammoth.extractRawText({ buffer: content });
        for (const message of result.messages) {
          this.logger.warn(`DOCX extraction: ${message.message}`);
        }
        return result.value;
      }
      case 'text':
        return content.toString('utf8');
    }
  }
}
