import { Module } from '@nestjs/common';
import { DocumentTextExtractor } from './document-text-extractor.js';
import { TEXT_EXTRACTOR_TOKEN } from './text-extractor.js';

@Module({
  providers: [
    {
      provide: TEXT_EXTRACTOR_TOKEN,
      useClass: DocumentTextExtractor,
    },
  ],
  exports: [TEXT_EXTRACTOR_TOKEN],
})
export class DocumentsModule {}
