import { Module } from '@nestjs/common';
import { AppConfigModule } from './config/index.js';
import { AiModule } from './ai/index.js';
import { KnowledgeModule } from './knowledge/index.js';
import { RfpModule } from './rfp/index.js';

@Module({
  imports: [AppConfigModule, AiModule, KnowledgeModule, RfpModule],
})
export class AppModule {}
