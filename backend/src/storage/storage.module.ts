import { Logger, Module } from '@nestjs/common';
import { DatabaseModule, DatabaseService } from '../database/index.js';
import { InMemoryKeyValueStore } from './in-memory-key-value.store.js';
import { KEY_VALUE_STORE_TOKEN } from './key-value-store.js';
import type { KeyValueStore } from './key-value-store.js';
import { PostgresKeyValueStore } from './postgres-key-value.store.js';

@Module({
  imports: [DatabaseModule],
  providers: [
    {
      provide: KEY_VALUE_STORE_TOKEN,
      useFactory: (database: DatabaseService): KeyValueStore => {
        if (database.isConfigured()) {
          return new PostgresKeyValueStore(database);
        }
        new Logger('StorageModule').warn(
          'DATABASE_URL is not configured, knowledge base and sessions are kept in memory only',
        );
        return new InMemoryKeyValueStore();
      },
      inject: [DatabaseService],
    },
  ],
  exports: [KEY_VALUE_STORE_TOKEN],
})
export class StorageModule {}
