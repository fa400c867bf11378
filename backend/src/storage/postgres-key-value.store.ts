import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../database/index.js';
import type { KeyValueStore } from './key-value-store.js';

interface KeyValueRow {
  key: string;
  value: Buffer;
  updated_at: string;
}

@Injectable()
export class PostgresKeyValueStore implements KeyValueStore {
  private schemaReady: Promise<void> | null = null;

  constructor(private readonly database: DatabaseService) {}

  async get(key: string): Promise<Buffer | undefined> {
    await this.ensureSchema();
    const { rows } = await this.database
      .getPool()
      .query<KeyValueRow>('SELECT * FROM kv_store WHERE key = $1', [key]);

    return rows[0]?.value;
  }

  async set(key: string, value: Buffer): Promise<void> {
    await this.ensureSchema();
    await this.database.getPool().query(
      `INSERT INTO kv_store (key, value, updated_at)
      VALUES ($1, $2, NOW())
      ON CONFLICT (key) DO UPDATE
      SET
        value = EXCLUDED.value,
        updated_at = NOW()`,
      [key, value],
    );
  }

  async delete(key: string): Promise<void> {
    await this.ensureSchema();
    await this.database
      .getPool()
      .query('DELETE FROM kv_store WHERE key = $1', [key]);
  }

  private ensureSchema(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = this.database
        .getPool()
        .query(
          `CREATE TABLE IF NOT EXISTS kv_store (
            key TEXT PRIMARY KEY,
            value BYTEA NOT NULL,
            updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
          )`,
        )
        .then(() => undefined)
        .catch((error: unknown) => {
          this.schemaReady = null;
          throw error;
        });
    }
    return this.schemaReady;
  }
}
