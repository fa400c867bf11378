import { beforeEach, describe, expect, it } from '@jest/globals';
import { Test, TestingModule } from '@nestjs/testing';
import { DatabaseService } from '../database/index.js';
import { PostgresKeyValueStore } from './postgres-key-value.store.js';

/** Answers the handful of statements the store issues from a Map. */
class FakePool {
  readonly statements: string[] = [];
  private readonly table = new Map<string, Buffer>();

  query(sql: string, params: unknown[] = []) {
    const statement = sql.trim().split(/\s+/)[0].toUpperCase();
    this.statements.push(statement);
    const [key, value] = params;

    if (statement === 'SELECT' && typeof key === 'string') {
      const stored = this.table.get(key);
      return Promise.resolve({ rows: stored ? [{ key, value: stored }] : [] });
    }
    if (statement === 'INSERT' && typeof key === 'string' && Buffer.isBuffer(value)) {
      this.table.set(key, value);
    }
    if (statement === 'DELETE' && typeof key === 'string') {
      this.table.delete(key);
    }
    return Promise.resolve({ rows: [] });
  }
}

describe('PostgresKeyValueStore', () => {
  let store: PostgresKeyValueStore;
  let pool: FakePool;

  beforeEach(async () => {
    pool = new FakePool();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PostgresKeyValueStore,
        { provide: DatabaseService, useValue: { getPool: () => pool } },
      ],
    }).compile();

    store = module.get<PostgresKeyValueStore>(PostgresKeyValueStore);
  });

  it('should return undefined for a missing key', async () => {
    await expect(store.get('knowledgebase')).resolves.toBeUndefined();
  });

  it('should store, overwrite and delete values', async () => {
    await store.set('rfp_state', Buffer.from('first', 'utf8'));
    await store.set('rfp_state', Buffer.from('second', 'utf8'));

    const stored = await store.get('rfp_state');
    expect(stored?.toString('utf8')).toBe('second');

    await store.delete('rfp_state');
    await expect(store.get('rfp_state')).resolves.toBeUndefined();
  });

  it('should create the table once before the first statement', async () => {
    await store.get('a');
    await store.get('b');

    expect(pool.statements).toEqual(['CREATE', 'SELECT', 'SELECT']);
  });
});
