import type { KeyValueStore } from './key-value-store.js';

export class InMemoryKeyValueStore implements KeyValueStore {
  private readonly values = new Map<string, Buffer>();

  get(key: string): Promise<Buffer | undefined> {
    const value = this.values.get(key);
    return Promise.resolve(value ? Buffer.from(value) : undefined);
  }

  set(key: string, value: Buffer): Promise<void> {
    this.values.set(key, Buffer.from(value));
    return Promise.resolve();
  }

  delete(key: string): Promise<void> {
    this.values.delete(key);
    return Promise.resolve();
  }
}
