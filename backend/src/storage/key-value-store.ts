/**
 * Byte-oriented persistence boundary. Callers own the encoding; stores only
 * promise that what was `set` comes back unchanged from `get`.
 */
export interface KeyValueStore {
  get(key: string): Promise<Buffer | undefined>;
  set(key: string, value: Buffer): Promise<void>;
  delete(key: string): Promise<void>;
}

export const KEY_VALUE_STORE_TOKEN = Symbol('KEY_VALUE_STORE');
