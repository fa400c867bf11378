import { describe, expect, it } from '@jest/globals';
import { WriteLock } from './write-lock.js';

describe('WriteLock', () => {
  it('should run tasks one after another in submission order', async () => {
    const lock = new WriteLock();
    const order: string[] = [];
    const task = (name: string, delayMs: number) => () =>
      new Promise<string>((resolve) => {
        order.push(`start ${name}`);
        setTimeout(() => {
          order.push(`end ${name}`);
          resolve(name);
        }, delayMs);
      });

    const results = await Promise.all([
      lock.run(task('a', 20)),
      lock.run(task('b', 0)),
    ]);

    expect(results).toEqual(['a', 'b']);
    expect(order).toEqual(['start a', 'end a', 'start b', 'end b']);
  });

  it('should keep going after a task rejects', async () => {
    const lock = new WriteLock();

    const failed = lock.run(() => Promise.reject(new Error('disk full')));
    const next = lock.run(() => Promise.resolve('ok'));

    await expect(failed).rejects.toThrow('disk full');
    await expect(next).resolves.toBe('ok');
  });
});
