/**
 * Serializes async critical sections: each task starts after the previous
 * one settles, whether it resolved or rejected.
 */
export class WriteLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
