/**
 * FIFO critical section: each operation starts only after the previous one has settled,
 * whether it resolved or rejected.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(operation: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(() => operation());
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
