/**
 * Promise-chain mutex. Callers run strictly one after another in call order;
 * a rejected section releases the lock like a resolved one.
 *
 * Not re-entrant: calling runExclusive from inside a held section deadlocks.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(() => fn());
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
