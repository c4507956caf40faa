/**
 * Per-session serialization of turns.
 */

/**
 * Runs work for the same session one at a time, in arrival order.
 * Different sessions do not wait on each other.
 */
export class SessionLock {
  private tails: Map<string, Promise<void>> = new Map();

  async runExclusive<T>(sessionId: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(sessionId) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(sessionId, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.tails.get(sessionId) === tail) {
        this.tails.delete(sessionId);
      }
    }
  }

  isLocked(sessionId: string): boolean {
    return this.tails.has(sessionId);
  }
}
