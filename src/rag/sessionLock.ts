/**
 * Single-writer queue per session.
 *
 * Tasks for the same session run one after another in submission order;
 * tasks for different sessions do not wait on each other. A failing task
 * does not block the ones queued behind it.
 */
export class SessionLock {
  private tails = new Map<string, Promise<void>>();

  run<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(sessionId) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(sessionId, tail);

    void tail.then(() => {
      // Drop the entry once nothing else is queued behind this task
      if (this.tails.get(sessionId) === tail) {
        this.tails.delete(sessionId);
      }
    });

    return result;
  }

  isLocked(sessionId: string): boolean {
    return this.tails.has(sessionId);
  }

  get activeSessions(): number {
    return this.tails.size;
  }
}
