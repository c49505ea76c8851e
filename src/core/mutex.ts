/**
 * AsyncMutex — Exclusive lock for async operations.
 *
 * Waiters are served in the order acquire() was called. The call itself
 * takes its place in line synchronously, so a caller can reserve a slot
 * before doing any async work and only await it later.
 */
export class AsyncMutex {
  private locked = false;
  private queue: Array<() => void> = [];

  /**
   * Acquire the lock. Returns a release function.
   */
  acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(this.createRelease());
    }

    return new Promise<() => void>((resolve) => {
      this.queue.push(() => {
        resolve(this.createRelease());
      });
    });
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return; // Idempotent
      released = true;

      const next = this.queue.shift();
      if (next) {
        // Hand over in a microtask to avoid deep recursion
        queueMicrotask(next);
      } else {
        this.locked = false;
      }
    };
  }
}
