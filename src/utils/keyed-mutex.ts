// Per-key mutual exclusion for read-modify-write sequences.
// Callers on the same key run one after another in arrival order; callers on
// different keys never wait for each other.

import { createDeferred } from "./deferred.js";

export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const gate = createDeferred<void>();
    const tail = previous.then(() => gate.promise);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      gate.resolve();
      // Last holder in the queue cleans up so idle keys don't accumulate.
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  get size(): number {
    return this.tails.size;
  }
}
