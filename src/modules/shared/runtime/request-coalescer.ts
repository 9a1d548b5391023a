/**
 * REQUEST COALESCER
 * =================
 *
 * Keeps at most one pending forecast fetch per cache key. Callers that ask
 * for a key while its fetch is pending receive that fetch's promise, and
 * the key is released as soon as the fetch settles, whether it succeeded
 * or failed.
 */

export class RequestCoalescer<T> {
  private readonly pending = new Map<string, Promise<T>>();

  /**
   * Pending promise for `key`, or a fresh one from `fn`
   */
  run(key: string, fn: () => Promise<T>): Promise<T> {
    const shared = this.pending.get(key);
    if (shared) return shared;

    // fn starts on the next microtask, after the key is registered
    const started = Promise.resolve()
      .then(fn)
      .finally(() => this.pending.delete(key));
    this.pending.set(key, started);
    return started;
  }

  isInFlight(key: string): boolean {
    return this.pending.has(key);
  }

  /** Keys currently pending */
  size(): number {
    return this.pending.size;
  }
}
