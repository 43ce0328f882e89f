// ═══════════════════════════════════════════════════════════════════════════════
// SINGLE FLIGHT — Share One In-Flight Call per Key
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Concurrent `run` calls with the same key share the first caller's promise.
 * The key is released once that promise settles, so a later call starts fresh.
 */
export class SingleFlight<T> {
  private readonly inFlight = new Map<string, Promise<T>>();

  run(key: string, fn: () => Promise<T>): Promise<T> {
    const existing = this.inFlight.get(key);
    if (existing) return existing;

    const promise = fn().finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, promise);
    return promise;
  }

  get size(): number {
    return this.inFlight.size;
  }
}
