/**
 * Collapses concurrent calls for the same key into one execution.
 *
 * The first caller for a key starts `work`; every caller that arrives while it
 * is pending receives the same promise. The key is released once the promise
 * settles, so the next call after completion runs `work` again. Different keys
 * never wait on each other.
 */
export class SingleFlight<K, V> {
  private readonly inFlight = new Map<K, Promise<V>>();

  run(key: K, work: () => Promise<V>): Promise<V> {
    const existing = this.inFlight.get(key);
    if (existing) {
      return existing;
    }

    // Claimed synchronously so a second caller in the same tick joins this flight
    const flight = Promise.resolve()
      .then(work)
      .finally(() => {
        this.inFlight.delete(key);
      });
    this.inFlight.set(key, flight);
    return flight;
  }

  has(key: K): boolean {
    return this.inFlight.has(key);
  }

  get size(): number {
    return this.inFlight.size;
  }

  /**
   * Settles once every flight started before the call has settled.
   */
  async drain(): Promise<void> {
    await Promise.allSettled([...this.inFlight.values()]);
  }
}
