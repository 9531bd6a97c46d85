/**
 * In-memory politeness delay per key.
 * A run is single-process and sequential, so no cross-process coordination.
 */
export class RateLimiter {
  private readonly lastRequest = new Map<string, number>();

  constructor(private readonly minDelayMs: number) {}

  async acquire(key: string): Promise<void> {
    if (this.minDelayMs <= 0) return;

    const now = Date.now();
    const last = this.lastRequest.get(key);

    if (last !== undefined) {
      const elapsed = now - last;
      if (elapsed < this.minDelayMs) {
        const waitMs = this.minDelayMs - elapsed;
        await new Promise((resolve) => setTimeout(resolve, waitMs));
      }
    }

    this.lastRequest.set(key, Date.now());
  }
}
