/**
 * Counting semaphore for bounding concurrently held resources.
 * Used by JobScheduler as the global running-job counter.
 *
 * Acquisition is non-blocking: callers that find no headroom keep their
 * work queued and try again on the next admission pass.
 */
export class Semaphore {
  private current = 0;

  constructor(private readonly max: number) {
    if (!Number.isInteger(max) || max < 1) {
      throw new Error("Semaphore max must be a positive integer");
    }
  }

  /**
   * Take a slot if one is free.
   */
  tryAcquire(): boolean {
    if (this.current >= this.max) {
      return false;
    }
    this.current++;
    return true;
  }

  /**
   * Return a slot. Releasing more than was acquired is a programming error.
   */
  release(): void {
    if (this.current === 0) {
      throw new Error("Semaphore released more times than acquired");
    }
    this.current--;
  }

  /**
   * Number of available slots.
   */
  available(): number {
    return this.max - this.current;
  }

  /**
   * Current number of acquired slots.
   */
  acquired(): number {
    return this.current;
  }

  /**
   * Maximum number of concurrent slots.
   */
  getMax(): number {
    return this.max;
  }
}
