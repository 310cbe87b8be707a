/**
 * Queued job reference: id plus global submission order
 */
export interface QueuedJob {
  jobId: string;
  seq: number;
}

/**
 * SessionQueue - FIFO of queued jobs for one session
 */
export class SessionQueue {
  private items: QueuedJob[] = [];

  constructor(readonly sessionId: string) {}

  enqueue(item: QueuedJob): void {
    this.items.push(item);
  }

  peek(): QueuedJob | null {
    return this.items[0] ?? null;
  }

  shift(): QueuedJob | null {
    return this.items.shift() ?? null;
  }

  /**
   * Remove a job wherever it sits in the queue
   */
  remove(jobId: string): boolean {
    const index = this.items.findIndex((item) => item.jobId === jobId);
    if (index === -1) {
      return false;
    }
    this.items.splice(index, 1);
    return true;
  }

  /**
   * 0-based position of a job, or -1
   */
  positionOf(jobId: string): number {
    return this.items.findIndex((item) => item.jobId === jobId);
  }

  size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  list(): QueuedJob[] {
    return [...this.items];
  }

  /**
   * Drop every queued job and return them in order
   */
  drain(): QueuedJob[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }
}
