/* ==================== WORKER POOL ==================== */

interface QueueJob {
  run: () => Promise<void>;
  cancel: () => void;
}

// Runs at most `poolSize` jobs at once and holds at most `maxQueued` more.
// Anything beyond that is refused so the caller can shed it.
export class WorkerPool {
  private readonly queue: QueueJob[] = [];
  private active = 0;
  private isDestroyed = false;

  constructor(
    private readonly poolSize: number,
    private readonly maxQueued: number,
  ) {
    if (poolSize < 1) throw new RangeError("pool size must be at least 1");
  }

  get running(): number {
    return this.active;
  }

  get queued(): number {
    return this.queue.length;
  }

  // Returns false when the job was not accepted; `cancel` runs if an
  // accepted job is still queued when the pool is destroyed.
  submit(run: () => Promise<void>, cancel: () => void = () => {}): boolean {
    if (this.isDestroyed) return false;
    if (this.active >= this.poolSize && this.queue.length >= this.maxQueued) return false;
    this.queue.push({ run, cancel });
    this.pump();
    return true;
  }

  destroy(): void {
    if (this.isDestroyed) return;
    this.isDestroyed = true;
    for (const job of this.queue.splice(0)) {
      job.cancel();
    }
  }

  private pump(): void {
    while (!this.isDestroyed && this.active < this.poolSize) {
      const job = this.queue.shift();
      if (!job) return;

      this.active++;
      void job
        .run()
        .catch((err: unknown) => console.error("worker error:", err))
        .finally(() => {
          this.active--;
          this.pump();
        });
    }
  }
}
