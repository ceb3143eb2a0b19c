/**
 * WorkPool - FIFO job queue with a concurrency limit
 *
 * Jobs may submit further jobs; drain() resolves once the queue is empty
 * and nothing is running. After the signal aborts, queued jobs are
 * dropped and running jobs are left to finish.
 */

export type Job = () => Promise<void>;

export interface WorkPoolMetrics {
  maxConcurrent: number;
  currentlyRunning: number;
  queuedJobs: number;
  completedJobs: number;
  failedJobs: number;
  droppedJobs: number;
}

export interface WorkPoolOptions {
  signal?: AbortSignal;
  /** Called when a job rejects */
  onError?: (error: Error) => void;
}

export class WorkPool {
  // Job queue (FIFO)
  private queue: Job[] = [];
  private running = 0;
  private idleResolvers: Array<() => void> = [];
  private readonly metrics: WorkPoolMetrics;
  private readonly signal?: AbortSignal;
  private readonly onError: (error: Error) => void;

  constructor(maxConcurrent = 4, options: WorkPoolOptions = {}) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
    this.metrics = {
      maxConcurrent,
      currentlyRunning: 0,
      queuedJobs: 0,
      completedJobs: 0,
      failedJobs: 0,
      droppedJobs: 0,
    };
    this.signal = options.signal;
    this.onError = options.onError ?? console.error;
    this.signal?.addEventListener("abort", () => this.processQueue(), { once: true });
  }

  submit(job: Job): void {
    this.queue.push(job);
    this.metrics.queuedJobs = this.queue.length;
    this.processQueue();
  }

  /**
   * Resolve once every submitted job (and every job they submitted) settled
   */
  drain(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleResolvers.push(resolve);
    });
  }

  getMetrics(): WorkPoolMetrics {
    return { ...this.metrics };
  }

  private isIdle(): boolean {
    return this.running === 0 && this.queue.length === 0;
  }

  /**
   * Start queued jobs while capacity is available
   */
  private processQueue(): void {
    if (this.signal?.aborted && this.queue.length > 0) {
      this.metrics.droppedJobs += this.queue.length;
      this.queue = [];
    }

    while (this.queue.length > 0 && this.running < this.metrics.maxConcurrent) {
      const job = this.queue.shift();
      if (!job) {
        break;
      }
      this.trackJobStart();
      void this.execute(job);
    }
    this.metrics.queuedJobs = this.queue.length;

    if (this.isIdle()) {
      const resolvers = this.idleResolvers;
      this.idleResolvers = [];
      for (const resolve of resolvers) {
        resolve();
      }
    }
  }

  private async execute(job: Job): Promise<void> {
    try {
      await job();
      this.metrics.completedJobs++;
    } catch (error) {
      this.metrics.failedJobs++;
      this.onError(error instanceof Error ? error : new Error(String(error)));
    } finally {
      this.trackJobComplete();
    }
  }

  private trackJobStart(): void {
    this.running++;
    this.metrics.currentlyRunning = this.running;
  }

  private trackJobComplete(): void {
    this.running--;
    this.metrics.currentlyRunning = this.running;

    // Capacity freed: start more jobs or report idle
    this.processQueue();
  }
}
