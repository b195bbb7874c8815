import Queue from 'bull';
import { errorMessage } from '@/lib/errors';

export type JobHandler = (jobId: string) => Promise<unknown>;

export interface AnalysisQueue {
  enqueue(jobId: string): Promise<void>;
  close(): Promise<void>;
}

/**
 * In-process pool used when no Redis is configured. At most `concurrency`
 * handlers run at once; the rest wait in FIFO order.
 */
export class LocalWorkerPool implements AnalysisQueue {
  private waiting: string[] = [];
  private active = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private concurrency: number,
    private handler: JobHandler
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Worker concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  async enqueue(jobId: string): Promise<void> {
    this.waiting.push(jobId);
    this.drain();
  }

  get stats() {
    return { active: this.active, waiting: this.waiting.length };
  }

  /** Resolves once nothing is running or waiting. */
  onIdle(): Promise<void> {
    if (this.active === 0 && this.waiting.length === 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(() => resolve());
    });
  }

  async close(): Promise<void> {
    this.waiting = [];
    await this.onIdle();
  }

  private drain() {
    while (this.active < this.concurrency) {
      const jobId = this.waiting.shift();
      if (jobId === undefined) break;
      this.active += 1;
      void Promise.resolve()
        .then(() => this.handler(jobId))
        .catch((error: unknown) => {
          console.error(`[Queue] Job ${jobId} handler crashed: ${errorMessage(error)}`);
        })
        .finally(() => {
          this.active -= 1;
          this.drain();
          if (this.active === 0 && this.waiting.length === 0) {
            const waiters = this.idleWaiters;
            this.idleWaiters = [];
            for (const resolve of waiters) resolve();
          }
        });
    }
  }
}

export class BullAnalysisQueue implements AnalysisQueue {
  private queue: Queue.Queue<{ jobId: string }>;
  private processorRegistered = false;

  constructor(
    redisUrl: string,
    private concurrency: number,
    private handler: JobHandler
  ) {
    this.queue = new Queue<{ jobId: string }>('analysis-jobs', redisUrl);
  }

  registerProcessor() {
    if (this.processorRegistered) {
      return;
    }

    this.queue
      .process(this.concurrency, async (job) => {
        await this.handler(job.data.jobId);
      })
      .catch((error: unknown) => {
        console.error(`[Queue] analysis-jobs processor stopped: ${errorMessage(error)}`);
      });

    this.processorRegistered = true;
    console.log(`[Queue] Processing analysis-jobs with concurrency ${this.concurrency}`);
  }

  async enqueue(jobId: string): Promise<void> {
    this.registerProcessor();
    await this.queue.add({ jobId }, { attempts: 1, removeOnComplete: true, removeOnFail: false });
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}

export function createAnalysisQueue(opts: { redisUrl?: string; concurrency: number; handler: JobHandler }): AnalysisQueue {
  if (opts.redisUrl) {
    return new BullAnalysisQueue(opts.redisUrl, opts.concurrency, opts.handler);
  }
  return new LocalWorkerPool(opts.concurrency, opts.handler);
}
