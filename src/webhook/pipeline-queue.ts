import type { Logger } from "../log.js";

interface QueueItem {
  taskId: string;
  /** Runs the pipeline and settles the caller's promise; never rejects. */
  execute: () => Promise<void>;
}

export interface PipelineQueueOptions {
  logger: Logger;
  maxConcurrent: number;
  /** Minimum gap between two pipeline starts. */
  minIntervalMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * FIFO of pipeline runs with a concurrency cap and start pacing.
 */
export class PipelineQueue {
  private readonly logger: Logger;
  private readonly maxConcurrent: number;
  private readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly queue: QueueItem[] = [];
  private readonly live = new Map<string, number>();
  private active = 0;
  private nextSlotAt = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(options: PipelineQueueOptions) {
    this.logger = options.logger.child({ component: "pipeline-queue" });
    this.maxConcurrent = Math.max(1, options.maxConcurrent);
    this.minIntervalMs = Math.max(0, options.minIntervalMs);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  enqueue<T>(taskId: string, run: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.live.set(taskId, (this.live.get(taskId) ?? 0) + 1);
      this.queue.push({
        taskId,
        execute: async () => {
          try {
            resolve(await run());
          } catch (err) {
            reject(err);
          } finally {
            this.release(taskId);
          }
        },
      });
      this.logger.debug({ taskId, queued: this.queue.length, active: this.active }, "pipeline queued");
      this.dispatch();
    });
  }

  getQueueDepth(): number {
    return this.queue.length;
  }

  getActiveCount(): number {
    return this.active;
  }

  /** True while a pipeline for `taskId` is queued or running. */
  has(taskId: string): boolean {
    return this.live.has(taskId);
  }

  /** Resolves once nothing is queued or running. */
  onIdle(): Promise<void> {
    if (this.active === 0 && this.queue.length === 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private dispatch(): void {
    while (this.active < this.maxConcurrent && this.queue.length > 0) {
      const item = this.queue.shift();
      if (!item) break;
      this.active += 1;

      void this.runItem(item).finally(() => {
        this.active -= 1;
        this.dispatch();
        if (this.active === 0 && this.queue.length === 0) {
          const waiters = this.idleWaiters;
          this.idleWaiters = [];
          for (const resolve of waiters) resolve();
        }
      });
    }
  }

  private release(taskId: string): void {
    const remaining = (this.live.get(taskId) ?? 1) - 1;
    if (remaining > 0) this.live.set(taskId, remaining);
    else this.live.delete(taskId);
  }

  private async runItem(item: QueueItem): Promise<void> {
    const now = this.now();
    const startAt = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = startAt + this.minIntervalMs;
    if (startAt > now) {
      this.logger.debug({ taskId: item.taskId, waitMs: startAt - now }, "pacing pipeline start");
      await this.sleep(startAt - now);
    }
    await item.execute();
  }
}
