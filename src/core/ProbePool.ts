import os from 'os';
import { PoolClosedError } from './errors';

interface QueuedJob {
  run: () => Promise<void>;
  cancel: (reason: Error) => void;
}

// 每个探测都是子进程，运行时没有全局锁约束，上限可以放宽
const MIN_WORKERS = 2;
const MAX_WORKERS = 8;

export function defaultPoolSize(): number {
  return Math.max(MIN_WORKERS, Math.min(os.availableParallelism(), MAX_WORKERS));
}

/**
 * 有界并发的探测工作池。
 * 超出 size 的任务按 FIFO 排队；shutdown 丢弃排队任务且不等待运行中的任务。
 */
export class ProbePool {
  public readonly size: number;
  private queue: QueuedJob[] = [];
  private active = 0;
  private closed = false;

  constructor(size: number = defaultPoolSize()) {
    this.size = Math.max(1, Math.floor(size));
  }

  public get activeCount(): number {
    return this.active;
  }

  public get queuedCount(): number {
    return this.queue.length;
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  public get busy(): boolean {
    return this.active > 0 || this.queue.length > 0;
  }

  public submit<T>(task: () => Promise<T>): Promise<T> {
    if (this.closed) return Promise.reject(new PoolClosedError());

    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        run: async () => {
          try {
            resolve(await task());
          } catch (e) {
            reject(e);
          }
        },
        cancel: reject
      });
      this.pump();
    });
  }

  /**
   * 返回被丢弃的排队任务数
   */
  public shutdown(): number {
    if (this.closed) return 0;
    this.closed = true;
    const dropped = this.queue.splice(0, this.queue.length);
    for (const job of dropped) {
      job.cancel(new PoolClosedError());
    }
    return dropped.length;
  }

  private pump(): void {
    while (!this.closed && this.active < this.size && this.queue.length > 0) {
      const job = this.queue.shift();
      if (!job) return;
      this.active += 1;
      void job.run().finally(() => {
        this.active -= 1;
        this.pump();
      });
    }
  }
}
