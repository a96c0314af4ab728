import { toErrorMessage } from './errors';

/**
 * 单写者对账队列。
 * 工作池的完成回调只负责 push，真正的状态修改在事件循环上按 FIFO 逐条执行。
 */
export class ReconcileQueue<T> {
  private items: T[] = [];
  private scheduled: NodeJS.Immediate | null = null;
  private draining = false;
  private apply: (item: T) => void;

  constructor(apply: (item: T) => void) {
    this.apply = apply;
  }

  public get size(): number {
    return this.items.length;
  }

  public push(item: T): void {
    this.items.push(item);
    if (this.scheduled) return;
    this.scheduled = setImmediate(() => {
      this.scheduled = null;
      this.flush();
    });
  }

  /**
   * 同步排空队列，返回处理条数。重入调用直接返回 0。
   */
  public flush(): number {
    if (this.draining) return 0;
    this.draining = true;
    let count = 0;
    try {
      let item = this.items.shift();
      while (item !== undefined) {
        try {
          this.apply(item);
        } catch (e) {
          console.error('[Reconcile] apply failed:', toErrorMessage(e));
        }
        count += 1;
        item = this.items.shift();
      }
    } finally {
      this.draining = false;
    }
    return count;
  }

  public dispose(): void {
    if (this.scheduled) {
      clearImmediate(this.scheduled);
      this.scheduled = null;
    }
  }
}
