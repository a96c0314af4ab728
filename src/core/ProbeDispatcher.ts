import { PortId, ProbeCompletion, ProbeResult } from '../types/monitor';
import { ProbeCapability } from '../services/probe/ProbeCapability';
import { PoolClosedError, toErrorMessage } from './errors';
import { ProbePool } from './ProbePool';

export interface ProbeDispatcherOptions {
  probe: ProbeCapability;
  pool: ProbePool;
  // 完成结果的唯一出口，由引擎接到对账队列上
  onCompleted: (completion: ProbeCompletion) => void;
}

/**
 * 保证每个串口最多只有一个被跟踪的在途探测。
 * pending 以 ticket 区分，释放只作用于自己创建的那一条。
 */
export class ProbeDispatcher {
  private probe: ProbeCapability;
  private pool: ProbePool;
  private onCompleted: (completion: ProbeCompletion) => void;
  private pending: Map<PortId, number> = new Map();
  private ticketSeq = 0;

  constructor(opts: ProbeDispatcherOptions) {
    this.probe = opts.probe;
    this.pool = opts.pool;
    this.onCompleted = opts.onCompleted;
  }

  public isPending(port: PortId): boolean {
    return this.pending.has(port);
  }

  public listPending(): PortId[] {
    return Array.from(this.pending.keys()).sort();
  }

  /**
   * 返回是否真正派发了探测
   */
  public onAppeared(port: PortId): boolean {
    if (this.pending.has(port)) return false;

    const ticket = ++this.ticketSeq;
    this.pending.set(port, ticket);

    this.pool.submit(() => this.runProbe(port)).then(
      (result) => {
        this.onCompleted({ port, ticket, result });
      },
      (error: unknown) => {
        if (error instanceof PoolClosedError) {
          // 工作池已关闭，排队中的探测被放弃，不产生记录
          this.settle(port, ticket);
          return;
        }
        this.onCompleted({ port, ticket, result: failureFromError(error) });
      }
    ).catch((error: unknown) => {
      console.error(`[Probe] Failed to hand over result for ${port}:`, toErrorMessage(error));
    });
    return true;
  }

  // 不取消在途探测，其结果仍会被记录
  public onDisappeared(port: PortId): void {
    this.pending.delete(port);
  }

  public settle(port: PortId, ticket: number): void {
    if (this.pending.get(port) === ticket) {
      this.pending.delete(port);
    }
  }

  private async runProbe(port: PortId): Promise<ProbeResult> {
    try {
      return await this.probe.probe(port);
    } catch (error) {
      console.warn(`[Probe] ${this.probe.name} threw for ${port}:`, toErrorMessage(error));
      return failureFromError(error);
    }
  }
}

function failureFromError(error: unknown): ProbeResult {
  return { mac: '', status: `error: ${toErrorMessage(error)}`, category: 'communication' };
}
