import {
  FilterState,
  MonitorStatus,
  PortId,
  ProbeCompletion,
  ProbeOutcome,
  TickReport,
  ViewSnapshot
} from '../types/monitor';
import { ProbeCapability } from '../services/probe/ProbeCapability';
import { PortEnumerator } from './PortEnumerator';
import { diffPorts } from './portDiff';
import { ProbePool } from './ProbePool';
import { ProbeDispatcher } from './ProbeDispatcher';
import { ReconcileQueue } from './ReconcileQueue';
import { ResultLog } from './ResultLog';
import { DEFAULT_FILTER, mergeFilter, project } from './viewEngine';
import { toErrorMessage } from './errors';

export interface MonitorEngineOptions {
  enumerator: PortEnumerator;
  probe: ProbeCapability;
  pool?: ProbePool;
  pollIntervalMs?: number;
  filter?: Partial<FilterState>;
  now?: () => Date;
}

type Listener<T> = (value: T) => void;

export function formatLocalTime(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}

/**
 * 串口发现 + 并发探测协调引擎。
 *
 * 事件循环是唯一的控制线程：它拥有 tick、已知/待探测集合、结果日志和所有通知。
 * 探测在工作池中运行，完成结果只能经由对账队列回到共享状态。
 */
export class MonitorEngine {
  private enumerator: PortEnumerator;
  private probe: ProbeCapability;
  private pool: ProbePool;
  private dispatcher: ProbeDispatcher;
  private reconciler: ReconcileQueue<ProbeCompletion>;
  private log = new ResultLog();
  private now: () => Date;

  private known: Set<PortId> = new Set();
  private filter: FilterState;
  private view: ProbeOutcome[] = [];
  private recordSeq = 0;

  private readonly pollIntervalMs: number;
  private timer: NodeJS.Timeout | null = null;
  private ticking = false;
  private skippedTicks = 0;
  private disposed = false;

  private appendedListeners: Set<Listener<ProbeOutcome>> = new Set();
  private viewListeners: Set<Listener<ViewSnapshot>> = new Set();
  private statusListeners: Set<Listener<MonitorStatus>> = new Set();

  constructor(opts: MonitorEngineOptions) {
    this.enumerator = opts.enumerator;
    this.probe = opts.probe;
    this.pool = opts.pool ?? new ProbePool();
    this.pollIntervalMs = Math.max(50, Math.floor(opts.pollIntervalMs ?? 1000));
    this.filter = mergeFilter(DEFAULT_FILTER, opts.filter ?? {});
    this.now = opts.now ?? (() => new Date());
    this.reconciler = new ReconcileQueue<ProbeCompletion>((c) => this.reconcile(c));
    this.dispatcher = new ProbeDispatcher({
      probe: this.probe,
      pool: this.pool,
      onCompleted: (c) => this.reconciler.push(c)
    });
  }

  // --- 生命周期 ---

  public isRunning(): boolean {
    return this.timer !== null;
  }

  public start(): void {
    if (this.disposed || this.timer) return;
    console.log(`[Monitor] Started, polling every ${this.pollIntervalMs}ms`);
    this.timer = setInterval(() => {
      this.tick().catch((err) => {
        console.error('[Monitor] Tick failed:', toErrorMessage(err));
      });
    }, this.pollIntervalMs);
    this.emitStatus();
  }

  /**
   * 停止后续 tick 与派发；已派发的探测完成后仍会入账
   */
  public stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    console.log('[Monitor] Stopped');
    this.emitStatus();
  }

  /**
   * 释放工作池，不等待在途探测
   */
  public dispose(): void {
    if (this.disposed) return;
    this.stop();
    this.disposed = true;
    const dropped = this.pool.shutdown();
    if (dropped > 0) console.log(`[Monitor] Dropped ${dropped} queued probe(s) on shutdown`);
  }

  /**
   * 单次轮询。上一轮未结束、引擎已停止或已释放时跳过并返回 null。
   */
  public async tick(): Promise<TickReport | null> {
    if (this.disposed || !this.timer) return null;
    if (this.ticking) {
      this.skippedTicks += 1;
      return null;
    }
    this.ticking = true;
    try {
      const current = await this.enumerate();
      if (this.disposed || !this.timer) return null;

      const { appeared, disappeared } = diffPorts(this.known, current);
      this.known = new Set(current);

      for (const port of disappeared) {
        this.dispatcher.onDisappeared(port);
      }
      const dispatched = appeared.filter((port) => this.dispatcher.onAppeared(port));

      if (appeared.length > 0 || disappeared.length > 0) {
        console.log(`[Monitor] Ports +[${appeared.join(', ')}] -[${disappeared.join(', ')}]`);
        this.emitStatus();
      }
      return { appeared, disappeared, dispatched };
    } finally {
      this.ticking = false;
    }
  }

  /**
   * 等待工作池与对账队列都空闲
   */
  public async whenIdle(): Promise<void> {
    do {
      await new Promise<void>((resolve) => setImmediate(resolve));
      this.reconciler.flush();
    } while ((this.pool.busy && !this.pool.isClosed) || this.reconciler.size > 0);
  }

  // --- 查询 ---

  public getStatus(): MonitorStatus {
    return {
      running: this.isRunning(),
      pollIntervalMs: this.pollIntervalMs,
      knownPorts: Array.from(this.known).sort(),
      pendingPorts: this.dispatcher.listPending(),
      pool: { size: this.pool.size, active: this.pool.activeCount, queued: this.pool.queuedCount },
      skippedTicks: this.skippedTicks,
      records: this.log.size,
      probe: this.probe.name
    };
  }

  public getKnownPorts(): PortId[] {
    return Array.from(this.known).sort();
  }

  public isPending(port: PortId): boolean {
    return this.dispatcher.isPending(port);
  }

  public getRecords(): ProbeOutcome[] {
    return this.log.list().slice();
  }

  public getFilter(): FilterState {
    return { ...this.filter };
  }

  public getView(): ViewSnapshot {
    return { total: this.log.size, records: this.view.slice(), filter: this.getFilter() };
  }

  public setFilter(patch: Partial<Record<keyof FilterState, unknown>>): ViewSnapshot {
    this.filter = mergeFilter(this.filter, patch);
    this.refreshView();
    return this.getView();
  }

  // --- 日志修改 ---

  public clearAll(): number {
    return this.mutate(() => this.log.clearAll(), 'clearAll');
  }

  public removeFailed(): number {
    return this.mutate(() => this.log.removeFailed(), 'removeFailed');
  }

  public removeDuplicates(): number {
    return this.mutate(() => this.log.removeDuplicates(), 'removeDuplicates');
  }

  // --- 订阅 ---

  public onAppended(fn: Listener<ProbeOutcome>): () => void {
    this.appendedListeners.add(fn);
    return () => this.appendedListeners.delete(fn);
  }

  public onView(fn: Listener<ViewSnapshot>): () => void {
    this.viewListeners.add(fn);
    return () => this.viewListeners.delete(fn);
  }

  public onStatus(fn: Listener<MonitorStatus>): () => void {
    this.statusListeners.add(fn);
    return () => this.statusListeners.delete(fn);
  }

  // --- 内部私有方法 ---

  private async enumerate(): Promise<PortId[]> {
    try {
      return await this.enumerator.list();
    } catch (err) {
      // 枚举失败视为当前没有可见串口
      console.warn('[Monitor] Failed to list ports:', toErrorMessage(err));
      return [];
    }
  }

  private reconcile(c: ProbeCompletion): void {
    this.dispatcher.settle(c.port, c.ticket);
    const at = this.now();
    const record: ProbeOutcome = Object.freeze({
      id: ++this.recordSeq,
      ts: at.getTime(),
      time: formatLocalTime(at),
      port: c.port,
      mac: c.result.mac,
      status: c.result.status,
      category: c.result.category
    });
    this.log.append(record);
    console.log(`[Monitor] ${record.port} -> ${record.mac || '-'} (${record.status})`);

    this.notify(this.appendedListeners, record);
    this.refreshView();
    this.emitStatus();
  }

  private mutate(op: () => number, label: string): number {
    const removed = op();
    console.log(`[Monitor] ${label} removed ${removed} record(s)`);
    this.refreshView();
    this.emitStatus();
    return removed;
  }

  private refreshView(): void {
    this.view = project(this.log.list(), this.filter);
    if (this.viewListeners.size === 0) return;
    this.notify(this.viewListeners, this.getView());
  }

  private emitStatus(): void {
    if (this.statusListeners.size === 0) return;
    this.notify(this.statusListeners, this.getStatus());
  }

  private notify<T>(listeners: Set<Listener<T>>, value: T): void {
    for (const fn of listeners) {
      try {
        fn(value);
      } catch (err) {
        console.error('[Monitor] Listener failed:', toErrorMessage(err));
      }
    }
  }
}
