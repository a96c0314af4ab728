import { PortEnumerator } from '../../core/PortEnumerator';
import { ProbeCapability } from '../../services/probe/ProbeCapability';
import { PortId, ProbeOutcome, ProbeResult } from '../../types/monitor';

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function nextTurn(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export class FakeEnumerator implements PortEnumerator {
  public calls = 0;
  private ports: PortId[];
  private failure: Error | null = null;
  private gate: Promise<void> | null = null;

  constructor(ports: PortId[] = []) {
    this.ports = ports;
  }

  set(ports: PortId[]): void {
    this.ports = ports;
  }

  failNext(err: Error): void {
    this.failure = err;
  }

  // 让下一次 list 挂起，直到返回的函数被调用
  hold(): () => void {
    const d = deferred<void>();
    this.gate = d.promise;
    return () => d.resolve();
  }

  async list(): Promise<PortId[]> {
    this.calls += 1;
    if (this.gate) {
      const gate = this.gate;
      this.gate = null;
      await gate;
    }
    if (this.failure) {
      const err = this.failure;
      this.failure = null;
      throw err;
    }
    return this.ports.slice();
  }
}

/**
 * 每次 probe 都挂起，由测试逐个 resolve / reject
 */
export class ControlledProbe implements ProbeCapability {
  public readonly name = 'controlled';
  public calls: PortId[] = [];
  private waiting: Map<PortId, Deferred<ProbeResult>[]> = new Map();

  probe(port: PortId): Promise<ProbeResult> {
    this.calls.push(port);
    const d = deferred<ProbeResult>();
    const list = this.waiting.get(port) ?? [];
    list.push(d);
    this.waiting.set(port, list);
    return d.promise;
  }

  resolve(port: PortId, result: ProbeResult): void {
    this.take(port).resolve(result);
  }

  reject(port: PortId, err: Error): void {
    this.take(port).reject(err);
  }

  private take(port: PortId): Deferred<ProbeResult> {
    const d = this.waiting.get(port)?.shift();
    if (!d) throw new Error(`no pending probe for ${port}`);
    return d;
  }
}

export function ok(mac: string): ProbeResult {
  return { mac, status: 'ok', category: 'ok' };
}

let recordSeq = 0;

export function makeRecord(partial: Partial<ProbeOutcome> & Pick<ProbeOutcome, 'mac'>): ProbeOutcome {
  recordSeq += 1;
  return {
    id: recordSeq,
    ts: 0,
    time: '2026-10-18 09:00:00',
    port: '/dev/ttyUSB0',
    status: 'ok',
    category: 'ok',
    ...partial
  };
}
