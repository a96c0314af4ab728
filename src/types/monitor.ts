// 监测引擎相关的类型

export type PortId = string;

// ok / 导入失败 / 通信失败 / 未读到 MAC
export type OutcomeCategory = 'ok' | 'setup' | 'communication' | 'not-found';

export type StatusFilter = 'all' | 'success' | 'failure';

// 探测能力返回的原始结果
export interface ProbeResult {
  mac: string;
  status: string;
  category: OutcomeCategory;
}

// 结果日志中的一条记录 (创建后冻结)
export interface ProbeOutcome {
  readonly id: number;
  readonly ts: number;
  readonly time: string;
  readonly port: PortId;
  readonly mac: string;
  readonly status: string;
  readonly category: OutcomeCategory;
}

export interface FilterState {
  query: string;
  status: StatusFilter;
  unique: boolean;
}

export interface ProbeCompletion {
  port: PortId;
  ticket: number;
  result: ProbeResult;
}

export interface TickReport {
  appeared: PortId[];
  disappeared: PortId[];
  dispatched: PortId[];
}

export interface MonitorStatus {
  running: boolean;
  pollIntervalMs: number;
  knownPorts: PortId[];
  pendingPorts: PortId[];
  pool: { size: number; active: number; queued: number };
  skippedTicks: number;
  records: number;
  probe: string;
}

export interface ViewSnapshot {
  total: number;
  records: ProbeOutcome[];
  filter: FilterState;
}
