import { FilterState, ProbeOutcome, StatusFilter } from '../types/monitor';

export const DEFAULT_FILTER: FilterState = { query: '', status: 'all', unique: false };

export function isSuccess(record: Pick<ProbeOutcome, 'category'>): boolean {
  return record.category === 'ok';
}

export function resultLabel(record: Pick<ProbeOutcome, 'category'>): 'success' | 'failure' {
  return isSuccess(record) ? 'success' : 'failure';
}

// 展示列: 时间 / 串口 / MAC / 结果 / 状态
export function displayFields(record: ProbeOutcome): string[] {
  return [record.time, record.port, record.mac, resultLabel(record), record.status];
}

export function matchesText(record: ProbeOutcome, query: string): boolean {
  const q = query.trim().toLowerCase();
  if (!q) return true;
  return displayFields(record).join(' ').toLowerCase().includes(q);
}

export function matchesStatus(record: ProbeOutcome, status: StatusFilter): boolean {
  if (status === 'success') return isSuccess(record);
  if (status === 'failure') return !isSuccess(record);
  return true;
}

/**
 * 单次正向扫描：每个非空 MAC 保留第一次出现的记录，空 MAC 的记录全部保留
 */
export function dedupeByMac<T extends Pick<ProbeOutcome, 'mac'>>(records: readonly T[]): T[] {
  const seen = new Set<string>();
  const out: T[] = [];
  for (const record of records) {
    if (!record.mac) {
      out.push(record);
      continue;
    }
    if (seen.has(record.mac)) continue;
    seen.add(record.mac);
    out.push(record);
  }
  return out;
}

/**
 * 纯函数投影，不修改输入，输出保持插入顺序
 */
export function project(records: readonly ProbeOutcome[], filter: FilterState): ProbeOutcome[] {
  const filtered = records.filter((r) => matchesStatus(r, filter.status) && matchesText(r, filter.query));
  return filter.unique ? dedupeByMac(filtered) : filtered;
}

export function normalizeStatusFilter(v: unknown, fallback: StatusFilter = 'all'): StatusFilter {
  if (v === 'all' || v === 'success' || v === 'failure') return v;
  return fallback;
}

export function mergeFilter(current: FilterState, patch: Partial<Record<keyof FilterState, unknown>>): FilterState {
  return {
    query: patch.query === undefined ? current.query : String(patch.query ?? ''),
    status: patch.status === undefined ? current.status : normalizeStatusFilter(patch.status, current.status),
    unique: patch.unique === undefined ? current.unique : patch.unique === true || patch.unique === 'true'
  };
}
