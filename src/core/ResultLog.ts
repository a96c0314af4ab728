import { ProbeOutcome } from '../types/monitor';
import { dedupeByMac, isSuccess } from './viewEngine';

/**
 * 只追加的探测结果日志。
 * 除 append 外，只允许整体删除 (清空 / 清除失败 / 去重)，从不原地改写记录。
 */
export class ResultLog {
  private records: ProbeOutcome[] = [];

  public get size(): number {
    return this.records.length;
  }

  public list(): readonly ProbeOutcome[] {
    return this.records;
  }

  public append(record: ProbeOutcome): void {
    this.records.push(record);
  }

  public clearAll(): number {
    const removed = this.records.length;
    this.records = [];
    return removed;
  }

  public removeFailed(): number {
    return this.replace(this.records.filter(isSuccess));
  }

  public removeDuplicates(): number {
    return this.replace(dedupeByMac(this.records));
  }

  private replace(next: ProbeOutcome[]): number {
    const removed = this.records.length - next.length;
    this.records = next;
    return removed;
  }
}
