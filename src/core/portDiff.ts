import { PortId } from '../types/monitor';

export interface PortDiff {
  appeared: PortId[];
  disappeared: PortId[];
}

/**
 * 比较上一次已知串口集合与本次枚举结果。
 * 两个结果都按字典序升序返回，派发顺序因此是确定的。
 */
export function diffPorts(known: ReadonlySet<PortId>, current: Iterable<PortId>): PortDiff {
  const next = new Set(current);
  const appeared: PortId[] = [];
  const disappeared: PortId[] = [];

  for (const port of next) {
    if (!known.has(port)) appeared.push(port);
  }
  for (const port of known) {
    if (!next.has(port)) disappeared.push(port);
  }

  appeared.sort();
  disappeared.sort();
  return { appeared, disappeared };
}
