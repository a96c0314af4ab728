import { SerialPort } from 'serialport';
import { PortInfo } from '../types/serial';
import { PortId } from '../types/monitor';

export interface PortEnumerator {
  list(): Promise<PortId[]>;
}

export type ListPortsFn = () => Promise<PortInfo[]>;

export interface SerialPortEnumeratorOptions {
  // 是否保留没有 USB 标识的原生串口 (如 /dev/ttyS0)
  includeNative?: boolean;
  listPorts?: ListPortsFn;
}

/**
 * 返回端口被排除的原因，可探测时返回 null
 */
export function skipReason(p: PortInfo, includeNative = false): string | null {
  // 1. 基于 PnpId 过滤 ACPI\PNP0501 (Windows 标准 COM 口)
  if (p.pnpId && p.pnpId.includes('ACPI') && p.pnpId.includes('PNP0501')) {
    return 'ACPI PNP0501';
  }

  // 2. 厂商名称明确是“标准端口类型”
  if (p.manufacturer && (p.manufacturer.includes('标准端口类型') || p.manufacturer.includes('Standard port types'))) {
    return 'standard port type';
  }

  // 3. 既没有 pnpId 也没有 USB VID/PID 的端口通常是主板原生串口
  // macOS 下 USB 串口没有 pnpId，只能靠 vendorId / productId 识别
  if (!p.pnpId && !p.vendorId && !p.productId && !includeNative) {
    return 'native port (no USB id)';
  }

  return null;
}

export function isProbeCandidate(p: PortInfo, includeNative = false): boolean {
  return skipReason(p, includeNative) === null;
}

export class SerialPortEnumerator implements PortEnumerator {
  private includeNative: boolean;
  private listPorts: ListPortsFn;

  constructor(opts: SerialPortEnumeratorOptions = {}) {
    this.includeNative = !!opts.includeNative;
    this.listPorts = opts.listPorts ?? (() => SerialPort.list());
  }

  /**
   * 扫描当前可探测的串口
   */
  public async list(): Promise<PortId[]> {
    const ports = await this.listPorts();
    return ports.filter((p) => isProbeCandidate(p, this.includeNative)).map((p) => p.path);
  }
}
