import { PortId, ProbeResult } from '../../types/monitor';
import { toErrorMessage } from '../../core/errors';
import { ProbeCapability } from './ProbeCapability';
import { CommandResult, CommandRunner, runCommand } from './runCommand';
import { extractMac } from './mac';

export type ReadMacVerb = 'read_mac' | 'read-mac';

export interface EsptoolCommand {
  // 可执行文件及前置参数，如 ['python3', '-m', 'esptool']
  argv: string[];
  version: string;
  readMacVerb: ReadMacVerb;
}

export interface EsptoolProbeOptions {
  command: EsptoolCommand;
  baud?: number;
  timeoutMs?: number;
  runner?: CommandRunner;
}

const FATAL_LINE = /A fatal error occurred:\s*(.*)$/;
// esptool 在致命错误后追加的排障链接，不是失败原因
const HINT_LINE = /^For troubleshooting steps visit:/;

/**
 * 从失败输出中取原因：优先 "A fatal error occurred:" 行，否则取最后一行非提示输出
 */
export function failureDetail(...texts: string[]): string {
  const lines = texts
    .join('\n')
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter(Boolean);
  for (const line of lines) {
    const m = FATAL_LINE.exec(line);
    if (m && m[1]) return m[1].trim();
  }
  const rest = lines.filter((l) => !HINT_LINE.test(l));
  return rest.length > 0 ? rest[rest.length - 1] : '';
}

export class EsptoolProbe implements ProbeCapability {
  public readonly name: string;
  private command: EsptoolCommand;
  private baud: number;
  private timeoutMs: number;
  private runner: CommandRunner;

  constructor(opts: EsptoolProbeOptions) {
    this.command = opts.command;
    this.baud = opts.baud ?? 115200;
    this.timeoutMs = opts.timeoutMs ?? 20000;
    this.runner = opts.runner ?? runCommand;
    this.name = `esptool v${opts.command.version}`;
  }

  public async probe(port: PortId): Promise<ProbeResult> {
    const [bin, ...prefix] = this.command.argv;
    const args = [...prefix, '--port', port, '--baud', String(this.baud), this.command.readMacVerb];

    let out: CommandResult;
    try {
      out = await this.runner(bin, args, { timeoutMs: this.timeoutMs });
    } catch (e) {
      return { mac: '', status: `import error: ${toErrorMessage(e)}`, category: 'setup' };
    }

    if (out.timedOut) {
      return { mac: '', status: 'error: timeout', category: 'communication' };
    }
    if (out.code !== 0) {
      const detail = failureDetail(out.stdout, out.stderr) || `exit code ${out.code}`;
      return { mac: '', status: `error: ${detail}`, category: 'communication' };
    }

    const mac = extractMac(out.stdout);
    if (!mac) {
      return { mac: '', status: 'mac not found', category: 'not-found' };
    }
    return { mac, status: 'ok', category: 'ok' };
  }
}

/**
 * 没有可用 esptool 时的占位实现，所有探测都记为导入失败
 */
export class UnavailableProbe implements ProbeCapability {
  public readonly name = 'unavailable';
  private reason: string;

  constructor(reason = 'esptool not found') {
    this.reason = reason;
  }

  public async probe(_port?: PortId): Promise<ProbeResult> {
    return { mac: '', status: `import error: ${this.reason}`, category: 'setup' };
  }
}
