import { SerialPort } from 'serialport';
import { skipReason } from '../core/PortEnumerator';
import { ProbePool } from '../core/ProbePool';
import { toErrorMessage } from '../core/errors';
import { readRuntimeConfig } from '../config';
import { ProbeCapability, detectProbe } from '../services/probe';
import { PortInfo } from '../types/serial';
import { PortId, ProbeResult } from '../types/monitor';

export interface ProbePortsArgs {
  probe: boolean;
  port: string;
}

export function parseArgs(argv: string[]): ProbePortsArgs {
  const out: ProbePortsArgs = { probe: false, port: '' };
  for (let i = 2; i < argv.length; i++) {
    const a = argv[i];
    if (a === '--probe') {
      out.probe = true;
    } else if (a === '--port') {
      const next = argv[i + 1];
      if (next && !next.startsWith('--')) {
        out.port = next;
        out.probe = true;
        i += 1;
      }
    }
  }
  return out;
}

export function formatPortLine(p: PortInfo, includeNative: boolean): string {
  const reason = skipReason(p, includeNative);
  const flag = reason ? `skip (${reason})` : 'candidate';
  return `${p.path}  ${flag}  ${p.manufacturer || '-'}  ${p.pnpId || '-'}`;
}

export function formatResultLine(port: PortId, r: ProbeResult): string {
  return `${port}  ${r.mac || '-'}  ${r.status}`;
}

/**
 * 对每个端口探测一次，结果顺序与输入一致
 */
export async function probeAll(
  ports: PortId[],
  probe: ProbeCapability,
  pool: ProbePool
): Promise<Array<{ port: PortId; result: ProbeResult }>> {
  const results = await Promise.all(
    ports.map((port) =>
      pool.submit(async () => {
        try {
          return await probe.probe(port);
        } catch (e) {
          const failed: ProbeResult = { mac: '', status: `error: ${toErrorMessage(e)}`, category: 'communication' };
          return failed;
        }
      })
    )
  );
  return ports.map((port, i) => ({ port, result: results[i] }));
}

async function main() {
  const args = parseArgs(process.argv);
  const config = readRuntimeConfig();

  const ports: PortInfo[] = await SerialPort.list();
  console.log('=== 串口列表 ===');
  if (ports.length === 0) console.log('(无)');
  for (const p of ports) console.log(formatPortLine(p, config.includeNativePorts));

  const probe = await detectProbe({
    override: config.esptoolCommand,
    baud: config.probeBaud,
    timeoutMs: config.probeTimeoutMs
  });
  console.log('=== 探测适配器 ===');
  console.log(probe.name);

  if (!args.probe) return;

  const targets = args.port
    ? [args.port]
    : ports.filter((p) => skipReason(p, config.includeNativePorts) === null).map((p) => p.path);
  console.log('=== 读取 MAC ===');
  if (targets.length === 0) {
    console.log('没有可探测的串口');
    return;
  }

  const pool = config.probeWorkers > 0 ? new ProbePool(config.probeWorkers) : new ProbePool();
  try {
    const results = await probeAll(targets, probe, pool);
    for (const { port, result } of results) console.log(formatResultLine(port, result));
    if (results.some((r) => r.result.category !== 'ok')) process.exitCode = 2;
  } finally {
    pool.shutdown();
  }
}

if (require.main === module) {
  main().catch((e) => {
    process.stderr.write(`${e instanceof Error && e.stack ? e.stack : String(e)}\n`);
    process.exitCode = 1;
  });
}
