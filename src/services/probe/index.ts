import { toErrorMessage } from '../../core/errors';
import { ProbeCapability } from './ProbeCapability';
import { EsptoolCommand, EsptoolProbe, UnavailableProbe } from './EsptoolProbe';
import { CommandRunner, runCommand } from './runCommand';

export type { ProbeCapability } from './ProbeCapability';
export { EsptoolProbe, UnavailableProbe } from './EsptoolProbe';

export const DEFAULT_ESPTOOL_CANDIDATES: string[][] = [
  ['esptool'],
  ['esptool.py'],
  ['python3', '-m', 'esptool'],
  ['python', '-m', 'esptool']
];

const VERSION_RE = /esptool(?:\.py)?\s+v?(\d+)\.(\d+)(?:\.(\d+))?/i;

export interface DetectProbeOptions {
  // ESPTOOL_CMD，空格分隔；优先于默认候选
  override?: string;
  baud?: number;
  timeoutMs?: number;
  versionTimeoutMs?: number;
  runner?: CommandRunner;
  candidates?: string[][];
}

export function parseEsptoolVersion(output: string): { version: string; major: number } | null {
  const m = VERSION_RE.exec(output);
  if (!m) return null;
  const version = [m[1], m[2], m[3]].filter((x) => x !== undefined).join('.');
  return { version, major: Number(m[1]) };
}

export async function resolveEsptool(opts: DetectProbeOptions = {}): Promise<EsptoolCommand | null> {
  const runner = opts.runner ?? runCommand;
  const override = String(opts.override ?? '').trim();
  const candidates = [
    ...(override ? [override.split(/\s+/)] : []),
    ...(opts.candidates ?? DEFAULT_ESPTOOL_CANDIDATES)
  ];

  for (const argv of candidates) {
    const [bin, ...prefix] = argv;
    try {
      const out = await runner(bin, [...prefix, 'version'], { timeoutMs: opts.versionTimeoutMs ?? 5000 });
      if (out.timedOut || out.code !== 0) continue;
      const parsed = parseEsptoolVersion(`${out.stdout}\n${out.stderr}`);
      if (!parsed) continue;
      return {
        argv,
        version: parsed.version,
        // v5 起子命令改为连字符形式
        readMacVerb: parsed.major >= 5 ? 'read-mac' : 'read_mac'
      };
    } catch (e) {
      console.log(`[Probe] ${argv.join(' ')} unavailable: ${toErrorMessage(e)}`);
    }
  }
  return null;
}

/**
 * 启动时选定一次探测适配器，之后每次探测不再做接口判断
 */
export async function detectProbe(opts: DetectProbeOptions = {}): Promise<ProbeCapability> {
  const command = await resolveEsptool(opts);
  if (!command) {
    console.warn('[Probe] No esptool found; every probe will be recorded as an import error.');
    return new UnavailableProbe();
  }
  console.log(`[Probe] Using ${command.argv.join(' ')} (v${command.version}, ${command.readMacVerb})`);
  return new EsptoolProbe({
    command,
    baud: opts.baud,
    timeoutMs: opts.timeoutMs,
    runner: opts.runner
  });
}
