import os from 'os';
import path from 'path';

export interface RuntimeConfig {
  port: number;
  // 默认只监听本机
  host: string;
  // 允许跨域访问的来源；为空时不下发 CORS 头
  corsOrigins: string[];
  dataDir: string;
  pollIntervalMs: number;
  // 0 表示按 CPU 数自动决定
  probeWorkers: number;
  probeTimeoutMs: number;
  probeBaud: number;
  esptoolCommand: string;
  autoStart: boolean;
  includeNativePorts: boolean;
  // 允许导出到数据目录 exports/ 之外的路径
  exportAnyPath: boolean;
}

function readNumber(env: NodeJS.ProcessEnv, key: string, fallback: number, min = 0): number {
  const n = Number(String(env[key] ?? '').trim());
  if (String(env[key] ?? '').trim() && Number.isFinite(n) && n >= min) return Math.floor(n);
  return fallback;
}

function readList(env: NodeJS.ProcessEnv, key: string): string[] {
  return String(env[key] ?? '')
    .split(',')
    .map((x) => x.trim())
    .filter(Boolean);
}

function readBoolean(env: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean {
  const v = String(env[key] ?? '').trim().toLowerCase();
  if (!v) return fallback;
  return v === '1' || v === 'true' || v === 'yes' || v === 'on';
}

export function defaultDataDir(): string {
  return path.join(os.homedir(), '.mac-probe-monitor');
}

export function readRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const dataDir = String(env.DATA_DIR ?? '').trim() || defaultDataDir();
  return {
    port: readNumber(env, 'PORT', 9102, 1),
    host: String(env.HOST ?? '').trim() || '127.0.0.1',
    corsOrigins: readList(env, 'CORS_ORIGINS'),
    dataDir,
    pollIntervalMs: readNumber(env, 'POLL_INTERVAL_MS', 1000, 50),
    probeWorkers: readNumber(env, 'PROBE_WORKERS', 0, 1),
    probeTimeoutMs: readNumber(env, 'PROBE_TIMEOUT_MS', 20000, 100),
    probeBaud: readNumber(env, 'PROBE_BAUD', 115200, 1),
    esptoolCommand: String(env.ESPTOOL_CMD ?? '').trim(),
    autoStart: readBoolean(env, 'MONITOR_AUTOSTART', true),
    includeNativePorts: readBoolean(env, 'INCLUDE_NATIVE_PORTS', false),
    exportAnyPath: readBoolean(env, 'EXPORT_ANY_PATH', false)
  };
}
