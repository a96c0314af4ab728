import { JsonFileStore } from './JsonFileStore';
import { normalizeStatusFilter } from '../core/viewEngine';
import type { ExportFormat, MonitorSettingsPatch, MonitorSettingsV1 } from '../types/settings';

export function getDefaultSettings(): MonitorSettingsV1 {
  return {
    schemaVersion: 1,
    updatedAt: Date.now(),
    statusFilter: 'all',
    export: { format: 'xlsx', macOnly: false, lastPath: '' }
  };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === 'object' && !Array.isArray(v);
}

function normalizeFormat(v: unknown, fallback: ExportFormat): ExportFormat {
  if (v === 'xlsx' || v === 'csv') return v;
  return fallback;
}

export function normalizeSettings(input: unknown): MonitorSettingsV1 {
  const d = getDefaultSettings();
  if (!isRecord(input)) return d;
  const exportIn: Record<string, unknown> = isRecord(input.export) ? input.export : {};
  const updatedAt = Number.isFinite(Number(input.updatedAt)) ? Number(input.updatedAt) : d.updatedAt;
  return {
    schemaVersion: 1,
    updatedAt,
    statusFilter: normalizeStatusFilter(input.statusFilter, d.statusFilter),
    export: {
      format: normalizeFormat(exportIn.format, d.export.format),
      macOnly: !!exportIn.macOnly,
      lastPath: String(exportIn.lastPath ?? '').trim()
    }
  };
}

/**
 * 用户偏好 (导出选项、上次使用的状态过滤)。读取失败一律回退默认值。
 */
export class MonitorSettingsStore {
  private store: JsonFileStore;

  constructor(filePath: string) {
    this.store = new JsonFileStore(filePath);
  }

  async read(): Promise<MonitorSettingsV1> {
    const res = await this.store.read();
    if (!res.ok) {
      if (res.reason !== 'missing') {
        console.warn(`[Settings] Using defaults, failed to read ${this.store.getFilePath()}: ${res.reason}`);
      }
      return getDefaultSettings();
    }
    return normalizeSettings(res.value);
  }

  async write(next: unknown): Promise<MonitorSettingsV1> {
    const normalized = normalizeSettings(next);
    await this.store.write(normalized);
    return normalized;
  }

  async update(patch: MonitorSettingsPatch): Promise<MonitorSettingsV1> {
    const current = await this.read();
    return this.write({
      ...current,
      updatedAt: Date.now(),
      statusFilter: patch.statusFilter ?? current.statusFilter,
      export: { ...current.export, ...(patch.export ?? {}) }
    });
  }
}
