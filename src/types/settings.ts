import { StatusFilter } from './monitor';

export type ExportFormat = 'xlsx' | 'csv';

export interface ExportPreference {
  format: ExportFormat;
  // 只导出 MAC 一列
  macOnly: boolean;
  lastPath: string;
}

export interface MonitorSettingsV1 {
  schemaVersion: 1;
  updatedAt: number;
  statusFilter: StatusFilter;
  export: ExportPreference;
}

export interface MonitorSettingsPatch {
  statusFilter?: unknown;
  export?: Partial<Record<keyof ExportPreference, unknown>>;
}
