import fs from 'fs/promises';
import path from 'path';
import { Workbook } from 'exceljs';
import { ProbeOutcome } from '../types/monitor';
import { ExportFormat } from '../types/settings';
import { ExportError, toErrorMessage } from '../core/errors';

export const SHEET_NAME = 'ESP32 MAC';
export const FULL_HEADER = ['Time', 'Port', 'MAC', 'Status'];
export const MAC_ONLY_HEADER = ['MAC'];

export interface ExportOptions {
  filePath: string;
  macOnly?: boolean;
  format?: ExportFormat;
}

export interface ExportResult {
  filePath: string;
  format: ExportFormat;
  rows: number;
}

export function formatFromPath(filePath: string): ExportFormat {
  return path.extname(filePath).toLowerCase() === '.csv' ? 'csv' : 'xlsx';
}

export function defaultExportName(format: ExportFormat, at: Date = new Date()): string {
  const stamp = at.toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
  return `esp32-mac-${stamp}.${format}`;
}

/**
 * 相对路径落在 exportDir 下；除非 allowAnyPath，解析结果不能离开 exportDir
 */
export function resolveExportPath(exportDir: string, requested: string, allowAnyPath = false): string {
  const base = path.resolve(exportDir);
  const filePath = path.resolve(base, requested);
  if (allowAnyPath) return filePath;
  const rel = path.relative(base, filePath);
  if (!rel || rel.startsWith('..') || path.isAbsolute(rel)) {
    throw new ExportError('EPATH', `Export path must stay inside ${base}`, filePath);
  }
  return filePath;
}

export function buildRows(records: readonly ProbeOutcome[], macOnly: boolean): string[][] {
  if (macOnly) {
    return records.filter((r) => r.mac).map((r) => [r.mac]);
  }
  return records.map((r) => [r.time, r.port, r.mac, r.status]);
}

/**
 * 导出结果日志 (或仅 MAC 列) 到用户指定路径
 */
export async function exportRecords(records: readonly ProbeOutcome[], opts: ExportOptions): Promise<ExportResult> {
  const filePath = path.resolve(opts.filePath);
  const format = opts.format ?? formatFromPath(filePath);
  const macOnly = !!opts.macOnly;
  const rows = buildRows(records, macOnly);
  if (rows.length === 0) {
    throw new ExportError('EEMPTY', 'No records to export', filePath);
  }

  const workbook = new Workbook();
  const sheet = workbook.addWorksheet(SHEET_NAME);
  sheet.addRow(macOnly ? MAC_ONLY_HEADER : FULL_HEADER);
  for (const row of rows) {
    sheet.addRow(row);
  }

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    if (format === 'csv') {
      await workbook.csv.writeFile(filePath);
    } else {
      await workbook.xlsx.writeFile(filePath);
    }
  } catch (e) {
    throw new ExportError('EWRITE', `Failed to save ${filePath}: ${toErrorMessage(e)}`, filePath);
  }

  console.log(`[Export] Saved ${rows.length} row(s) to ${filePath} (${format})`);
  return { filePath, format, rows: rows.length };
}
