import express from 'express';
import cors from 'cors';
import { MonitorEngine } from '../core/MonitorEngine';
import { MonitorSettingsStore } from '../storage/MonitorSettingsStore';
import {
  ExportOptions,
  ExportResult,
  defaultExportName,
  exportRecords,
  resolveExportPath
} from '../services/ExportService';
import { ExportError, toErrorMessage } from '../core/errors';
import { ProbeOutcome } from '../types/monitor';
import { KnownPortView } from '../types/serial';

export type ExportFn = (records: readonly ProbeOutcome[], opts: ExportOptions) => Promise<ExportResult>;

export interface AppDeps {
  engine: MonitorEngine;
  settings: MonitorSettingsStore;
  // 未指定导出路径时使用的目录
  exportDir: string;
  exportFn?: ExportFn;
  // 允许跨域访问的来源，默认不允许
  corsOrigins?: string[];
  allowAnyExportPath?: boolean;
}

export function createApp(deps: AppDeps) {
  const { engine, settings, exportDir } = deps;
  const exportFn = deps.exportFn ?? exportRecords;
  const corsOrigins = deps.corsOrigins ?? [];
  const allowAnyExportPath = !!deps.allowAnyExportPath;
  const app = express();

  app.use(cors({ origin: corsOrigins.length > 0 ? corsOrigins : false }));
  app.use(express.json());

  // 1. 监测状态
  app.get('/monitor', (_req, res) => {
    res.json({ code: 0, msg: 'success', data: engine.getStatus() });
  });

  app.post('/monitor/start', (_req, res) => {
    engine.start();
    res.json({ code: 0, msg: 'success', data: engine.getStatus() });
  });

  app.post('/monitor/stop', (_req, res) => {
    engine.stop();
    res.json({ code: 0, msg: 'success', data: engine.getStatus() });
  });

  // 2. 当前已知串口
  app.get('/ports', (_req, res) => {
    const data: KnownPortView[] = engine.getKnownPorts().map((p) => ({ path: p, pending: engine.isPending(p) }));
    res.json({ code: 0, msg: 'success', data });
  });

  // 3. 结果 (过滤后的投影 / 完整日志)
  app.get('/records', (_req, res) => {
    res.json({ code: 0, msg: 'success', data: engine.getView() });
  });

  app.get('/records/all', (_req, res) => {
    res.json({ code: 0, msg: 'success', data: engine.getRecords() });
  });

  app.put('/filter', async (req, res) => {
    if (!req.body || typeof req.body !== 'object') {
      return res.status(400).json({ code: 400, msg: 'Invalid filter' });
    }
    const body: Record<string, unknown> = req.body;
    const view = engine.setFilter({ query: body.query, status: body.status, unique: body.unique });
    try {
      // 记住上次使用的状态过滤
      await settings.update({ statusFilter: view.filter.status });
      res.json({ code: 0, msg: 'success', data: view });
    } catch (error) {
      console.error('[API] Failed to persist status filter:', toErrorMessage(error));
      res.json({ code: 0, msg: `filter applied, settings not saved: ${toErrorMessage(error)}`, data: view });
    }
  });

  // 4. 清理
  app.delete('/records', (_req, res) => {
    const removed = engine.clearAll();
    res.json({ code: 0, msg: 'success', data: { removed, total: engine.getStatus().records } });
  });

  app.post('/records/remove-failed', (_req, res) => {
    const removed = engine.removeFailed();
    res.json({ code: 0, msg: 'success', data: { removed, total: engine.getStatus().records } });
  });

  app.post('/records/remove-duplicates', (_req, res) => {
    const removed = engine.removeDuplicates();
    res.json({ code: 0, msg: 'success', data: { removed, total: engine.getStatus().records } });
  });

  // 5. 偏好设置
  app.get('/settings', async (_req, res) => {
    res.json({ code: 0, msg: 'success', data: await settings.read() });
  });

  app.put('/settings', async (req, res) => {
    const next: unknown = req.body;
    if (!next || typeof next !== 'object') return res.status(400).json({ code: 400, msg: 'Invalid settings' });
    try {
      const saved = await settings.write({ ...next, updatedAt: Date.now() });
      // 保存的状态过滤立即作用于当前视图
      engine.setFilter({ status: saved.statusFilter });
      res.json({ code: 0, msg: 'success', data: saved });
    } catch (error) {
      res.status(500).json({ code: 500, msg: toErrorMessage(error) });
    }
  });

  // 6. 导出
  app.post('/export', async (req, res) => {
    const body: Record<string, unknown> = req.body && typeof req.body === 'object' ? req.body : {};
    const prefs = (await settings.read()).export;
    const macOnly = body.macOnly === undefined ? prefs.macOnly : !!body.macOnly;
    const rawFormat = body.format;
    const format = rawFormat === 'csv' || rawFormat === 'xlsx' ? rawFormat : undefined;
    const requested = String(body.filePath ?? '').trim() || defaultExportName(format ?? prefs.format);

    try {
      const filePath = resolveExportPath(exportDir, requested, allowAnyExportPath);
      const result = await exportFn(engine.getRecords(), { filePath, macOnly, format });
      try {
        await settings.update({ export: { macOnly, format: result.format, lastPath: result.filePath } });
      } catch (error) {
        console.warn('[API] Failed to remember export preference:', toErrorMessage(error));
      }
      res.json({ code: 0, msg: 'success', data: result });
    } catch (error) {
      if (error instanceof ExportError && (error.code === 'EEMPTY' || error.code === 'EPATH')) {
        return res.status(400).json({ code: 400, msg: error.message });
      }
      console.error('[API] Export failed:', toErrorMessage(error));
      res.status(500).json({ code: 500, msg: toErrorMessage(error) });
    }
  });

  return app;
}
