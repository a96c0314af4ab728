import express from 'express';
import http from 'http';
import path from 'path';
import cors from 'cors';
import { createApp } from './api/app';
import { createWsServer } from './api/ws';
import { MonitorEngine } from './core/MonitorEngine';
import { SerialPortEnumerator } from './core/PortEnumerator';
import { ProbePool } from './core/ProbePool';
import { acquireInstanceLock } from './core/instanceLock';
import { ELocked, ESerialBusy, errnoCode, toErrorMessage } from './core/errors';
import { MonitorSettingsStore } from './storage/MonitorSettingsStore';
import { detectProbe } from './services/probe';
import { readRuntimeConfig } from './config';

async function main() {
  const config = readRuntimeConfig();
  const lockFilePath = path.join(config.dataDir, 'monitor.lock.json');
  let lock: { release: () => void } | null = null;
  try {
    lock = acquireInstanceLock(lockFilePath);
  } catch (e) {
    if (e instanceof ELocked) {
      throw new ESerialBusy('Another monitor instance is already running', {
        lockedPid: e.lockedPid,
        lockFilePath: e.lockFilePath
      });
    }
    throw e;
  }

  const settings = new MonitorSettingsStore(path.join(config.dataDir, 'settings.json'));
  const prefs = await settings.read();

  // 探测适配器只在启动时选择一次
  const probe = await detectProbe({
    override: config.esptoolCommand,
    baud: config.probeBaud,
    timeoutMs: config.probeTimeoutMs
  });

  const engine = new MonitorEngine({
    enumerator: new SerialPortEnumerator({ includeNative: config.includeNativePorts }),
    probe,
    pool: config.probeWorkers > 0 ? new ProbePool(config.probeWorkers) : new ProbePool(),
    pollIntervalMs: config.pollIntervalMs,
    filter: { status: prefs.statusFilter }
  });

  const app = createApp({
    engine,
    settings,
    exportDir: path.join(config.dataDir, 'exports'),
    corsOrigins: config.corsOrigins,
    allowAnyExportPath: config.exportAnyPath
  });

  const mainApp = express();
  mainApp.use(cors({ origin: config.corsOrigins.length > 0 ? config.corsOrigins : false }));
  mainApp.get('/health', (_req, res) => {
    res.status(200).json({ ok: true, pid: process.pid, port: config.port });
  });
  mainApp.use('/api', app);

  const server = http.createServer(mainApp);
  const wss = createWsServer(server, engine);

  const releaseLock = () => {
    try {
      lock?.release();
    } catch (e) {
      console.warn('Failed to release instance lock:', toErrorMessage(e));
    }
  };

  server.on('error', (err) => {
    engine.dispose();
    releaseLock();
    if (errnoCode(err) === 'EADDRINUSE') {
      console.error(`PORT_IN_USE:${config.port}`);
      process.exit(110);
    }
    console.error(err);
    process.exit(1);
  });

  server.listen(config.port, config.host, () => {
    console.log(`Server is running on http://${config.host}:${config.port}`);
    console.log(`WebSocket server is running on ws://${config.host}:${config.port}/ws`);
    console.log(`Data directory: ${config.dataDir}`);
    if (config.autoStart) engine.start();
  });

  // 优雅退出：不等待在途探测
  let exiting = false;
  function gracefulExit(code: number) {
    if (exiting) return;
    exiting = true;
    console.log('Stopping server...');
    engine.dispose();
    wss.close();
    releaseLock();
    server.close(() => {
      console.log('Server stopped');
      process.exit(code);
    });
    setTimeout(() => process.exit(code), 2000).unref();
  }

  process.on('SIGINT', () => gracefulExit(0));
  process.on('SIGTERM', () => gracefulExit(0));
}

main().catch((e) => {
  if (e instanceof ESerialBusy) {
    const pidPart = Number.isFinite(Number(e.lockedPid)) ? ` pid=${e.lockedPid}` : '';
    console.error(`ESerialBusy:${pidPart} ${e.message}`);
    process.exit(110);
  }
  console.error(e);
  process.exit(1);
});
