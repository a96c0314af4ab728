import test from 'node:test';
import assert from 'node:assert/strict';
import { defaultDataDir, readRuntimeConfig } from '../../config';

test('readRuntimeConfig falls back to defaults', () => {
  assert.deepEqual(readRuntimeConfig({}), {
    port: 9102,
    host: '127.0.0.1',
    corsOrigins: [],
    dataDir: defaultDataDir(),
    pollIntervalMs: 1000,
    probeWorkers: 0,
    probeTimeoutMs: 20000,
    probeBaud: 115200,
    esptoolCommand: '',
    autoStart: true,
    includeNativePorts: false,
    exportAnyPath: false
  });
});

test('readRuntimeConfig reads overrides and ignores invalid numbers', () => {
  const config = readRuntimeConfig({
    PORT: '9200',
    DATA_DIR: ' /tmp/monitor-data ',
    POLL_INTERVAL_MS: '10',
    PROBE_WORKERS: '4',
    PROBE_TIMEOUT_MS: 'soon',
    PROBE_BAUD: '460800',
    ESPTOOL_CMD: 'python3 -m esptool',
    MONITOR_AUTOSTART: 'off',
    INCLUDE_NATIVE_PORTS: 'yes',
    HOST: '0.0.0.0',
    CORS_ORIGINS: 'http://localhost:5173, ,http://127.0.0.1:5173',
    EXPORT_ANY_PATH: 'true'
  });
  assert.equal(config.host, '0.0.0.0');
  assert.deepEqual(config.corsOrigins, ['http://localhost:5173', 'http://127.0.0.1:5173']);
  assert.equal(config.exportAnyPath, true);
  assert.equal(config.port, 9200);
  assert.equal(config.dataDir, '/tmp/monitor-data');
  assert.equal(config.pollIntervalMs, 1000);
  assert.equal(config.probeWorkers, 4);
  assert.equal(config.probeTimeoutMs, 20000);
  assert.equal(config.probeBaud, 460800);
  assert.equal(config.esptoolCommand, 'python3 -m esptool');
  assert.equal(config.autoStart, false);
  assert.equal(config.includeNativePorts, true);
});
