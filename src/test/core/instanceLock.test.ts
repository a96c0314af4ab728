import test from 'node:test';
import assert from 'node:assert/strict';
import os from 'node:os';
import path from 'node:path';
import fs from 'node:fs';
import { acquireInstanceLock, isPidAlive } from '../../core/instanceLock';
import { ELocked } from '../../core/errors';

function tmpFilePath(prefix: string) {
  const id = `${Date.now()}-${Math.random().toString(16).slice(2)}`;
  return path.join(os.tmpdir(), `${prefix}-${id}`, 'monitor.lock.json');
}

test('acquireInstanceLock is exclusive and releasable', () => {
  const lockPath = tmpFilePath('monitor-lock');
  const a = acquireInstanceLock(lockPath);
  assert.ok(fs.existsSync(lockPath));

  assert.throws(
    () => acquireInstanceLock(lockPath),
    (e: unknown) => e instanceof ELocked && e.code === 'ELOCKED' && e.lockedPid === process.pid
  );

  a.release();
  assert.ok(!fs.existsSync(lockPath));

  const b = acquireInstanceLock(lockPath);
  b.release();
});

test('acquireInstanceLock takes over a stale lock file', () => {
  const lockPath = tmpFilePath('monitor-stale');
  fs.mkdirSync(path.dirname(lockPath), { recursive: true });
  fs.writeFileSync(lockPath, JSON.stringify({ pid: -1, createdAt: '2026-10-18T00:00:00.000Z' }), 'utf8');

  const lock = acquireInstanceLock(lockPath);
  const content: unknown = JSON.parse(fs.readFileSync(lockPath, 'utf8'));
  assert.ok(content && typeof content === 'object' && 'pid' in content && content.pid === process.pid);
  lock.release();
});

test('isPidAlive rejects invalid pids and sees the current process', () => {
  assert.equal(isPidAlive(process.pid), true);
  assert.equal(isPidAlive(0), false);
  assert.equal(isPidAlive('abc'), false);
});
