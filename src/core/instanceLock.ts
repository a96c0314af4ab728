import fs from 'fs';
import path from 'path';
import { ELocked, errnoCode } from './errors';

interface LockFileContent {
  pid: number;
  createdAt: string;
}

export function isPidAlive(pid: unknown): boolean {
  const n = Number(pid);
  if (!Number.isFinite(n) || n <= 0) return false;
  try {
    process.kill(n, 0);
    return true;
  } catch (e) {
    // EPERM 说明进程存在但属于其他用户
    return errnoCode(e) === 'EPERM';
  }
}

function readLockedPid(lockFilePath: string): number | null {
  try {
    const raw = fs.readFileSync(lockFilePath, 'utf8');
    const data: unknown = JSON.parse(raw);
    if (data && typeof data === 'object' && 'pid' in data) {
      const pid = Number(data.pid);
      return Number.isFinite(pid) ? pid : null;
    }
    return null;
  } catch (e) {
    return null;
  }
}

/**
 * 每个数据目录只允许一个监测进程，避免两个进程同时抢占同一批串口
 */
export function acquireInstanceLock(lockFilePath: string): { release: () => void } {
  fs.mkdirSync(path.dirname(lockFilePath), { recursive: true });

  try {
    const fd = fs.openSync(lockFilePath, 'wx');
    try {
      const content: LockFileContent = { pid: process.pid, createdAt: new Date().toISOString() };
      fs.writeFileSync(fd, JSON.stringify(content, null, 2), 'utf8');
    } finally {
      fs.closeSync(fd);
    }
  } catch (e) {
    if (errnoCode(e) !== 'EEXIST') throw e;

    const lockedPid = readLockedPid(lockFilePath);
    if (lockedPid !== null && isPidAlive(lockedPid)) {
      throw new ELocked(lockedPid, lockFilePath);
    }
    // 过期锁：持有者已退出
    fs.rmSync(lockFilePath, { force: true });
    return acquireInstanceLock(lockFilePath);
  }

  let released = false;
  const release = () => {
    if (released) return;
    released = true;
    fs.rmSync(lockFilePath, { force: true });
  };

  process.once('exit', release);

  return { release };
}
