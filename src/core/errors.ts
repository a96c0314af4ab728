export class ESerialBusy extends Error {
  code = 'ESerialBusy' as const;
  lockedPid?: number;
  lockFilePath?: string;

  constructor(message: string, options?: { lockedPid?: number; lockFilePath?: string }) {
    super(message);
    this.name = 'ESerialBusy';
    this.lockedPid = options?.lockedPid;
    this.lockFilePath = options?.lockFilePath;
  }
}

export class ELocked extends Error {
  code = 'ELOCKED' as const;
  lockedPid: number;
  lockFilePath: string;

  constructor(lockedPid: number, lockFilePath: string) {
    super(`LOCKED_BY_PID:${lockedPid}`);
    this.name = 'ELocked';
    this.lockedPid = lockedPid;
    this.lockFilePath = lockFilePath;
  }
}

export type ExportErrorCode = 'EEMPTY' | 'EWRITE' | 'EPATH';

export class ExportError extends Error {
  code: ExportErrorCode;
  filePath?: string;

  constructor(code: ExportErrorCode, message: string, filePath?: string) {
    super(message);
    this.name = 'ExportError';
    this.code = code;
    this.filePath = filePath;
  }
}

export class PoolClosedError extends Error {
  code = 'EPOOLCLOSED' as const;

  constructor() {
    super('Probe pool has been shut down');
    this.name = 'PoolClosedError';
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function errnoCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}
