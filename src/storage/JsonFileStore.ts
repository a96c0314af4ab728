import fs from 'fs/promises';
import path from 'path';
import { errnoCode, toErrorMessage } from '../core/errors';

export type JsonReadResult = { ok: true; value: unknown } | { ok: false; reason: string };

/**
 * 小体积 JSON 配置文件的原子读写：先写临时文件再 rename，覆盖前保留 .bak
 */
export class JsonFileStore {
  private filePath: string;
  private lastSerialized: string | null = null;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  public getFilePath(): string {
    return this.filePath;
  }

  /**
   * 读取失败不抛错；缺失文件与损坏文件都以 ok: false 返回，由调用方决定默认值
   */
  public async read(): Promise<JsonReadResult> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (e) {
      if (errnoCode(e) === 'ENOENT') return { ok: false, reason: 'missing' };
      return { ok: false, reason: toErrorMessage(e) };
    }
    try {
      const value: unknown = JSON.parse(raw);
      this.lastSerialized = JSON.stringify(value, null, 2);
      return { ok: true, value };
    } catch (e) {
      return { ok: false, reason: `invalid json: ${toErrorMessage(e)}` };
    }
  }

  public async write(value: unknown): Promise<void> {
    const serialized = JSON.stringify(value, null, 2);
    if (serialized === this.lastSerialized) return;

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    try {
      await fs.copyFile(this.filePath, `${this.filePath}.bak`);
    } catch (e) {
      if (errnoCode(e) !== 'ENOENT') {
        throw e;
      }
    }
    const tmpPath = `${this.filePath}.tmp.${process.pid}.${Date.now()}`;
    await fs.writeFile(tmpPath, serialized, 'utf8');
    await fs.rename(tmpPath, this.filePath);
    this.lastSerialized = serialized;
  }
}
