import { spawn } from 'child_process';

export interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface RunCommandOptions {
  timeoutMs: number;
}

export type CommandRunner = (command: string, args: string[], opts: RunCommandOptions) => Promise<CommandResult>;

/**
 * 运行外部命令并收集输出。
 * 超时会 SIGKILL 子进程并以 timedOut 结束；无法启动 (ENOENT 等) 时 reject。
 */
export const runCommand: CommandRunner = (command, args, opts) => {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, { windowsHide: true });
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let done = false;

    const timer = setTimeout(() => {
      timedOut = true;
      proc.kill('SIGKILL');
    }, Math.max(100, opts.timeoutMs));

    proc.stdout.on('data', (data: Buffer) => {
      stdout += data.toString('utf8');
    });
    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString('utf8');
    });

    proc.on('error', (err) => {
      if (done) return;
      done = true;
      clearTimeout(timer);
      reject(err);
    });

    proc.on('close', (code) => {
      if (done) return;
      done = true;
      clearTimeout(timer);
      resolve({ code, stdout, stderr, timedOut });
    });
  });
};
