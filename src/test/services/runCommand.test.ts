import test from 'node:test';
import assert from 'node:assert/strict';
import { runCommand } from '../../services/probe/runCommand';

test('runCommand collects stdout, stderr and exit code', async () => {
  const out = await runCommand(
    process.execPath,
    ['-e', "process.stdout.write('MAC: 24:0a:c4:12:34:56'); process.stderr.write('warn'); process.exit(3)"],
    { timeoutMs: 10000 }
  );
  assert.deepEqual(out, { code: 3, stdout: 'MAC: 24:0a:c4:12:34:56', stderr: 'warn', timedOut: false });
});

test('runCommand kills the process on timeout', async () => {
  const out = await runCommand(process.execPath, ['-e', 'setTimeout(() => {}, 10000)'], { timeoutMs: 200 });
  assert.equal(out.timedOut, true);
  assert.equal(out.code, null);
});

test('runCommand rejects when the executable does not exist', async () => {
  await assert.rejects(
    runCommand('definitely-not-a-real-esptool-binary', ['version'], { timeoutMs: 1000 }),
    (err: unknown) => err instanceof Error && /ENOENT/.test(err.message)
  );
});
