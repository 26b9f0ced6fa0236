import assert from 'node:assert/strict';
import { fileURLToPath } from 'node:url';
import process from 'node:process';
import test from 'node:test';

import { CommandError, runCommand } from '../src/cli/utils/exec.js';

const cliPath = fileURLToPath(new URL('../src/cli/streamfallCli.ts', import.meta.url));

const runCli = (args: string[]) => runCommand(process.execPath, ['--import', 'tsx', cliPath, ...args]);

for (const flag of ['--config', '--output', '--report', '--ffmpeg']) {
  test(`render exits with an error when ${flag} has no value`, async () => {
    await assert.rejects(runCli(['render', flag]), (error: unknown) => {
      assert.ok(error instanceof CommandError);
      assert.equal(error.exitCode, 1);
      assert.equal(error.stderr.trim(), `${flag} expects a value`);
      return true;
    });
  });
}

test('render rejects a flag where a value is expected', async () => {
  await assert.rejects(runCli(['render', '--output', '--quiet']), (error: unknown) => {
    assert.ok(error instanceof CommandError);
    assert.equal(error.stderr.trim(), '--output expects a value');
    return true;
  });
});
