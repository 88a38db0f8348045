import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { runCommand } from '../../src/lib/exec.js';
import { CommandNotFoundError } from '../../src/errors.js';

// Runs real child processes: the current node binary with inline scripts
const NODE = process.execPath;

describe('runCommand', () => {
  let scratch: string;

  beforeAll(() => {
    scratch = mkdtempSync(join(tmpdir(), 'manpage-exec-'));
  });

  afterAll(() => {
    rmSync(scratch, { recursive: true, force: true });
  });

  it('should pass input on stdin and collect stdout', async () => {
    const result = await runCommand(NODE, ['-e', 'process.stdin.pipe(process.stdout)'], {
      input: '.TH TOOL 1\n',
    });

    expect(result).toEqual({ stdout: '.TH TOOL 1\n', stderr: '', exitCode: 0 });
  });

  it('should return a non-zero exit with its stderr instead of throwing', async () => {
    const script = "process.stdout.write('partial'); process.stderr.write('bad macro\\n'); process.exit(3)";

    const result = await runCommand(NODE, ['-e', script]);

    expect(result).toEqual({ stdout: 'partial', stderr: 'bad macro\n', exitCode: 3 });
  });

  it('should ignore input the child never reads', async () => {
    const result = await runCommand(NODE, ['-e', 'process.exit(0)'], { input: 'x'.repeat(1024 * 1024) });

    expect(result.exitCode).toBe(0);
  });

  it('should report a child killed by a signal as exit code 1', async () => {
    const result = await runCommand(NODE, ['-e', "process.kill(process.pid, 'SIGTERM')"]);

    expect(result.exitCode).toBe(1);
  });

  it('should run in the requested directory', async () => {
    writeFileSync(join(scratch, 'marker'), 'here');

    const result = await runCommand(NODE, ['-e', "process.stdout.write(require('fs').readFileSync('marker', 'utf-8'))"], {
      cwd: scratch,
    });

    expect(result).toEqual({ stdout: 'here', stderr: '', exitCode: 0 });
  });

  it('should throw CommandNotFoundError for a command that does not exist', async () => {
    const attempt = runCommand('manpage-test-no-such-command', []);

    await expect(attempt).rejects.toBeInstanceOf(CommandNotFoundError);
    await expect(runCommand('manpage-test-no-such-command', [])).rejects.toMatchObject({
      command: 'manpage-test-no-such-command',
      code: 'COMMAND_NOT_FOUND',
    });
  });

  it('should throw CommandNotFoundError for a file that is not executable', async () => {
    const script = join(scratch, 'not-executable');
    writeFileSync(script, '#!/bin/sh\necho hi\n', { mode: 0o644 });

    await expect(runCommand(script, [])).rejects.toBeInstanceOf(CommandNotFoundError);
  });
});
