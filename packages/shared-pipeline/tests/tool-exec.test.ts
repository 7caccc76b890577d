import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockExecFile = vi.fn();
vi.mock('node:child_process', () => ({
  execFile: (...args: unknown[]) => mockExecFile(...args),
}));

import { runTool } from '../src/tools/exec.js';
import { ToolError } from '../src/errors.js';

type ExecCallback = (error: Error | null, stdout: string, stderr: string) => void;

function respond(error: Error | null, stdout: string, stderr: string): void {
  mockExecFile.mockImplementation((_cmd: string, _args: string[], _opts: object, callback: ExecCallback) => {
    callback(error, stdout, stderr);
  });
}

describe('runTool', () => {
  beforeEach(() => {
    mockExecFile.mockReset();
  });

  it('resolves with stdout and stderr', async () => {
    respond(null, 'Glucose 5.4\n', '');

    await expect(runTool('pdftotext', ['/data/a.pdf', '-'], { timeoutMs: 1000 }))
      .resolves.toEqual({ stdout: 'Glucose 5.4\n', stderr: '' });
  });

  it('passes the timeout, encoding and buffer limit to execFile', async () => {
    respond(null, '', '');
    await runTool('gs', ['-q'], { timeoutMs: 2500, maxBuffer: 1024 });

    expect(mockExecFile).toHaveBeenCalledWith(
      'gs',
      ['-q'],
      { encoding: 'utf8', timeout: 2500, maxBuffer: 1024 },
      expect.any(Function),
    );
  });

  it('defaults the buffer limit to 64 MiB', async () => {
    respond(null, '', '');
    await runTool('file', ['--brief'], { timeoutMs: 1000 });

    expect(mockExecFile.mock.calls[0]?.[2]).toMatchObject({ maxBuffer: 64 * 1024 * 1024 });
  });

  it('reports a missing binary', async () => {
    respond(Object.assign(new Error('spawn tesseract ENOENT'), { code: 'ENOENT' }), '', '');

    const error = await runTool('tesseract', [], { timeoutMs: 1000 }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ToolError);
    expect(error).toMatchObject({ kind: 'missing-binary', command: 'tesseract', message: 'tesseract binary not found' });
  });

  it('reports a timeout when the process was killed', async () => {
    respond(Object.assign(new Error('Command failed'), { killed: true, signal: 'SIGTERM' }), '', 'page 3 of 40');

    await expect(runTool('gs', [], { timeoutMs: 10 })).rejects.toMatchObject({
      kind: 'timeout',
      message: 'gs timed out',
      stderr: 'page 3 of 40',
    });
  });

  it('reports a non-zero exit with its code and stderr', async () => {
    respond(Object.assign(new Error('Command failed'), { code: 1 }), '', 'Syntax Error: Couldn\'t find trailer');

    await expect(runTool('pdftotext', [], { timeoutMs: 1000 })).rejects.toMatchObject({
      kind: 'exit',
      exitCode: 1,
      message: 'pdftotext exited with code 1',
      stderr: 'Syntax Error: Couldn\'t find trailer',
    });
  });
});
