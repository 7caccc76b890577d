/**
 * FILE PURPOSE: Run an external command-line tool with a hard timeout
 *
 * WHY: file, pdftotext, gs and tesseract are all invoked the same way: with a
 *      timeout, each failure mode mapped to a ToolError kind.
 */

import { execFile } from 'node:child_process';
import { ToolError } from '../errors.js';

export interface RunToolOptions {
  timeoutMs: number;
  /** Largest stdout/stderr the tool may produce. Default: 64 MiB. */
  maxBuffer?: number;
}

export interface ToolOutput {
  stdout: string;
  stderr: string;
}

const DEFAULT_MAX_BUFFER = 64 * 1024 * 1024;

export function runTool(command: string, args: string[], options: RunToolOptions): Promise<ToolOutput> {
  return new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      {
        encoding: 'utf8',
        timeout: options.timeoutMs,
        maxBuffer: options.maxBuffer ?? DEFAULT_MAX_BUFFER,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr });
          return;
        }
        if (error.code === 'ENOENT') {
          reject(new ToolError(command, 'missing-binary', { cause: error }));
          return;
        }
        if (error.killed) {
          reject(new ToolError(command, 'timeout', { stderr, cause: error }));
          return;
        }
        reject(new ToolError(command, 'exit', {
          exitCode: typeof error.code === 'number' ? error.code : null,
          stderr,
          cause: error,
        }));
      },
    );
  });
}
