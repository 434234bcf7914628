/**
 * execFile Process Adapter (Default)
 */

import { execFile } from 'child_process';
import { promisify } from 'util';

import type { ProcessResult, ProcessRunner } from './process.js';

const execFileAsync = promisify(execFile);

interface ExecFailure {
  code?: number | string;
  stdout?: string;
  stderr?: string;
  message?: string;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return typeof error === 'object' && error !== null;
}

export const execProcessRunner: ProcessRunner = {
  async run(command: string, args: string[], options: { cwd?: string } = {}): Promise<ProcessResult> {
    try {
      const { stdout, stderr } = await execFileAsync(command, args, {
        cwd: options.cwd,
        encoding: 'utf8',
        windowsHide: true
      });
      return { exitCode: 0, stdout, stderr };
    } catch (error) {
      if (!isExecFailure(error)) {
        return { exitCode: 1, stdout: '', stderr: String(error) };
      }
      // ENOENT and friends arrive as string codes: the tool could not be started
      const exitCode = typeof error.code === 'number' ? error.code : 127;
      return {
        exitCode,
        stdout: error.stdout ?? '',
        stderr: error.stderr ?? error.message ?? ''
      };
    }
  }
};
