/**
 * Process Runner Port Interface
 *
 * Runs a fixed external command and reports its exit status and output.
 * A runner never throws for a non-zero exit; a command that cannot be
 * started at all is reported with a non-zero exit code as well.
 */

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface ProcessRunner {
  run(command: string, args: string[], options?: { cwd?: string }): Promise<ProcessResult>;
}
