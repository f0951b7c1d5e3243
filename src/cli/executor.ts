/**
 * MegaCLI process executor.
 *
 * Runs the MegaCLI binary with an argument vector (no shell), waits for it to
 * exit and returns the normalized stdout lines. Every invocation gets -NoLog so
 * MegaCLI does not drop MegaSAS.log into the working directory.
 */

import * as fs from 'fs';
import * as os from 'os';
import { execFile } from 'child_process';
import { McpToolError, ErrorCode, CommandError } from '../types/common.js';
import { normalizeOutput, formatCommand } from './output.js';

export const DEFAULT_CLI_PATH = '/opt/MegaRAID/MegaCli/MegaCli64';
export const DEFAULT_TIMEOUT_MS = 60_000;
const MAX_BUFFER_BYTES = 32 * 1024 * 1024;

/** Shell convention for a process killed by a signal: 128 + signal number */
export function signalExitCode(signal: string): number {
  const signo = Object.entries(os.constants.signals).find(([name]) => name === signal)?.[1];
  return 128 + (signo ?? 0);
}

export interface CommandOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Spawns `file` with `args` and resolves once it exits, whatever the exit code.
 * Rejects only when the process could not be run at all.
 */
export type CommandRunner = (
  file: string,
  args: readonly string[],
  timeoutMs: number
) => Promise<CommandOutput>;

export interface ExecutorOptions {
  timeout_ms?: number;
  runner?: CommandRunner;
}

export const execFileRunner: CommandRunner = (file, args, timeoutMs) =>
  new Promise((resolve, reject) => {
    execFile(
      file,
      [...args],
      { timeout: timeoutMs, maxBuffer: MAX_BUFFER_BYTES, encoding: 'utf8' },
      (err, stdout, stderr) => {
        if (!err) {
          resolve({ stdout, stderr, exitCode: 0 });
          return;
        }
        // execFile kills the child on overflow too, so this check comes before `killed`
        if (err.code === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER') {
          reject(new McpToolError(
            ErrorCode.INTERNAL,
            `${formatCommand([file, ...args])} produced more than ${MAX_BUFFER_BYTES} bytes of output`
          ));
          return;
        }
        if (err.killed) {
          reject(new McpToolError(
            ErrorCode.TIMEOUT,
            `${formatCommand([file, ...args])} did not finish within ${timeoutMs}ms`
          ));
          return;
        }
        // Numeric code = the process ran and exited non-zero; anything else is a spawn failure
        if (typeof err.code === 'number') {
          resolve({ stdout, stderr, exitCode: err.code });
          return;
        }
        if (err.signal) {
          resolve({ stdout, stderr: stderr || `terminated by ${err.signal}`, exitCode: signalExitCode(err.signal) });
          return;
        }
        reject(err);
      }
    );
  });

export class MegaCliExecutor {
  readonly timeoutMs: number;
  private readonly runner: CommandRunner;

  constructor(readonly cliPath: string = DEFAULT_CLI_PATH, options: ExecutorOptions = {}) {
    if (!fs.existsSync(cliPath)) {
      throw new McpToolError(ErrorCode.PRECONDITION_FAILED, `${cliPath} not found`);
    }
    this.timeoutMs = options.timeout_ms ?? DEFAULT_TIMEOUT_MS;
    this.runner = options.runner ?? execFileRunner;
  }

  /**
   * Run MegaCLI and return its normalized output lines.
   * Throws CommandError on a non-zero exit status.
   */
  async execute(args: readonly string[]): Promise<string[]> {
    const { stdout, stderr, exitCode } = await this.runner(
      this.cliPath,
      [...args, '-NoLog'],
      this.timeoutMs
    );
    if (exitCode !== 0) {
      throw new CommandError(exitCode, stderr.trimEnd());
    }
    return normalizeOutput(stdout);
  }
}
