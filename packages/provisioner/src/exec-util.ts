import { execFile as cpExecFile, spawn } from 'node:child_process';
import type { ExecResult } from '@devstrap/core';

/** Exit status the shell reports for a command it cannot find. */
export const COMMAND_NOT_FOUND = 127;

export interface ExecOptions {
  timeout?: number;
  cwd?: string;
  env?: Record<string, string>;
}

/**
 * Promise wrapper for child_process.execFile with timeout support.
 *
 * On success the exit code is 0.  On failure (non-zero exit, signal, or
 * timeout) the promise still resolves with whatever stdout/stderr was
 * captured so callers can inspect output without catching.
 */
export function execFile(
  command: string,
  args: string[],
  options?: ExecOptions,
): Promise<ExecResult> {
  return new Promise((resolve) => {
    cpExecFile(
      command,
      args,
      {
        timeout: options?.timeout,
        cwd: options?.cwd,
        env: options?.env,
        maxBuffer: 10 * 1024 * 1024, // 10 MiB
      },
      (error, stdout, stderr) => {
        if (error) {
          // A numeric `code` is the child's exit status; `ENOENT` means the
          // executable was not found; anything else (signal, timeout) is 1.
          const code: unknown = error.code;
          const exitCode =
            typeof code === 'number' ? code : code === 'ENOENT' ? COMMAND_NOT_FOUND : 1;
          resolve({ stdout: stdout ?? '', stderr: stderr ?? '', exitCode });
          return;
        }
        resolve({ stdout: stdout ?? '', stderr: stderr ?? '', exitCode: 0 });
      },
    );
  });
}

/**
 * Run a command attached to the terminal and resolve with its exit code.
 * SIGINT and SIGTERM report 130 and 143, as a shell would.
 */
export function spawnAttached(
  command: string,
  args: string[],
  options?: ExecOptions,
): Promise<number> {
  return new Promise((resolve) => {
    const child = spawn(command, args, {
      cwd: options?.cwd,
      env: options?.env,
      stdio: 'inherit',
      timeout: options?.timeout,
    });

    child.on('error', (error: NodeJS.ErrnoException) => {
      resolve(error.code === 'ENOENT' ? COMMAND_NOT_FOUND : 1);
    });

    child.on('close', (code, signal) => {
      if (code !== null) {
        resolve(code);
        return;
      }
      resolve(signal === 'SIGINT' ? 130 : signal === 'SIGTERM' ? 143 : 1);
    });
  });
}
