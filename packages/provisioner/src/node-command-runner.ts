import type { CommandOptions, CommandRunner, ExecResult, Logger } from '@devstrap/core';
import { formatCommand } from '@devstrap/core';
import { execFile, spawnAttached } from './exec-util.js';

export interface NodeCommandRunnerOptions {
  logger: Logger;
  /** Log mutating commands instead of executing them. */
  dryRun?: boolean;
}

/** {@link CommandRunner} backed by `node:child_process`. */
export function createNodeCommandRunner(options: NodeCommandRunnerOptions): CommandRunner {
  const { logger, dryRun = false } = options;

  const skip = (command: string, args: string[], opts?: CommandOptions): boolean => {
    if (!dryRun || opts?.readOnly) return false;
    logger.info(`[dry-run] ${formatCommand(command, args)}`);
    return true;
  };

  return {
    async capture(command: string, args: string[], opts?: CommandOptions): Promise<ExecResult> {
      if (skip(command, args, opts)) return { stdout: '', stderr: '', exitCode: 0 };
      logger.debug(`$ ${formatCommand(command, args)}`);
      return execFile(command, args, opts);
    },

    async run(command: string, args: string[], opts?: CommandOptions): Promise<number> {
      if (skip(command, args, opts)) return 0;
      logger.debug(`$ ${formatCommand(command, args)}`);
      return spawnAttached(command, args, opts);
    },
  };
}
