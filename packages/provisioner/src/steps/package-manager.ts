import * as path from 'node:path';
import type { ProvisionStep, StepContext, StepResult } from '@devstrap/core';
import { ExternalCommandError, done, failed, formatCommand, skipped } from '@devstrap/core';
import { appendShellInit, brewShellInitLine } from '../shell-profile.js';
import { brewPrefixExecutable } from './brew.js';

/**
 * Installs Homebrew when `brew` is not on the search path, registers it in
 * the shell profile, loads its environment into the run and refreshes its
 * metadata.
 */
export function createPackageManagerStep(): ProvisionStep {
  return {
    id: 'package-manager',
    title: 'Installing Homebrew',
    async run(ctx: StepContext): Promise<StepResult> {
      const { env, runner, fs, logger, config } = ctx;

      const existing = await env.which('brew', fs);
      if (existing) {
        logger.info('Homebrew already installed');
        return skipped(`Homebrew already installed at ${existing}`);
      }

      logger.info('Installing Homebrew...');
      const { installScriptUrl } = config.packageManager;
      const download = await runner.capture('curl', ['-fsSL', installScriptUrl], { env: env.env });
      if (download.exitCode !== 0) {
        return failed(
          new ExternalCommandError(
            formatCommand('curl', ['-fsSL', installScriptUrl]),
            download.exitCode,
            download.stderr.trim(),
          ),
        );
      }

      const installExit = await runner.run('/bin/bash', ['-c', download.stdout], { env: env.env });
      if (installExit !== 0) {
        return failed(new ExternalCommandError('Homebrew install script', installExit));
      }

      const brew = brewPrefixExecutable(ctx);
      const profile = env.home(config.shellProfile.files[env.platform]);
      const appended = await appendShellInit(fs, profile, brewShellInitLine(brew), {
        dedupe: config.shellProfile.dedupe,
      });
      logger.info(
        appended ? `Added Homebrew to PATH in ${profile}` : `${profile} already loads Homebrew`,
      );

      // Ask for bash syntax whatever $SHELL is; fish output has no `export` lines.
      const shellenvArgs = ['shellenv', 'bash'];
      const shellenv = await runner.capture(brew, shellenvArgs, { env: env.env });
      if (shellenv.exitCode !== 0) {
        return failed(
          new ExternalCommandError(
            formatCommand(brew, shellenvArgs),
            shellenv.exitCode,
            shellenv.stderr.trim(),
          ),
        );
      }
      const assignments = env.applyShellEnv(shellenv.stdout);
      logger.debug(`Loaded ${assignments.length} variable(s) from brew shellenv`);

      // On macOS PATH comes from an `eval` of path_helper, which is not evaluated here.
      const prefix = config.packageManager.prefix[env.platform];
      env.prependPath(path.join(prefix, 'sbin'));
      env.prependPath(path.join(prefix, 'bin'));

      const updateExit = await runner.run(brew, ['update'], { env: env.env });
      if (updateExit !== 0) {
        return failed(new ExternalCommandError(formatCommand(brew, ['update']), updateExit));
      }

      return done(`Homebrew installed at ${brew}`);
    },
  };
}
