import * as path from 'node:path';
import type { ProvisionStep, StepContext, StepResult } from '@devstrap/core';
import { ExternalCommandError, done, failed, formatCommand, skipped } from '@devstrap/core';

export const INSTALLER_FILENAME = 'miniconda.sh';

/**
 * Installs Miniconda into the home directory when `conda` is not on the
 * search path: download the platform installer, run it in batch mode,
 * delete it, then let conda hook itself into the shell.
 */
export function createRuntimeStep(): ProvisionStep {
  return {
    id: 'runtime',
    title: 'Installing Miniconda',
    async run({ env, runner, fs, logger, config }: StepContext): Promise<StepResult> {
      const existing = await env.which('conda', fs);
      if (existing) {
        logger.info('Miniconda already installed');
        return skipped(`Miniconda already installed at ${existing}`);
      }

      logger.info('Installing Miniconda...');
      const url = config.runtime.installerUrls[env.platform];
      const installer = path.join(env.tmpDir, INSTALLER_FILENAME);
      const prefix = env.home(config.runtime.installDir);

      try {
        const downloadArgs = ['-fL', url, '-o', installer];
        const downloadExit = await runner.run('curl', downloadArgs, { env: env.env });
        if (downloadExit !== 0) {
          return failed(new ExternalCommandError(formatCommand('curl', downloadArgs), downloadExit));
        }

        const installArgs = [installer, '-b', '-p', prefix];
        const installExit = await runner.run('bash', installArgs, { env: env.env });
        if (installExit !== 0) {
          return failed(new ExternalCommandError(formatCommand('bash', installArgs), installExit));
        }
      } finally {
        await fs.remove(installer);
      }

      const conda = path.join(prefix, 'bin', 'conda');
      const initExit = await runner.run(conda, ['init'], { env: env.env });
      if (initExit !== 0) {
        return failed(new ExternalCommandError(formatCommand(conda, ['init']), initExit));
      }

      env.prependPath(path.join(prefix, 'bin'));
      return done(`Miniconda installed in ${prefix}`);
    },
  };
}
