import type { ProvisionStep, StepContext, StepResult } from '@devstrap/core';
import { ExternalCommandError, done, failed, formatCommand } from '@devstrap/core';
import { resolveBrew } from './brew.js';

function listNames(names: readonly string[]): string {
  if (names.length <= 1) return names.join('');
  return `${names.slice(0, -1).join(', ')} and ${names[names.length - 1]}`;
}

/** Installs the configured packages with one `brew install` call. */
export function createPackagesStep(): ProvisionStep {
  return {
    id: 'packages',
    title: 'Installing packages',
    async run(ctx: StepContext): Promise<StepResult> {
      const { env, runner, logger, config } = ctx;
      const packages = config.packages;
      const brew = await resolveBrew(ctx);

      logger.info(`Installing ${listNames(packages)}...`);
      const args = ['install', ...packages];
      const exitCode = await runner.run(brew, args, { env: env.env });
      if (exitCode !== 0) {
        return failed(new ExternalCommandError(formatCommand('brew', args), exitCode));
      }

      return done(`Installed ${packages.join(', ')}`);
    },
  };
}
