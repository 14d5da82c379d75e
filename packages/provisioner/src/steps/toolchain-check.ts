import type { ProvisionStep, StepContext, StepResult } from '@devstrap/core';
import { ToolchainMissingError, done, failed, skipped } from '@devstrap/core';

export const XCODE_CLT = 'Xcode Command Line Tools';

/**
 * macOS needs the Xcode Command Line Tools before Homebrew can build
 * anything. When they are missing the interactive installer is started and
 * the run stops; the user reruns devstrap once the installer has finished.
 */
export function createToolchainCheckStep(): ProvisionStep {
  return {
    id: 'toolchain',
    title: `Checking ${XCODE_CLT}`,
    async run({ env, runner, logger }: StepContext): Promise<StepResult> {
      if (env.platform !== 'macOS') {
        return skipped(`${XCODE_CLT} are only required on macOS`);
      }

      const probe = await runner.capture('xcode-select', ['-p'], { env: env.env, readOnly: true });
      if (probe.exitCode === 0) {
        return done(`${XCODE_CLT} found at ${probe.stdout.trim()}`);
      }

      logger.info(`${XCODE_CLT} are not installed. Installing them now...`);
      const exitCode = await runner.run('xcode-select', ['--install'], { env: env.env });
      if (exitCode !== 0) {
        // Already prompting, or installed through another channel meanwhile.
        logger.debug(`xcode-select --install exited with ${exitCode}`);
      }
      return failed(new ToolchainMissingError(XCODE_CLT));
    },
  };
}
