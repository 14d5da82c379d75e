import type {
  ProvisionReport,
  ProvisionStep,
  StepContext,
  StepOutcome,
  StepResult,
} from '@devstrap/core';
import { DevstrapError, StepFailedError, failed } from '@devstrap/core';

export interface ProvisionerOptions {
  steps: ProvisionStep[];
  context: StepContext;
  /** Clock for step durations (injectable for tests). */
  now?: () => number;
}

/**
 * Runs the provisioning steps strictly in order. The first failed step ends
 * the run: nothing after it executes and nothing before it is undone.
 */
export class Provisioner {
  private readonly steps: ProvisionStep[];
  private readonly context: StepContext;
  private readonly now: () => number;

  constructor(options: ProvisionerOptions) {
    this.steps = options.steps;
    this.context = options.context;
    this.now = options.now ?? Date.now;
  }

  async run(): Promise<ProvisionReport> {
    const { env, logger } = this.context;
    const outcomes: StepOutcome[] = [];

    for (const [index, step] of this.steps.entries()) {
      logger.info(`[${index + 1}/${this.steps.length}] ${step.title}`);
      const started = this.now();
      const result = await this.runStep(step);
      outcomes.push({ id: step.id, title: step.title, result, durationMs: this.now() - started });

      if (result.status === 'failed') {
        logger.error(result.error.message);
        return {
          platform: env.platform,
          steps: outcomes,
          exitCode: result.error.exitCode,
          failedStep: step.id,
        };
      }
      logger.debug(`${step.id}: ${result.status} (${result.message})`);
    }

    await this.printCompletion();
    return { platform: env.platform, steps: outcomes, exitCode: 0 };
  }

  private async runStep(step: ProvisionStep): Promise<StepResult> {
    try {
      return await step.run(this.context);
    } catch (err) {
      return failed(err instanceof DevstrapError ? err : new StepFailedError(step.id, err));
    }
  }

  private async printCompletion(): Promise<void> {
    const { env, fs, logger, config } = this.context;
    const profile = env.home(config.shellProfile.files[env.platform]);
    const fish = (await env.which('fish', fs)) ?? 'fish';

    logger.info(
      'Setup complete! Please restart your terminal or source your shell configuration file.',
    );
    logger.info(`On ${env.platform}, run 'source ${profile}' to load Homebrew in this shell.`);
    logger.info(
      `To use Fish shell, run 'fish' or set it as your default shell with 'chsh -s ${fish}'`,
    );
  }
}
