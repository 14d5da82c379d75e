import type {
  CommandRunner,
  FileSystem,
  Logger,
  ProvisionReport,
  ProvisionStep,
} from '@devstrap/core';
import { EnvironmentContext, detectPlatform, platformIdentifier } from '@devstrap/core';
import type { NetworkProbe } from '@devstrap/provisioner';
import { Provisioner, assertNotRoot, createDefaultSteps } from '@devstrap/provisioner';
import { resolveConfig, type ConfigSource } from './config-loader.js';

export interface BootstrapOptions extends ConfigSource {
  logger: Logger;
  fs: FileSystem;
  runner: CommandRunner;
  homeDir: string;
  user: string;
  tmpDir: string;
  /** Process environment (defaults to `process.env`). */
  env?: Record<string, string | undefined>;
  /** Effective uid source (defaults to `process.geteuid`). */
  geteuid?: () => number;
  /** Platform string used when `OSTYPE` is absent (defaults to `process.platform`). */
  platform?: string;
  /** Override the reachability probe (e.g. for testing). */
  probe?: NetworkProbe;
  /** Override the step list (e.g. for testing). */
  steps?: ProvisionStep[];
}

/**
 * Provision the workstation:
 * 1. Refuse to run as root
 * 2. Resolve configuration (defaults, file, env, flags)
 * 3. Detect the platform
 * 4. Run the steps in order and return the report
 *
 * Failures before the first step throw a `DevstrapError`; step failures come
 * back in the report.
 */
export async function runDevstrap(options: BootstrapOptions): Promise<ProvisionReport> {
  const { logger, fs, runner, homeDir, user, tmpDir } = options;
  const env = options.env ?? process.env;

  // 1. Privilege guard, before anything else happens
  assertNotRoot(options.geteuid);

  // 2. Configuration
  const config = resolveConfig(options, homeDir, env, logger);

  // 3. Platform
  const platform = detectPlatform(platformIdentifier(env, options.platform));
  logger.info(`Detected OS: ${platform}`);

  // 4. Steps
  const context = new EnvironmentContext({ platform, homeDir, user, tmpDir, env });
  const provisioner = new Provisioner({
    steps: options.steps ?? createDefaultSteps({ probe: options.probe }),
    context: { env: context, runner, fs, logger, config },
  });
  return provisioner.run();
}
