import type { DevstrapConfig } from './config.js';
import type { EnvironmentContext } from './environment.js';
import type { DevstrapError } from './errors.js';
import type { Platform } from './platform.js';
import type { CommandRunner, FileSystem, Logger } from './types.js';

export type StepId =
  | 'network'
  | 'toolchain'
  | 'package-manager'
  | 'runtime'
  | 'mirror'
  | 'packages'
  | 'editor';

export type StepResult =
  | { status: 'done' | 'skipped' | 'warned'; message: string }
  | { status: 'failed'; error: DevstrapError };

/** Everything a step may touch. */
export interface StepContext {
  env: EnvironmentContext;
  runner: CommandRunner;
  fs: FileSystem;
  logger: Logger;
  config: DevstrapConfig;
}

export interface ProvisionStep {
  readonly id: StepId;
  readonly title: string;
  run(ctx: StepContext): Promise<StepResult>;
}

export interface StepOutcome {
  id: StepId;
  title: string;
  result: StepResult;
  durationMs: number;
}

export interface ProvisionReport {
  platform: Platform;
  steps: StepOutcome[];
  exitCode: number;
  failedStep?: StepId;
}

export function done(message: string): StepResult {
  return { status: 'done', message };
}

export function skipped(message: string): StepResult {
  return { status: 'skipped', message };
}

export function warned(message: string): StepResult {
  return { status: 'warned', message };
}

export function failed(error: DevstrapError): StepResult {
  return { status: 'failed', error };
}
