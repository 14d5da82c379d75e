// Platform detection
export type { Platform } from './platform.js';
export { detectPlatform, platformIdentifier } from './platform.js';

// Error taxonomy
export {
  DevstrapError,
  PreconditionError,
  RootUserError,
  UnsupportedPlatformError,
  ToolchainMissingError,
  PermissionRepairError,
  ConfigWriteError,
  ExternalCommandError,
  ConfigError,
  StepFailedError,
  UsageError,
} from './errors.js';

// I/O seams
export type {
  Logger,
  FileSystem,
  ExecResult,
  CommandOptions,
  CommandRunner,
  ConfigDocument,
} from './types.js';

// Environment context
export { EnvironmentContext } from './environment.js';
export type { EnvironmentContextOptions } from './environment.js';
export { parseShellEnv, expandParameters } from './shell-env.js';
export type { ShellAssignment, VariableLookup } from './shell-env.js';

// Steps & results
export type {
  StepId,
  StepResult,
  StepContext,
  ProvisionStep,
  StepOutcome,
  ProvisionReport,
} from './steps.js';
export { done, skipped, warned, failed } from './steps.js';

// Configuration
export type {
  DevstrapConfig,
  NetworkConfig,
  PackageManagerConfig,
  RuntimeConfig,
  MirrorConfig,
  ShellProfileConfig,
  EditorConfig,
} from './config.js';
export { defaultConfig } from './config.js';
export { validateConfig, loadConfig, checkConfig } from './config-validator.js';
export type { ConfigValidationError, ConfigValidationResult } from './config-validator.js';
export { applyEnvOverrides } from './config-env-overlay.js';

// Utilities
export { isRecord, formatCommand } from './utils.js';
