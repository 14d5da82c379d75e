export const PACKAGE_NAME = '@devstrap/provisioner';

export { Provisioner } from './provisioner.js';
export type { ProvisionerOptions } from './provisioner.js';
export { assertNotRoot } from './privilege.js';

export {
  createDefaultSteps,
  createNetworkCheckStep,
  createToolchainCheckStep,
  createPackageManagerStep,
  createRuntimeStep,
  createPipMirrorStep,
  createPackagesStep,
  createEditorConfigStep,
  brewPrefixExecutable,
  resolveBrew,
  XCODE_CLT,
  INSTALLER_FILENAME,
  PIP_CONFIG_DIR,
  PIP_CONFIG_FILE,
  type DefaultStepsOptions,
  type NetworkCheckOptions,
} from './steps/index.js';

export { httpHeadProbe } from './network-probe.js';
export type { NetworkProbe, ProbeResult } from './network-probe.js';
export { appendShellInit, brewShellInitLine } from './shell-profile.js';
export type { AppendOptions } from './shell-profile.js';
export {
  HELIX_CONFIG,
  HELIX_THEME,
  HELIX_THEME_NAME,
  helixDocuments,
  pipMirrorDocument,
} from './config-documents.js';

export { execFile, spawnAttached, COMMAND_NOT_FOUND } from './exec-util.js';
export type { ExecOptions } from './exec-util.js';
export { createNodeCommandRunner } from './node-command-runner.js';
export type { NodeCommandRunnerOptions } from './node-command-runner.js';
export { createNodeFs, createDryRunFs } from './node-fs.js';
