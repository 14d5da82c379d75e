import type { ProvisionStep } from '@devstrap/core';
import type { NetworkProbe } from '../network-probe.js';
import { createNetworkCheckStep } from './network-check.js';
import { createToolchainCheckStep } from './toolchain-check.js';
import { createPackageManagerStep } from './package-manager.js';
import { createRuntimeStep } from './runtime.js';
import { createPipMirrorStep } from './pip-mirror.js';
import { createPackagesStep } from './packages.js';
import { createEditorConfigStep } from './editor-config.js';

export {
  createNetworkCheckStep,
  createToolchainCheckStep,
  createPackageManagerStep,
  createRuntimeStep,
  createPipMirrorStep,
  createPackagesStep,
  createEditorConfigStep,
};
export type { NetworkCheckOptions } from './network-check.js';
export { XCODE_CLT } from './toolchain-check.js';
export { INSTALLER_FILENAME } from './runtime.js';
export { PIP_CONFIG_DIR, PIP_CONFIG_FILE } from './pip-mirror.js';
export { brewPrefixExecutable, resolveBrew } from './brew.js';

export interface DefaultStepsOptions {
  probe?: NetworkProbe;
}

/** The provisioning sequence, in execution order. */
export function createDefaultSteps(options: DefaultStepsOptions = {}): ProvisionStep[] {
  return [
    createNetworkCheckStep({ probe: options.probe }),
    createToolchainCheckStep(),
    createPackageManagerStep(),
    createRuntimeStep(),
    createPipMirrorStep(),
    createPackagesStep(),
    createEditorConfigStep(),
  ];
}
