import * as path from 'node:path';
import type { ProvisionStep, StepContext, StepResult } from '@devstrap/core';
import { ConfigWriteError, PermissionRepairError, done, failed, skipped } from '@devstrap/core';
import { pipMirrorDocument } from '../config-documents.js';

export const PIP_CONFIG_DIR = '.pip';
export const PIP_CONFIG_FILE = 'pip.conf';

/**
 * Points pip at a package-index mirror. Dormant unless `mirror.enabled`
 * (or `--with-mirror`) turns it on.
 */
export function createPipMirrorStep(): ProvisionStep {
  return {
    id: 'mirror',
    title: 'Configuring pip mirror',
    async run({ env, fs, logger, config }: StepContext): Promise<StepResult> {
      if (!config.mirror.enabled) {
        return skipped('pip mirror configuration disabled');
      }

      logger.info('Configuring pip to use the package-index mirror...');
      const dir = env.home(PIP_CONFIG_DIR);
      const file = path.join(dir, PIP_CONFIG_FILE);

      if ((await fs.isDirectory(dir)) && !(await fs.isWritable(dir))) {
        logger.info(`Fixing permissions for ${dir}...`);
        try {
          await fs.makeWritable(dir, { recursive: true });
        } catch (err) {
          return failed(new PermissionRepairError(dir, env.user, err));
        }
        if (!(await fs.isWritable(dir))) {
          return failed(new PermissionRepairError(dir, env.user));
        }
      }

      const document = pipMirrorDocument(file, config.mirror.indexUrl, config.mirror.trustedHost);
      try {
        await fs.mkdir(dir, { recursive: true });
        await fs.writeFile(document.path, document.content);
      } catch (err) {
        return failed(new ConfigWriteError(file, err));
      }

      return done(`Wrote ${file}`);
    },
  };
}
