import * as path from 'node:path';
import type { ProvisionStep, StepContext, StepResult } from '@devstrap/core';
import { ConfigWriteError, done, failed } from '@devstrap/core';
import { helixDocuments } from '../config-documents.js';

/**
 * Writes the Helix settings and theme. Existing files are overwritten
 * without a backup, so repeated runs converge on the same content.
 */
export function createEditorConfigStep(): ProvisionStep {
  return {
    id: 'editor',
    title: 'Configuring Helix',
    async run({ env, fs, logger, config }: StepContext): Promise<StepResult> {
      logger.info('Configuring Helix...');
      const dir = env.home(config.editor.configDir);

      for (const document of helixDocuments(dir)) {
        try {
          await fs.mkdir(path.dirname(document.path), { recursive: true });
          await fs.writeFile(document.path, document.content);
        } catch (err) {
          return failed(new ConfigWriteError(document.path, err));
        }
      }

      return done(`Wrote Helix configuration to ${dir}`);
    },
  };
}
