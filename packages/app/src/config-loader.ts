import { existsSync } from 'node:fs';
import * as path from 'node:path';
import type { DevstrapConfig, Logger } from '@devstrap/core';
import {
  ConfigError,
  applyEnvOverrides,
  checkConfig,
  defaultConfig,
  loadConfig,
} from '@devstrap/core';

export interface ConfigSource {
  /** Config file named by `--config` or `DEVSTRAP_CONFIG`. */
  configPath?: string;
  /** Force the dormant pip mirror step on for this run. */
  withMirror?: boolean;
}

/** Default config file location, relative to the home directory. */
export const DEFAULT_CONFIG_FILE = path.join('.config', 'devstrap', 'config.json5');

/**
 * Build the run's configuration: built-in defaults, then the JSON5 file,
 * then `DEVSTRAP_*` environment overrides, then CLI flags.
 *
 * A missing default file is fine; a missing or invalid file the user named
 * explicitly is a {@link ConfigError}.
 */
export function resolveConfig(
  source: ConfigSource,
  homeDir: string,
  env: Record<string, string | undefined>,
  logger: Logger,
): DevstrapConfig {
  const explicitPath = source.configPath ?? env['DEVSTRAP_CONFIG'];
  const filePath = explicitPath ?? path.join(homeDir, DEFAULT_CONFIG_FILE);

  let config = defaultConfig();
  if (explicitPath !== undefined || existsSync(filePath)) {
    const result = loadConfig(filePath);
    if (!result.valid || !result.config) {
      const errorMessages = result.errors
        .map((e) => (e.path ? `${e.path}: ${e.message}` : e.message))
        .join('; ');
      throw new ConfigError(`Invalid configuration in ${filePath}: ${errorMessages}`);
    }
    config = result.config;
    logger.debug(`Loaded configuration from ${filePath}`);
  }

  for (const name of applyEnvOverrides(config, env)) {
    logger.debug(`Ignoring ${name}: no such configuration key`);
  }

  if (source.withMirror) {
    config.mirror.enabled = true;
  }

  const errors = checkConfig(config);
  if (errors.length > 0) {
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${errorMessages}`);
  }

  return config;
}
