export const PACKAGE_NAME = '@devstrap/app';
export const VERSION = '0.1.0';

export { runDevstrap } from './bootstrap.js';
export type { BootstrapOptions } from './bootstrap.js';
export { resolveConfig, DEFAULT_CONFIG_FILE } from './config-loader.js';
export type { ConfigSource } from './config-loader.js';
export { parseCliArgs, HELP_TEXT } from './cli.js';
export type { CliOptions } from './cli.js';
export { createConsoleLogger } from './logger.js';
export type { ConsoleLoggerOptions } from './logger.js';
