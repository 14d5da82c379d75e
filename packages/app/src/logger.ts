import type { Logger } from '@devstrap/core';

export interface ConsoleLoggerOptions {
  verbose?: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  return {
    info: (msg: string, ...args: unknown[]) => console.log(`[INFO] ${msg}`, ...args),
    warn: (msg: string, ...args: unknown[]) => console.warn(`[WARN] ${msg}`, ...args),
    error: (msg: string, ...args: unknown[]) => console.error(`[ERROR] ${msg}`, ...args),
    debug: (msg: string, ...args: unknown[]) => {
      if (options.verbose) console.debug(`[DEBUG] ${msg}`, ...args);
    },
  };
}
