#!/usr/bin/env node
import * as os from 'node:os';
import { DevstrapError } from '@devstrap/core';
import {
  createDryRunFs,
  createNodeCommandRunner,
  createNodeFs,
} from '@devstrap/provisioner';
import { runDevstrap } from './bootstrap.js';
import { HELP_TEXT, parseCliArgs } from './cli.js';
import { VERSION } from './index.js';
import { createConsoleLogger } from './logger.js';

function currentUser(): string {
  try {
    return os.userInfo().username;
  } catch {
    return process.env['USER'] ?? 'your-user';
  }
}

async function main(): Promise<number> {
  const cli = parseCliArgs(process.argv.slice(2));
  if (cli.help) {
    console.log(HELP_TEXT);
    return 0;
  }
  if (cli.version) {
    console.log(VERSION);
    return 0;
  }

  const logger = createConsoleLogger({ verbose: cli.verbose });
  const nodeFs = createNodeFs();

  const report = await runDevstrap({
    configPath: cli.configPath,
    withMirror: cli.withMirror,
    logger,
    fs: cli.dryRun ? createDryRunFs(nodeFs, logger) : nodeFs,
    runner: createNodeCommandRunner({ logger, dryRun: cli.dryRun }),
    homeDir: os.homedir(),
    user: currentUser(),
    tmpDir: os.tmpdir(),
  });
  return report.exitCode;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    if (err instanceof DevstrapError) {
      console.error(`[ERROR] ${err.message}`);
      process.exitCode = err.exitCode;
      return;
    }
    console.error('Fatal:', err);
    process.exitCode = 1;
  },
);
