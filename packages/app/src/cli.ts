import { parseArgs } from 'node:util';
import { UsageError } from '@devstrap/core';

export interface CliOptions {
  configPath?: string;
  dryRun: boolean;
  withMirror: boolean;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

export const HELP_TEXT = `Usage: devstrap [options]

Bootstrap a developer workstation: Homebrew, Miniconda, helix, fish, tmux
and the Helix editor configuration.

Options:
  --config <path>  JSON5 configuration file (default ~/.config/devstrap/config.json5)
  --dry-run        Print the commands and file writes instead of performing them
  --with-mirror    Also point pip at the configured package-index mirror
  --verbose        Print debug output
  -h, --help       Show this help
  -v, --version    Show the version`;

/**
 * Parse the command line.
 *
 * @throws UsageError for unknown options or stray arguments.
 */
export function parseCliArgs(argv: string[]): CliOptions {
  let parsed: ReturnType<typeof parse>;
  try {
    parsed = parse(argv);
  } catch (err) {
    throw new UsageError(`${err instanceof Error ? err.message : String(err)}\n\n${HELP_TEXT}`);
  }

  const { values } = parsed;
  return {
    configPath: values.config,
    dryRun: values['dry-run'] ?? false,
    withMirror: values['with-mirror'] ?? false,
    verbose: values.verbose ?? false,
    help: values.help ?? false,
    version: values.version ?? false,
  };
}

function parse(argv: string[]) {
  return parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      config: { type: 'string' },
      'dry-run': { type: 'boolean' },
      'with-mirror': { type: 'boolean' },
      verbose: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
    },
  });
}
