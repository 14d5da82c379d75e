import type { FileSystem } from '@devstrap/core';

export interface AppendOptions {
  /** Leave the profile alone when it already contains the exact line. */
  dedupe: boolean;
}

/** The line that makes an interactive shell pick up Homebrew. */
export function brewShellInitLine(brewPath: string): string {
  return `eval "$(${brewPath} shellenv)"`;
}

/**
 * Append `line` to the shell profile at `profilePath`, creating the file if
 * needed. Never rewrites existing content.
 *
 * Without `dedupe` every call appends, so repeated installs accumulate
 * copies of the line.
 *
 * @returns Whether the line was appended.
 */
export async function appendShellInit(
  fs: FileSystem,
  profilePath: string,
  line: string,
  options: AppendOptions,
): Promise<boolean> {
  const existing = (await fs.exists(profilePath)) ? await fs.readFile(profilePath) : '';

  if (options.dedupe && existing.split('\n').some((l) => l.trim() === line)) {
    return false;
  }

  const separator = existing !== '' && !existing.endsWith('\n') ? '\n' : '';
  await fs.appendFile(profilePath, `${separator}${line}\n`);
  return true;
}
