import * as path from 'node:path';
import type { Platform } from './platform.js';
import type { FileSystem } from './types.js';
import { parseShellEnv, type ShellAssignment } from './shell-env.js';

export interface EnvironmentContextOptions {
  platform: Platform;
  homeDir: string;
  user: string;
  tmpDir: string;
  env: Record<string, string | undefined>;
}

/**
 * The process environment as the provisioning run sees it.
 *
 * Steps read and update this object instead of `process.env`; once an
 * installer puts a new directory on `PATH`, every later step and every child
 * process launched with {@link EnvironmentContext.env} observes it.
 */
export class EnvironmentContext {
  readonly platform: Platform;
  readonly homeDir: string;
  readonly user: string;
  readonly tmpDir: string;
  private readonly vars = new Map<string, string>();

  constructor(options: EnvironmentContextOptions) {
    this.platform = options.platform;
    this.homeDir = options.homeDir;
    this.user = options.user;
    this.tmpDir = options.tmpDir;
    for (const [key, value] of Object.entries(options.env)) {
      if (value !== undefined) this.vars.set(key, value);
    }
  }

  get(name: string): string | undefined {
    return this.vars.get(name);
  }

  set(name: string, value: string): void {
    this.vars.set(name, value);
  }

  /** Snapshot suitable for a child process. */
  get env(): Record<string, string> {
    return Object.fromEntries(this.vars);
  }

  get searchPath(): string[] {
    return (this.vars.get('PATH') ?? '').split(path.delimiter).filter((dir) => dir !== '');
  }

  /** Put `dir` first on `PATH`, dropping any later occurrence of it. */
  prependPath(dir: string): void {
    const rest = this.searchPath.filter((entry) => entry !== dir);
    this.vars.set('PATH', [dir, ...rest].join(path.delimiter));
  }

  /** Evaluate `export` lines (as printed by `brew shellenv`) into this context. */
  applyShellEnv(script: string): ShellAssignment[] {
    const assignments = parseShellEnv(script, (name) => this.vars.get(name));
    for (const { name, value } of assignments) {
      this.vars.set(name, value);
    }
    return assignments;
  }

  /** Resolve an executable on the current search path. Not cached. */
  async which(
    name: string,
    fs: Pick<FileSystem, 'isExecutable'>,
  ): Promise<string | undefined> {
    for (const dir of this.searchPath) {
      const candidate = path.join(dir, name);
      if (await fs.isExecutable(candidate)) return candidate;
    }
    return undefined;
  }

  /** Join `segments` onto the home directory. */
  home(...segments: string[]): string {
    return path.join(this.homeDir, ...segments);
  }
}
