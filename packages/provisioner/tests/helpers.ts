import * as path from 'node:path';
import type {
  CommandOptions,
  CommandRunner,
  DevstrapConfig,
  ExecResult,
  FileSystem,
  Logger,
  Platform,
  StepContext,
} from '@devstrap/core';
import { EnvironmentContext, defaultConfig } from '@devstrap/core';

export const HOME = '/home/dev';
export const TMP = '/tmp';

// ── In-memory filesystem ─────────────────────────────────────────────

export interface MemoryFs extends FileSystem {
  files: Map<string, string>;
  dirs: Set<string>;
  executables: Set<string>;
  /** Paths whose write permission is missing. */
  readOnly: Set<string>;
  /** `makeWritable` throws. */
  failChmod: boolean;
  /** `makeWritable` succeeds but changes nothing (e.g. foreign owner). */
  chmodHasNoEffect: boolean;
  addExecutable(filePath: string): void;
}

function enoent(p: string): Error {
  return Object.assign(new Error(`ENOENT: no such file or directory, '${p}'`), { code: 'ENOENT' });
}

function eacces(p: string): Error {
  return Object.assign(new Error(`EACCES: permission denied, '${p}'`), { code: 'EACCES' });
}

function ancestors(p: string): string[] {
  const out: string[] = [];
  let current = p;
  while (current !== path.dirname(current)) {
    out.push(current);
    current = path.dirname(current);
  }
  out.push(current);
  return out;
}

/** In-memory FileSystem implementation for testing. */
export function createMemoryFs(initialDirs: string[] = [HOME, TMP]): MemoryFs {
  const files = new Map<string, string>();
  const dirs = new Set<string>();
  const executables = new Set<string>();
  const readOnly = new Set<string>();

  const addDir = (p: string): void => {
    for (const dir of ancestors(p)) dirs.add(dir);
  };
  initialDirs.forEach(addDir);

  const assertWritableParent = (p: string): void => {
    const parent = path.dirname(p);
    if (!dirs.has(parent)) throw enoent(p);
    if (readOnly.has(parent) || readOnly.has(p)) throw eacces(p);
  };

  const memFs: MemoryFs = {
    files,
    dirs,
    executables,
    readOnly,
    failChmod: false,
    chmodHasNoEffect: false,

    addExecutable(filePath: string): void {
      addDir(path.dirname(filePath));
      files.set(filePath, '#!/bin/sh\n');
      executables.add(filePath);
    },

    async readFile(p: string): Promise<string> {
      const content = files.get(p);
      if (content === undefined) throw enoent(p);
      return content;
    },
    async writeFile(p: string, content: string): Promise<void> {
      assertWritableParent(p);
      files.set(p, content);
    },
    async appendFile(p: string, content: string): Promise<void> {
      assertWritableParent(p);
      files.set(p, (files.get(p) ?? '') + content);
    },
    async mkdir(p: string, options?: { recursive?: boolean }): Promise<void> {
      if (dirs.has(p)) {
        if (options?.recursive) return;
        throw Object.assign(new Error(`EEXIST: ${p}`), { code: 'EEXIST' });
      }
      if (!options?.recursive) {
        assertWritableParent(p);
        dirs.add(p);
        return;
      }
      addDir(p);
    },
    async exists(p: string): Promise<boolean> {
      return files.has(p) || dirs.has(p);
    },
    async isDirectory(p: string): Promise<boolean> {
      return dirs.has(p);
    },
    async isWritable(p: string): Promise<boolean> {
      return (files.has(p) || dirs.has(p)) && !readOnly.has(p);
    },
    async isExecutable(p: string): Promise<boolean> {
      return executables.has(p);
    },
    async makeWritable(p: string, options?: { recursive?: boolean }): Promise<void> {
      if (memFs.failChmod) throw Object.assign(new Error(`EPERM: ${p}`), { code: 'EPERM' });
      if (memFs.chmodHasNoEffect) return;
      for (const entry of [...readOnly]) {
        if (entry === p || (options?.recursive && entry.startsWith(`${p}/`))) {
          readOnly.delete(entry);
        }
      }
    },
    async remove(p: string): Promise<void> {
      files.delete(p);
      executables.delete(p);
    },
  };

  return memFs;
}

// ── Scripted command runner ──────────────────────────────────────────

export interface RecordedCall {
  mode: 'capture' | 'run';
  command: string;
  args: string[];
  options?: CommandOptions;
}

/** Reply for a call: an ExecResult for `capture`, an exit code for `run`. */
export type CommandHandler = (
  call: RecordedCall,
) => Partial<ExecResult> | number | undefined | Promise<Partial<ExecResult> | number | undefined>;

export interface ScriptedRunner extends CommandRunner {
  calls: RecordedCall[];
  /** Calls rendered as `command arg arg` for compact assertions. */
  commandLines(): string[];
}

export function createScriptedRunner(handler: CommandHandler = () => undefined): ScriptedRunner {
  const calls: RecordedCall[] = [];

  const reply = async (call: RecordedCall): Promise<ExecResult> => {
    calls.push(call);
    const answer = await handler(call);
    if (typeof answer === 'number') return { stdout: '', stderr: '', exitCode: answer };
    return { stdout: '', stderr: '', exitCode: 0, ...answer };
  };

  return {
    calls,
    commandLines: () => calls.map((c) => [c.command, ...c.args].join(' ')),
    async capture(command, args, options) {
      return reply({ mode: 'capture', command, args, options });
    },
    async run(command, args, options) {
      return (await reply({ mode: 'run', command, args, options })).exitCode;
    },
  };
}

// ── Recording logger ─────────────────────────────────────────────────

export interface LogLine {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
}

export interface RecordingLogger extends Logger {
  lines: LogLine[];
  messages(level?: LogLine['level']): string[];
}

export function createRecordingLogger(): RecordingLogger {
  const lines: LogLine[] = [];
  const record =
    (level: LogLine['level']) =>
    (message: string): void => {
      lines.push({ level, message });
    };

  return {
    lines,
    messages: (level) => lines.filter((l) => !level || l.level === level).map((l) => l.message),
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
  };
}

// ── Step context ─────────────────────────────────────────────────────

export interface TestContextOptions {
  platform?: Platform;
  fs?: MemoryFs;
  runner?: ScriptedRunner;
  config?: DevstrapConfig;
  path?: string;
}

export interface TestContext extends StepContext {
  fs: MemoryFs;
  runner: ScriptedRunner;
  logger: RecordingLogger;
}

export function createTestContext(options: TestContextOptions = {}): TestContext {
  return {
    env: new EnvironmentContext({
      platform: options.platform ?? 'Linux',
      homeDir: HOME,
      user: 'dev',
      tmpDir: TMP,
      env: { HOME, PATH: options.path ?? '/usr/bin:/bin' },
    }),
    fs: options.fs ?? createMemoryFs(),
    runner: options.runner ?? createScriptedRunner(),
    logger: createRecordingLogger(),
    config: options.config ?? defaultConfig(),
  };
}

// ── Simulated workstation ────────────────────────────────────────────

export const LINUX_BREW = '/home/linuxbrew/.linuxbrew/bin/brew';
export const MAC_BREW = '/opt/homebrew/bin/brew';

export function shellenvFor(prefix: string): string {
  return [
    `export HOMEBREW_PREFIX="${prefix}";`,
    `export HOMEBREW_CELLAR="${prefix}/Cellar";`,
    `export HOMEBREW_REPOSITORY="${prefix}/Homebrew";`,
    `export PATH="${prefix}/bin:${prefix}/sbin\${PATH+:$PATH}";`,
    `[ -z "\${MANPATH-}" ] || export MANPATH=":\${MANPATH#:}";`,
    `export INFOPATH="${prefix}/share/info:\${INFOPATH:-}";`,
    '',
  ].join('\n');
}

/** `brew shellenv bash` as printed on macOS, where PATH comes from path_helper. */
export function macShellenvFor(prefix: string): string {
  return [
    `export HOMEBREW_PREFIX="${prefix}";`,
    `export HOMEBREW_CELLAR="${prefix}/Cellar";`,
    `export HOMEBREW_REPOSITORY="${prefix}";`,
    `eval "$(/usr/bin/env PATH_HELPER_ROOT="${prefix}" /usr/libexec/path_helper -s)"`,
    `[ -z "\${MANPATH-}" ] || export MANPATH=":\${MANPATH#:}";`,
    `export INFOPATH="${prefix}/share/info:\${INFOPATH:-}";`,
    '',
  ].join('\n');
}

/** `brew shellenv` for a user whose login shell is fish. */
export function fishShellenvFor(prefix: string): string {
  return [
    `set --global --export HOMEBREW_PREFIX "${prefix}";`,
    `set --global --export HOMEBREW_CELLAR "${prefix}/Cellar";`,
    `set --global --export HOMEBREW_REPOSITORY "${prefix}/Homebrew";`,
    `fish_add_path --global --move --path "${prefix}/bin" "${prefix}/sbin";`,
    '',
  ].join('\n');
}

export interface FakeWorkstation {
  fs: MemoryFs;
  runner: ScriptedRunner;
  /** Packages `brew install` has installed so far, with install counts. */
  installed: Map<string, number>;
  /** Set to make the named command exit with the given code. */
  failures: Map<string, number>;
  xcodeInstalled: boolean;
}

/**
 * A machine whose installers behave like the real ones: the Homebrew
 * script puts `brew` under its prefix, the Miniconda installer creates
 * `conda`, and `brew install` skips packages it already has.
 */
export function createFakeWorkstation(platform: Platform = 'Linux'): FakeWorkstation {
  const fs = createMemoryFs();
  const installed = new Map<string, number>();
  const failures = new Map<string, number>();
  const prefix = platform === 'macOS' ? '/opt/homebrew' : '/home/linuxbrew/.linuxbrew';
  const brew = `${prefix}/bin/brew`;

  const workstation: FakeWorkstation = {
    fs,
    installed,
    failures,
    xcodeInstalled: true,
    runner: createScriptedRunner((call) => {
      const key = [call.command, ...call.args].join(' ');
      for (const [pattern, code] of failures) {
        if (key.startsWith(pattern)) return call.mode === 'run' ? code : { exitCode: code };
      }

      if (call.command === 'xcode-select' && call.args[0] === '-p') {
        return workstation.xcodeInstalled
          ? { stdout: '/Library/Developer/CommandLineTools\n' }
          : { exitCode: 2, stderr: 'unable to get active developer directory' };
      }
      if (call.command === 'curl' && call.args[0] === '-fsSL') {
        return { stdout: '#!/bin/bash\necho installing homebrew\n' };
      }
      if (call.command === '/bin/bash' && call.args[0] === '-c') {
        fs.addExecutable(brew);
        return 0;
      }
      if (call.command === 'curl' && call.args[0] === '-fL') {
        const target = call.args[3] ?? '';
        fs.files.set(target, '#!/bin/bash\n# miniconda installer\n');
        return 0;
      }
      if (call.command === 'bash' && call.args[1] === '-b') {
        fs.addExecutable(`${call.args[3] ?? ''}/bin/conda`);
        return 0;
      }
      if (call.command === brew && call.args[0] === 'shellenv') {
        // The login shell is fish unless a shell is named.
        if (call.args[1] !== 'bash') return { stdout: fishShellenvFor(prefix) };
        return { stdout: platform === 'macOS' ? macShellenvFor(prefix) : shellenvFor(prefix) };
      }
      if (call.command === brew && call.args[0] === 'install') {
        for (const name of call.args.slice(1)) {
          if (!installed.has(name)) {
            installed.set(name, 1);
            if (name === 'fish') fs.addExecutable(`${prefix}/bin/fish`);
          }
        }
        return 0;
      }
      return undefined;
    }),
  };

  return workstation;
}
