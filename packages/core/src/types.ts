/** Logger interface handed to every step and to the orchestrator. */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/** Abstract filesystem interface (allows testing with in-memory implementations). */
export interface FileSystem {
  readFile(path: string): Promise<string>;
  writeFile(path: string, content: string): Promise<void>;
  appendFile(path: string, content: string): Promise<void>;
  mkdir(path: string, options?: { recursive?: boolean }): Promise<void>;
  exists(path: string): Promise<boolean>;
  isDirectory(path: string): Promise<boolean>;
  isWritable(path: string): Promise<boolean>;
  isExecutable(path: string): Promise<boolean>;
  /** Add the owner write bit, like `chmod [-R] u+w`. */
  makeWritable(path: string, options?: { recursive?: boolean }): Promise<void>;
  remove(path: string): Promise<void>;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandOptions {
  /** Full environment of the child. Nothing from `process.env` is merged in. */
  env?: Record<string, string>;
  cwd?: string;
  timeout?: number;
  /**
   * The command only inspects the machine. Read-only commands still run
   * when the runner is in dry-run mode.
   */
  readOnly?: boolean;
}

/** Runs external commands on behalf of the steps. */
export interface CommandRunner {
  /** Run with stdout/stderr captured. Never rejects on a non-zero exit. */
  capture(command: string, args: string[], options?: CommandOptions): Promise<ExecResult>;
  /**
   * Run attached to the terminal (inherited stdio) so installers can
   * prompt. Resolves with the exit code.
   */
  run(command: string, args: string[], options?: CommandOptions): Promise<number>;
}

/** A fixed text document written verbatim to `path`. */
export interface ConfigDocument {
  path: string;
  content: string;
}
