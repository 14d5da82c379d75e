import * as fs from 'node:fs/promises';
import { constants } from 'node:fs';
import * as path from 'node:path';
import type { FileSystem, Logger } from '@devstrap/core';

const OWNER_WRITE = 0o200;

async function canAccess(filePath: string, mode: number): Promise<boolean> {
  try {
    await fs.access(filePath, mode);
    return true;
  } catch {
    return false;
  }
}

async function addOwnerWrite(target: string, recursive: boolean): Promise<void> {
  const stat = await fs.lstat(target);
  if (stat.isSymbolicLink()) return;
  await fs.chmod(target, stat.mode | OWNER_WRITE);
  if (!recursive || !stat.isDirectory()) return;
  for (const entry of await fs.readdir(target)) {
    await addOwnerWrite(path.join(target, entry), true);
  }
}

/** {@link FileSystem} over `node:fs/promises`. */
export function createNodeFs(): FileSystem {
  return {
    async readFile(filePath: string): Promise<string> {
      return fs.readFile(filePath, 'utf-8');
    },
    async writeFile(filePath: string, content: string): Promise<void> {
      await fs.writeFile(filePath, content, 'utf-8');
    },
    async appendFile(filePath: string, content: string): Promise<void> {
      await fs.appendFile(filePath, content, 'utf-8');
    },
    async mkdir(dirPath: string, options?: { recursive?: boolean }): Promise<void> {
      await fs.mkdir(dirPath, { recursive: options?.recursive ?? false });
    },
    async exists(filePath: string): Promise<boolean> {
      return canAccess(filePath, constants.F_OK);
    },
    async isDirectory(filePath: string): Promise<boolean> {
      try {
        return (await fs.stat(filePath)).isDirectory();
      } catch {
        return false;
      }
    },
    async isWritable(filePath: string): Promise<boolean> {
      return canAccess(filePath, constants.W_OK);
    },
    async isExecutable(filePath: string): Promise<boolean> {
      try {
        const stat = await fs.stat(filePath);
        return stat.isFile() && (await canAccess(filePath, constants.X_OK));
      } catch {
        return false;
      }
    },
    async makeWritable(target: string, options?: { recursive?: boolean }): Promise<void> {
      await addOwnerWrite(target, options?.recursive ?? false);
    },
    async remove(filePath: string): Promise<void> {
      await fs.rm(filePath, { force: true });
    },
  };
}

/**
 * Wrap a {@link FileSystem} so that every mutation is logged and skipped.
 * Reads and probes go through to `inner`.
 */
export function createDryRunFs(inner: FileSystem, logger: Logger): FileSystem {
  const note = (action: string, target: string): void => {
    logger.info(`[dry-run] ${action} ${target}`);
  };

  return {
    readFile: (p) => inner.readFile(p),
    exists: (p) => inner.exists(p),
    isDirectory: (p) => inner.isDirectory(p),
    isWritable: (p) => inner.isWritable(p),
    isExecutable: (p) => inner.isExecutable(p),
    async writeFile(p) {
      note('write', p);
    },
    async appendFile(p) {
      note('append to', p);
    },
    async mkdir(p) {
      note('mkdir', p);
    },
    async makeWritable(p) {
      note('chmod u+w', p);
    },
    async remove(p) {
      note('remove', p);
    },
  };
}
