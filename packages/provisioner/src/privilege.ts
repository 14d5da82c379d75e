import { RootUserError } from '@devstrap/core';

/**
 * Throw {@link RootUserError} when the effective uid is 0. Platforms without
 * uids (no `geteuid`) pass.
 */
export function assertNotRoot(geteuid: (() => number) | undefined = process.geteuid?.bind(process)): void {
  if (geteuid !== undefined && geteuid() === 0) {
    throw new RootUserError();
  }
}
