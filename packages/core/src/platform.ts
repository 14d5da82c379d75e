import { UnsupportedPlatformError } from './errors.js';

/** The two workstation platforms devstrap knows how to provision. */
export type Platform = 'macOS' | 'Linux';

/**
 * Map a platform identifier to a {@link Platform}.
 *
 * Accepts both the shell's `OSTYPE` values (`darwin23`, `linux-gnu`) and
 * Node's `process.platform` values (`darwin`, `linux`). Other Linux flavours
 * (`linux-musl`, `linux-android`) are not glibc systems Homebrew supports.
 *
 * @throws UnsupportedPlatformError for any other identifier.
 */
export function detectPlatform(identifier: string): Platform {
  const normalized = identifier.trim().toLowerCase();
  if (normalized.startsWith('darwin')) return 'macOS';
  if (normalized === 'linux' || normalized.startsWith('linux-gnu')) return 'Linux';
  throw new UnsupportedPlatformError(identifier);
}

/**
 * Pick the identifier to detect from: `OSTYPE` when the shell exported it,
 * otherwise the runtime's own platform string.
 */
export function platformIdentifier(
  env: Record<string, string | undefined>,
  fallback: string = process.platform,
): string {
  const ostype = env['OSTYPE'];
  return ostype !== undefined && ostype.trim() !== '' ? ostype : fallback;
}
