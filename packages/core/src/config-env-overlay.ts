import { isRecord } from './utils.js';

const PREFIX = 'DEVSTRAP_';
const SEPARATOR = '__';

/** Variables read by the CLI itself rather than mapped onto the config. */
const RESERVED = new Set(['DEVSTRAP_CONFIG']);

/**
 * Coerce a raw variable to the type of the value it replaces.
 * Lists are comma-separated. A value that does not fit stays a string so
 * validation can report it.
 */
function coerce(raw: string, current: unknown): unknown {
  if (Array.isArray(current)) {
    return raw
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item !== '');
  }
  if (typeof current === 'number') {
    if (/^-?\d+(\.\d+)?$/.test(raw)) {
      const num = Number(raw);
      if (Number.isFinite(num)) return num;
    }
    return raw;
  }
  if (typeof current === 'boolean') {
    if (raw === 'true') return true;
    if (raw === 'false') return false;
    return raw;
  }
  return raw;
}

/**
 * Apply environment variable overrides to a config object.
 *
 * Variables must be prefixed with `DEVSTRAP_`. Nesting is expressed with
 * double-underscore (`__`) and segments match config keys
 * case-insensitively. Only existing keys can be overridden.
 *
 * Example: `DEVSTRAP_NETWORK__TIMEOUTMS=2000`
 *   → `config.network.timeoutMs = 2000`
 *
 * @param config The config object to mutate in-place.
 * @param env    Optional env map (defaults to `process.env`).
 * @returns Names of prefixed variables that matched no config key.
 */
export function applyEnvOverrides(
  config: object,
  env: Record<string, string | undefined> = process.env,
): string[] {
  const ignored: string[] = [];

  for (const [key, rawValue] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || rawValue === undefined || RESERVED.has(key)) continue;

    const path = key.slice(PREFIX.length).split(SEPARATOR);
    if (path.some((segment) => segment === '') || !setExisting(config, path, rawValue)) {
      ignored.push(key);
    }
  }

  return ignored;
}

function findKey(obj: Record<string, unknown>, segment: string): string | undefined {
  const wanted = segment.toLowerCase();
  return Object.keys(obj).find((key) => key.toLowerCase() === wanted);
}

function setExisting(root: object, path: string[], rawValue: string): boolean {
  let current: unknown = root;

  for (let i = 0; i < path.length - 1; i++) {
    if (!isRecord(current)) return false;
    const key = findKey(current, path[i] ?? '');
    if (key === undefined) return false;
    current = current[key];
  }

  if (!isRecord(current)) return false;
  const leaf = findKey(current, path[path.length - 1] ?? '');
  if (leaf === undefined || isRecord(current[leaf])) return false;

  current[leaf] = coerce(rawValue, current[leaf]);
  return true;
}
