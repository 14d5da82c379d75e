import JSON5 from 'json5';
import { readFileSync } from 'node:fs';
import { defaultConfig, type DevstrapConfig } from './config.js';
import { isRecord } from './utils.js';

export interface ConfigValidationError {
  path: string;
  message: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: ConfigValidationError[];
  config?: DevstrapConfig;
}

function describe(value: unknown): string {
  if (Array.isArray(value)) return 'array';
  if (value === null) return 'null';
  return typeof value;
}

/**
 * Check `value` against the shape of `template` (the built-in defaults).
 * Unknown keys are rejected at every level. With `partial`, missing keys are
 * allowed and later filled from the defaults.
 */
function checkShape(
  value: unknown,
  template: unknown,
  path: string,
  partial: boolean,
  errors: ConfigValidationError[],
): void {
  if (Array.isArray(template)) {
    if (!Array.isArray(value)) {
      errors.push({ path, message: `Expected a list of strings, got ${describe(value)}` });
      return;
    }
    if (value.length === 0) {
      errors.push({ path, message: 'Expected at least one entry' });
      return;
    }
    value.forEach((item, index) => {
      if (typeof item !== 'string' || item.trim() === '') {
        errors.push({ path: `${path}[${index}]`, message: 'Expected a non-empty string' });
      }
    });
    return;
  }

  if (isRecord(template)) {
    if (!isRecord(value)) {
      errors.push({ path, message: `Section "${path}" must be an object` });
      return;
    }
    for (const key of Object.keys(value)) {
      if (!(key in template)) {
        errors.push({ path: join(path, key), message: `Unknown key: "${key}"` });
      }
    }
    for (const [key, expected] of Object.entries(template)) {
      if (!(key in value)) {
        if (!partial) errors.push({ path: join(path, key), message: `Missing required key: "${key}"` });
        continue;
      }
      checkShape(value[key], expected, join(path, key), partial, errors);
    }
    return;
  }

  if (typeof value !== typeof template) {
    errors.push({ path, message: `Expected ${typeof template}, got ${describe(value)}` });
    return;
  }
  if (typeof value === 'number' && (!Number.isFinite(value) || value <= 0)) {
    errors.push({ path, message: 'Expected a positive number' });
  }
  if (typeof value === 'string' && value.trim() === '') {
    errors.push({ path, message: 'Expected a non-empty string' });
  }
}

function join(parent: string, key: string): string {
  return parent === '' ? key : `${parent}.${key}`;
}

function merge(base: unknown, override: unknown): unknown {
  if (!isRecord(base) || !isRecord(override)) {
    return override === undefined ? base : override;
  }
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    out[key] = merge(base[key], value);
  }
  return out;
}

/**
 * Validate a complete config object (defaults already merged, env
 * overrides applied).
 */
export function checkConfig(config: unknown): ConfigValidationError[] {
  const errors: ConfigValidationError[] = [];
  checkShape(config, defaultConfig(), '', false, errors);
  return errors;
}

/**
 * Parse and validate a JSON5 config string, then merge it over the defaults.
 * Every key is optional; unknown keys are rejected (strict mode).
 */
export function validateConfig(json5String: string): ConfigValidationResult {
  let parsed: unknown;
  try {
    parsed = JSON5.parse(json5String);
  } catch (err) {
    return {
      valid: false,
      errors: [{ path: '', message: `Invalid JSON5: ${String(err)}` }],
    };
  }

  if (!isRecord(parsed)) {
    return {
      valid: false,
      errors: [{ path: '', message: 'Config must be an object' }],
    };
  }

  const errors: ConfigValidationError[] = [];
  checkShape(parsed, defaultConfig(), '', true, errors);

  return {
    valid: errors.length === 0,
    errors,
    config:
      errors.length === 0
        ? (merge(defaultConfig(), parsed) as DevstrapConfig)
        : undefined,
  };
}

/**
 * Load and validate a JSON5 config file from disk.
 */
export function loadConfig(filePath: string): ConfigValidationResult {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    return {
      valid: false,
      errors: [{ path: '', message: `Cannot read config file: ${String(err)}` }],
    };
  }
  return validateConfig(content);
}
