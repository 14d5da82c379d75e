/**
 * Evaluator for the small POSIX shell dialect printed by `brew shellenv`.
 *
 * Only `export NAME=value;` lines are honoured, optionally behind a
 * `[ -z "${NAME-}" ] ||` guard. Everything else (comments, `eval`, `fi`)
 * is ignored.
 */

export interface ShellAssignment {
  name: string;
  value: string;
}

export type VariableLookup = (name: string) => string | undefined;

const NAME = /^[A-Za-z_][A-Za-z0-9_]*/;
const EXPORT_LINE =
  /^export\s+([A-Za-z_][A-Za-z0-9_]*)=(?:"((?:[^"\\]|\\.)*)"|'([^']*)'|([^\s;'"]*))\s*;?$/;
const EMPTY_GUARD = /^\[\s+-z\s+"\$\{([A-Za-z_][A-Za-z0-9_]*)-?\}"\s+\]\s+\|\|\s+(.+)$/;

/**
 * Parse `script` and return the assignments it performs, in order.
 * Later lines see the values exported by earlier ones.
 */
export function parseShellEnv(script: string, lookup: VariableLookup): ShellAssignment[] {
  const exported = new Map<string, string>();
  const resolve: VariableLookup = (name) => exported.get(name) ?? lookup(name);
  const assignments: ShellAssignment[] = [];

  for (const rawLine of script.split('\n')) {
    let line = rawLine.trim();
    if (line === '' || line.startsWith('#')) continue;

    const guard = EMPTY_GUARD.exec(line);
    if (guard) {
      const guarded = resolve(guard[1] ?? '');
      if (guarded === undefined || guarded === '') continue;
      line = (guard[2] ?? '').trim();
    }

    const match = EXPORT_LINE.exec(line);
    if (!match) continue;

    const [, name = '', doubleQuoted, singleQuoted, bare] = match;
    let value: string;
    if (singleQuoted !== undefined) {
      value = singleQuoted;
    } else {
      value = expandParameters(doubleQuoted ?? bare ?? '', resolve);
    }

    exported.set(name, value);
    assignments.push({ name, value });
  }

  return assignments;
}

/**
 * Expand `$NAME` and `${NAME...}` references in a double-quoted shell word.
 *
 * Supported forms: `${NAME}`, `${NAME-word}`, `${NAME:-word}`,
 * `${NAME+word}`, `${NAME:+word}`, `${NAME#prefix}`.
 */
export function expandParameters(text: string, lookup: VariableLookup): string {
  let out = '';
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (ch === '\\' && i + 1 < text.length && '"\\$`'.includes(text[i + 1] ?? '')) {
      out += text[i + 1];
      i += 2;
      continue;
    }

    if (ch !== '$') {
      out += ch;
      i++;
      continue;
    }

    if (text[i + 1] === '{') {
      const close = findClosingBrace(text, i + 2);
      if (close === -1) {
        out += text.slice(i);
        break;
      }
      out += expandBraced(text.slice(i + 2, close), lookup);
      i = close + 1;
      continue;
    }

    const name = NAME.exec(text.slice(i + 1));
    if (name) {
      out += lookup(name[0]) ?? '';
      i += 1 + name[0].length;
      continue;
    }

    out += '$';
    i++;
  }

  return out;
}

function findClosingBrace(text: string, from: number): number {
  let depth = 1;
  for (let i = from; i < text.length; i++) {
    if (text[i] === '{') depth++;
    else if (text[i] === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function expandBraced(inner: string, lookup: VariableLookup): string {
  const name = NAME.exec(inner);
  if (!name) return '';

  const value = lookup(name[0]);
  const rest = inner.slice(name[0].length);

  if (rest === '') return value ?? '';
  if (rest.startsWith(':-')) {
    return value !== undefined && value !== '' ? value : expandParameters(rest.slice(2), lookup);
  }
  if (rest.startsWith(':+')) {
    return value !== undefined && value !== '' ? expandParameters(rest.slice(2), lookup) : '';
  }
  if (rest.startsWith('-')) {
    return value !== undefined ? value : expandParameters(rest.slice(1), lookup);
  }
  if (rest.startsWith('+')) {
    return value !== undefined ? expandParameters(rest.slice(1), lookup) : '';
  }
  if (rest.startsWith('#')) {
    const prefix = expandParameters(rest.slice(1), lookup);
    const current = value ?? '';
    return current.startsWith(prefix) ? current.slice(prefix.length) : current;
  }

  return value ?? '';
}
