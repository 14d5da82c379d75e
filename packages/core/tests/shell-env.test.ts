import { describe, it, expect } from 'vitest';
import { expandParameters, parseShellEnv } from '../src/index.js';

const vars = (map: Record<string, string>) => (name: string) => map[name];

describe('expandParameters', () => {
  it('expands $NAME and ${NAME}', () => {
    expect(expandParameters('$A-${B}', vars({ A: 'x', B: 'y' }))).toBe('x-y');
  });

  it('expands unset names to nothing', () => {
    expect(expandParameters('[$MISSING]', vars({}))).toBe('[]');
  });

  it('handles ${NAME+word} only when set', () => {
    expect(expandParameters('/a${PATH+:$PATH}', vars({ PATH: '/usr/bin' }))).toBe('/a:/usr/bin');
    expect(expandParameters('/a${PATH+:$PATH}', vars({}))).toBe('/a');
  });

  it('distinguishes empty from unset with the colon forms', () => {
    expect(expandParameters('${X:-d}', vars({ X: '' }))).toBe('d');
    expect(expandParameters('${X-d}', vars({ X: '' }))).toBe('');
    expect(expandParameters('${X-d}', vars({}))).toBe('d');
    expect(expandParameters('${X:+w}', vars({ X: '' }))).toBe('');
    expect(expandParameters('${X+w}', vars({ X: '' }))).toBe('w');
  });

  it('strips a leading prefix with ${NAME#prefix}', () => {
    expect(expandParameters(':${M#:}', vars({ M: ':/usr/share/man' }))).toBe(':/usr/share/man');
    expect(expandParameters('${M#:}', vars({ M: 'plain' }))).toBe('plain');
  });

  it('keeps escaped characters literal', () => {
    expect(expandParameters('\\$HOME \\"q\\"', vars({ HOME: '/h' }))).toBe('$HOME "q"');
  });

  it('leaves a lone dollar sign alone', () => {
    expect(expandParameters('cost: $5', vars({}))).toBe('cost: $5');
  });
});

describe('parseShellEnv', () => {
  const shellenv = [
    'export HOMEBREW_PREFIX="/opt/homebrew";',
    'export HOMEBREW_CELLAR="/opt/homebrew/Cellar";',
    'export PATH="/opt/homebrew/bin:/opt/homebrew/sbin${PATH+:$PATH}";',
    '[ -z "${MANPATH-}" ] || export MANPATH=":${MANPATH#:}";',
    'export INFOPATH="/opt/homebrew/share/info:${INFOPATH:-}";',
  ].join('\n');

  it('evaluates the lines brew shellenv prints', () => {
    expect(parseShellEnv(shellenv, vars({ PATH: '/usr/bin:/bin' }))).toEqual([
      { name: 'HOMEBREW_PREFIX', value: '/opt/homebrew' },
      { name: 'HOMEBREW_CELLAR', value: '/opt/homebrew/Cellar' },
      { name: 'PATH', value: '/opt/homebrew/bin:/opt/homebrew/sbin:/usr/bin:/bin' },
      { name: 'INFOPATH', value: '/opt/homebrew/share/info:' },
    ]);
  });

  it('runs a guarded export when the guarded variable is non-empty', () => {
    const result = parseShellEnv(shellenv, vars({ PATH: '/bin', MANPATH: '/usr/share/man' }));
    expect(result).toContainEqual({ name: 'MANPATH', value: ':/usr/share/man' });
  });

  it('lets later lines see earlier exports', () => {
    const script = 'export A="one";\nexport B="$A-two";';
    expect(parseShellEnv(script, vars({}))).toEqual([
      { name: 'A', value: 'one' },
      { name: 'B', value: 'one-two' },
    ]);
  });

  it('takes single-quoted values literally and bare values expanded', () => {
    const script = "export A='$HOME';\nexport B=$HOME";
    expect(parseShellEnv(script, vars({ HOME: '/h' }))).toEqual([
      { name: 'A', value: '$HOME' },
      { name: 'B', value: '/h' },
    ]);
  });

  it('ignores comments and other statements', () => {
    const script = '# comment\neval "$(something)"\nfish_add_path -gP "/opt/homebrew/bin";\n';
    expect(parseShellEnv(script, vars({}))).toEqual([]);
  });
});
