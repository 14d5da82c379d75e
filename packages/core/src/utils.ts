/** Type guard: checks that a value is a non-null object. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Render a command line for log and error messages. */
export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args]
    .map((part) => (part === '' || /[\s"'$`\\]/.test(part) ? `'${part.replace(/'/g, `'\\''`)}'` : part))
    .join(' ');
}
