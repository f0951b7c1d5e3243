/**
 * MegaCLI stdout normalization.
 */

/**
 * Turn raw stdout into trimmed, lower-cased, non-empty lines with
 * "key : value" spacing collapsed to "key:value" and a trailing ':' removed.
 */
export function normalizeOutput(stdout: string): string[] {
  return stdout
    .split(/\r?\n/)
    .map(line => line.trim().replace(/\s*:\s*/g, ':').replace(/:$/, '').toLowerCase())
    .filter(line => line.length > 0);
}

/** Render an argument vector as a single display string. */
export function formatCommand(args: readonly string[]): string {
  return args.join(' ');
}
