/**
 * Argument parsing for compute-root.
 *
 *   [--algorithm <name>] [leaf...] [-- leaf...]
 *
 * Everything after a bare `--` is a leaf, even when it starts with `--`.
 * Before it, any other `--flag` is rejected rather than dropped.
 */

export interface RootArgs {
  algorithm: string;
  leaves: string[];
}

export type ParseResult = { ok: true; args: RootArgs } | { ok: false; error: string };

export const DEFAULT_ALGORITHM = 'sha256';

export function parseRootArgs(argv: readonly string[]): ParseResult {
  const separator = argv.indexOf('--');
  const optionArgs = separator >= 0 ? argv.slice(0, separator) : argv;
  const trailing = separator >= 0 ? argv.slice(separator + 1) : [];

  let algorithm = DEFAULT_ALGORITHM;
  const leaves: string[] = [];

  for (let i = 0; i < optionArgs.length; i++) {
    const arg = optionArgs[i];

    if (arg === '--algorithm') {
      const value = optionArgs[i + 1];
      if (value === undefined) {
        return { ok: false, error: 'Missing value for --algorithm' };
      }
      algorithm = value;
      i++;
    } else if (arg.startsWith('--')) {
      return { ok: false, error: `Unknown option: ${arg} (use -- before leaves that start with --)` };
    } else {
      leaves.push(arg);
    }
  }

  return { ok: true, args: { algorithm, leaves: [...leaves, ...trailing] } };
}
