import { MAX_LIMIT } from './constants.js';
import { UsageError } from './errors.js';

export function hasFlag(args: readonly string[], name: string): boolean {
  return args.includes(`--${name}`);
}

/** Value of `--name value` or `--name=value`. */
export function getOption(args: readonly string[], name: string): string | undefined {
  const inline = args.find(a => a.startsWith(`--${name}=`));
  if (inline !== undefined) return inline.slice(name.length + 3);

  const idx = args.indexOf(`--${name}`);
  if (idx === -1) return undefined;
  const value = args[idx + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`--${name} requires a value`);
  }
  return value;
}

/** `--limit N`: a positive integer capped at MAX_LIMIT, or Infinity when absent. */
export function parseLimit(args: readonly string[]): number {
  const raw = getOption(args, 'limit');
  if (raw === undefined) return Infinity;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new UsageError('--limit must be a positive integer');
  }
  return Math.min(parsed, MAX_LIMIT);
}

export function isDirectRun(scriptName: string, entry: string | undefined = process.argv[1]): boolean {
  return entry !== undefined && (entry.endsWith(`${scriptName}.ts`) || entry.endsWith(`${scriptName}.js`));
}

/** Run `main` only when the script is executed directly (not imported by tests). */
export function runIfDirect(scriptName: string, main: () => Promise<void>): void {
  if (!isDirectRun(scriptName)) return;
  main().catch((err: unknown) => {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}`);
    } else {
      console.error('Fatal error:', err);
    }
    process.exit(1);
  });
}
