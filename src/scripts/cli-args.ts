// Shared argv helpers for the scripts
import { SyncError, errorMessage } from '../core/errors';

export function getArg(args: string[], ...flags: string[]): string | undefined {
  for (const flag of flags) {
    const idx = args.indexOf(flag);
    if (idx >= 0 && idx + 1 < args.length) return args[idx + 1];
  }
  return undefined;
}

export function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

export function parsePositiveInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

// Operator-facing message: failed step + message, no stack
export function describeError(err: unknown): string {
  if (err instanceof SyncError) {
    return `[${err.step}] ${err.message}`;
  }
  return errorMessage(err);
}
