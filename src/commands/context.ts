import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import type { Session } from '../core/session.js';
import { formatError } from '../utils/errors.js';

/** Lazily creates the session on first use, once global options are parsed. */
export type SessionProvider = () => Session;

/**
 * Wrap a commander action: errors are printed in red and the exit code is set,
 * instead of an unhandled rejection.
 */
export function action<A extends unknown[]>(fn: (...args: A) => Promise<void> | void): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err) {
      console.error(chalk.red(formatError(err)));
      process.exitCode = 1;
    }
  };
}

export function parseToggle(value: string): boolean {
  const v = value.trim().toLowerCase();
  if (['on', 'true', 'yes', '1'].includes(v)) return true;
  if (['off', 'false', 'no', '0'].includes(v)) return false;
  throw new InvalidArgumentError(`Expected on or off, got "${value}"`);
}

export function parseCount(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError(`Expected a non-negative integer, got "${value}"`);
  return n;
}
