/* src/runner/util/color.ts
 * Meaning-based color helpers that respect RUNTESTS_BORING/NO_COLOR/FORCE_COLOR.
 * BORING or non‑TTY => return unstyled strings.
 */
import chalk from 'chalk';

export function isBoring(): boolean {
  // Compute TTY dynamically so tests and callers can toggle isTTY/env reliably.
  const tty = process.stdout.isTTY === true;
  return (
    process.env.RUNTESTS_BORING === '1' ||
    process.env.NO_COLOR === '1' ||
    process.env.FORCE_COLOR === '0' ||
    !tty
  );
}

/** Semantic aliases (unstyled in BORING/non‑TTY) */
export function ok(s: string): string {
  return isBoring() ? s : chalk.bold.green(s);
}
export function go(s: string): string {
  return isBoring() ? s : chalk.bold.blue(s);
}
export function error(s: string): string {
  return isBoring() ? s : chalk.bold.red(s);
}
export function warn(s: string): string {
  return isBoring() ? s : chalk.hex('#FFA500')(s);
} // orange

/** Text styles (unstyled in BORING/non‑TTY) */
export function bold(s: string): string {
  return isBoring() ? s : chalk.bold(s);
}
export function dim(s: string): string {
  return isBoring() ? s : chalk.dim(s);
}

/** Horizontal rule printed before each banner; empty when unstyled. */
export function separator(): string {
  return isBoring() ? '' : `${'-'.repeat(80)}\n`;
}

/** Remove ANSI CSI sequences (ESC [ ... @-~). */
export const stripAnsi = (s: string): string =>
  // eslint-disable-next-line no-control-regex
  s.replace(/\x1B\[[0-?]*[ -/]*[@-~]/g, '');
