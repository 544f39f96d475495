/** Shared Commander helpers for the runtests CLI. */
import { type Command, InvalidArgumentError, type Option } from 'commander';

/** Safe wrapper for Commander's getOptionValueSource. */
export const getOptionSource = (
  cmd: Command,
  name: string,
): string | undefined => cmd.getOptionValueSource(name);

/** True when the user typed the option (not a default or env value). */
export const fromCli = (cmd: Command, name: string): boolean =>
  getOptionSource(cmd, name) === 'cli';

/**
 * Rewrite any `--nou*` spelling (`--nou`, `--nounittest`, `--nounittesting`…)
 * to the canonical `--nounittests`. An empty first argument counts as no
 * arguments at all.
 */
export const normalizeArgv = (argv: readonly string[]): string[] =>
  argv[0] === ''
    ? []
    : argv.map((a) => (a.startsWith('--nou') ? '--nounittests' : a));

/** Commander argParser for `-j/--jobs`. */
export const parsePositiveInt = (value: string): number => {
  const n = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(n) || n < 1) {
    throw new InvalidArgumentError('expected a positive integer.');
  }
  return n;
};

/** Tag an Option description with (default) when active. */
export function tagDefault(opt: Option, on: boolean): void {
  if (on && !opt.description.includes('(default)')) {
    opt.description = `${opt.description} (default)`;
  }
}
