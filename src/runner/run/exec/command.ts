// src/runner/run/exec/command.ts

/** An external command: executable, argument vector and extra environment. */
export type CommandSpec = {
  file: string;
  args: string[];
  /** Variables added on top of the session environment for this command only. */
  env?: Record<string, string>;
};

const SAFE = /^[A-Za-z0-9_@%+=:,./-]+$/;

/** Quote one word for display in POSIX shell syntax. */
export const quoteArg = (word: string): string => {
  if (word.length === 0) return "''";
  if (SAFE.test(word)) return word;
  return `'${word.replace(/'/g, `'\\''`)}'`;
};

/**
 * Render a command as a single shell-like line, e.g.
 * `MYPYPATH=/repo/pkg mypy /repo`.
 */
export const renderCommand = (cmd: CommandSpec): string => {
  const env = Object.entries(cmd.env ?? {}).map(
    ([k, v]) => `${k}=${quoteArg(v)}`,
  );
  return [...env, quoteArg(cmd.file), ...cmd.args.map(quoteArg)].join(' ');
};

/** Shorthand constructor. */
export const command = (
  file: string,
  args: string[] = [],
  env?: Record<string, string>,
): CommandSpec => (env ? { file, args, env } : { file, args });
