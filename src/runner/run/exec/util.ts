/* src/runner/run/exec/util.ts
 * Utilities for scheduling and exit status mapping.
 */
import { constants } from 'node:os';

/** Yield one event-loop tick so pending signal handlers can run. */
export const yieldToEventLoop = (): Promise<void> =>
  new Promise<void>((resolveP) => setImmediate(resolveP));

/** Conventional shell status for "command not found". */
export const EXIT_NOT_FOUND = 127;

/** Conventional shell status after SIGINT. */
export const EXIT_SIGINT = 130;

/**
 * Map a child's close event to a shell-style exit status:
 * the exit code when present, otherwise 128 + signal number.
 */
export const toExitStatus = (
  code: number | null,
  signal: NodeJS.Signals | null,
): number => {
  if (typeof code === 'number') return code;
  if (signal) {
    const entry = Object.entries(constants.signals).find(
      ([name]) => name === signal,
    );
    if (entry) return 128 + Number(entry[1]);
  }
  return 1;
};
