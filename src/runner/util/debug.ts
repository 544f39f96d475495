/* src/runner/util/debug.ts
 * Opt-in debug logger. Emits only when RUNTESTS_DEBUG=1 to avoid noisy output in normal mode.
 */

export const debugEnabled = (): boolean => process.env.RUNTESTS_DEBUG === '1';

/** Log a concise debug line under RUNTESTS_DEBUG=1 (scope: module:function). */
export const debugLog = (scope: string, message: string): void => {
  if (!debugEnabled()) return;
  // stderr to keep separation from tool output
  console.error(`runtests: debug: ${scope}: ${message}`);
};
