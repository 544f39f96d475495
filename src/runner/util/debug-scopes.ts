/* src/runner/util/debug-scopes.ts
 * Centralized labels for debugLog calls.
 * Keeping these in one place ensures logs and tests remain consistent.
 */

/** config loader (file discovery and parse) */
export const DBG_SCOPE_CONFIG_LOAD = 'config:load';

/** run session (plan and per-step outcomes) */
export const DBG_SCOPE_SESSION = 'run.session';

/** interpreter preflight (version probe) */
export const DBG_SCOPE_PREFLIGHT = 'run.preflight';

/** process executor (spawn/exit) */
export const DBG_SCOPE_EXEC = 'run.exec';

/** clean step (glob matches) */
export const DBG_SCOPE_CLEAN = 'run.clean';

/** CLI surface (option resolution, version info) */
export const DBG_SCOPE_CLI = 'cli';
