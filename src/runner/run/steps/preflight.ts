// src/runner/run/steps/preflight.ts
import { command } from '@/runner/run/exec/command';
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_PREFLIGHT } from '@/runner/util/debug-scopes';

import type { StepContext } from './context';

export const PYTHON_VERSION_SCRIPT =
  "import sys; print(f'{sys.version_info.major}.{sys.version_info.minor}')";

/** Parse "<major>.<minor>" (extra components ignored); null when malformed. */
export const parseVersion = (s: string): [number, number] | null => {
  const m = /^(\d+)\.(\d+)/.exec(s.trim());
  if (!m?.[1] || !m[2]) return null;
  return [Number(m[1]), Number(m[2])];
};

/** True when `actual` satisfies the minimum: same major, minor at least `min`'s. */
export const satisfiesMinimum = (actual: string, min: string): boolean => {
  const a = parseVersion(actual);
  const b = parseVersion(min);
  if (!a || !b) return false;
  return a[0] === b[0] && a[1] >= b[1];
};

/** Ask the configured interpreter for its version; null when it cannot answer. */
export const probePythonVersion = async (
  ctx: StepContext,
): Promise<string | null> => {
  const { exitCode, stdout } = await ctx.exec.capture(
    command(ctx.config.python, ['-c', PYTHON_VERSION_SCRIPT]),
  );
  const version = stdout.trim();
  if (exitCode !== 0 || !parseVersion(version)) {
    debugLog(
      DBG_SCOPE_PREFLIGHT,
      `probe failed (exit ${exitCode.toString()}): ${JSON.stringify(version)}`,
    );
    return null;
  }
  return version;
};

/**
 * Check the interpreter against `minPython` and remember its version.
 *
 * @returns 0 when the run may continue, 1 otherwise.
 */
export const runPreflight = async (ctx: StepContext): Promise<number> => {
  const { python, minPython } = ctx.config;
  const version = await probePythonVersion(ctx);
  if (version === null) {
    if (ctx.flags.dryRun) {
      debugLog(DBG_SCOPE_PREFLIGHT, 'dry run: skipping interpreter check');
      return 0;
    }
    ctx.ui.onError(`unable to determine the Python version (${python})`);
    return 1;
  }
  ctx.state.pythonVersion = version;
  if (!satisfiesMinimum(version, minPython)) {
    ctx.ui.onError(
      `${ctx.config.package} requires Python ${minPython} or higher. But the current Python is: ${version}`,
    );
    return 1;
  }
  return 0;
};
