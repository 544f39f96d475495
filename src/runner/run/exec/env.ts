/* src/runner/run/exec/env.ts
 * Child process environment preparation (PYTHONPATH augmentation) and PATH lookup.
 */
import { accessSync, constants, statSync } from 'node:fs';
import { delimiter, join } from 'node:path';

/** Prefix the project root to an existing PYTHONPATH (empty entries dropped). */
export const prependPythonPath = (root: string, current?: string): string =>
  [root, ...(current ?? '').split(delimiter)].filter(Boolean).join(delimiter);

/** Build the session env: parent env with PYTHONPATH prefixed by the project root. */
export const buildChildEnv = (
  root: string,
  parentEnv: NodeJS.ProcessEnv,
): NodeJS.ProcessEnv => ({
  ...parentEnv,
  PYTHONPATH: prependPythonPath(root, parentEnv.PYTHONPATH),
});

const isExecutableFile = (p: string): boolean => {
  try {
    if (!statSync(p).isFile()) return false;
    if (process.platform !== 'win32') accessSync(p, constants.X_OK);
    return true;
  } catch {
    return false;
  }
};

/**
 * Resolve an executable on PATH without spawning a process.
 *
 * @param tool - Bare command name (or a path, checked as-is).
 * @param env - Environment providing PATH (and PATHEXT on Windows).
 * @returns Absolute path of the first match, or null.
 */
export const which = (
  tool: string,
  env: NodeJS.ProcessEnv = process.env,
): string | null => {
  if (tool.includes('/') || tool.includes('\\'))
    return isExecutableFile(tool) ? tool : null;

  // Windows may expose PATH as "Path"
  const pathVar = env.PATH ?? env.Path ?? '';
  const exts =
    process.platform === 'win32'
      ? ['', ...(env.PATHEXT ?? '.EXE;.CMD;.BAT;.COM').split(';')]
      : [''];
  for (const dir of pathVar.split(delimiter)) {
    if (!dir) continue;
    for (const ext of exts) {
      const candidate = join(dir, `${tool}${ext}`);
      if (isExecutableFile(candidate)) return candidate;
    }
  }
  return null;
};
