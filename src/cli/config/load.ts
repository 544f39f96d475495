/* src/cli/config/load.ts
 * Locate and validate runtests configuration (runtests.config.yml|yaml|json).
 * The directory holding the config file is the project root; without a file
 * the working directory is used with built-in defaults.
 */
import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { ZodError } from 'zod';

import { resolveConfig } from '@/cli/config/schema';
import { parseText } from '@/common/config/parse';
import type { RunnerConfig } from '@/runner/run/types';
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_CONFIG_LOAD } from '@/runner/util/debug-scopes';

export const CONFIG_FILE_NAMES: readonly string[] = [
  'runtests.config.yml',
  'runtests.config.yaml',
  'runtests.config.json',
];

export type LoadedConfig = {
  /** Project root: directory of the config file, else the working directory. */
  root: string;
  /** Absolute config path (null when running on defaults). */
  path: string | null;
  config: RunnerConfig;
};

const formatZodError = (e: unknown): string =>
  e instanceof ZodError
    ? e.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('\n')
    : String(e);

/** Find the nearest runtests.config.* walking up from cwd; null when none. */
export const findConfigPath = (cwd: string): string | null => {
  let cur = path.resolve(cwd);
  for (;;) {
    for (const name of CONFIG_FILE_NAMES) {
      const candidate = path.join(cur, name);
      if (existsSync(candidate)) return candidate;
    }
    const parent = path.dirname(cur);
    if (parent === cur) return null;
    cur = parent;
  }
};

/**
 * Load the nearest config and apply defaults.
 *
 * @param cwd - Directory to start the search from.
 * @throws Error with one line per schema issue when the file is invalid.
 */
export const loadConfig = async (cwd: string): Promise<LoadedConfig> => {
  const cfgPath = findConfigPath(cwd);
  if (!cfgPath) {
    debugLog(DBG_SCOPE_CONFIG_LOAD, 'no config file; using defaults');
    return { root: path.resolve(cwd), path: null, config: resolveConfig({}) };
  }
  debugLog(DBG_SCOPE_CONFIG_LOAD, `using ${cfgPath}`);
  const rel = cfgPath.replace(/\\/g, '/');
  let node: unknown;
  try {
    node = parseText(cfgPath, await readFile(cfgPath, 'utf8'));
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`runtests: unable to parse ${rel}\n${msg}`);
  }
  try {
    return {
      root: path.dirname(cfgPath),
      path: cfgPath,
      config: resolveConfig(node),
    };
  } catch (e) {
    throw new Error(`runtests: invalid config in ${rel}\n${formatZodError(e)}`);
  }
};
