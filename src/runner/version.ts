// src/runner/version.ts
import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

import { bold } from '@/runner/util/color';
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_CLI } from '@/runner/util/debug-scopes';

export type VersionInfo = {
  name: string;
  version: string;
  node: string;
  platform: NodeJS.Platform;
  /** Project root the next run would use. */
  root: string;
  /** Config file in effect (null: built-in defaults). */
  configPath: string | null;
};

const pkgSchema = z.object({ name: z.string(), version: z.string() });

/**
 * Nearest package.json above this module. Sources and bundles sit at
 * different depths below the package root.
 */
const findPackageJson = (): string | null => {
  let cur = path.dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = path.join(cur, 'package.json');
    if (existsSync(candidate)) return candidate;
    const parent = path.dirname(cur);
    if (parent === cur) return null;
    cur = parent;
  }
};

/** Tool and runtime details for `--version`. */
export const getVersionInfo = async (
  root: string,
  configPath: string | null,
): Promise<VersionInfo> => {
  let name = 'runtests';
  let version = 'unknown';
  const pkgPath = findPackageJson();
  try {
    if (!pkgPath) throw new Error('no package.json above the CLI');
    const pkg = pkgSchema.parse(JSON.parse(await readFile(pkgPath, 'utf8')));
    ({ name, version } = pkg);
  } catch (e) {
    debugLog(
      DBG_SCOPE_CLI,
      `package.json unreadable: ${e instanceof Error ? e.message : String(e)}`,
    );
  }
  return {
    name,
    version,
    node: process.version,
    platform: process.platform,
    root,
    configPath,
  };
};

export const printVersionInfo = (info: VersionInfo): void => {
  console.log(`${bold(info.name)} ${info.version}`);
  console.log(`node: ${info.node} (${info.platform})`);
  console.log(`root: ${info.root}`);
  console.log(`config: ${info.configPath ?? '(defaults)'}`);
};
