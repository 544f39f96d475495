/* scripts/bundle.ts
 * Bundle the CLI and the library entry with esbuild. The `@/` aliases are
 * resolved from tsconfig.json; npm dependencies stay external imports.
 */
import { chmod } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { build } from 'esbuild';

export const PROJECT_ROOT = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '..',
);

/** Output path of the bundled executable, relative to the out directory. */
export const BIN_OUTPUT = path.join('cli', 'runtests.js');

/**
 * Write `cli/runtests.js` and `index.js` (ESM, Node 20) under outdir.
 *
 * @returns Absolute path of the executable.
 */
export const bundle = async (outdir: string): Promise<string> => {
  await build({
    absWorkingDir: PROJECT_ROOT,
    entryPoints: {
      'cli/runtests': 'src/cli/bin/runtests.ts',
      index: 'src/index.ts',
    },
    outdir,
    bundle: true,
    platform: 'node',
    format: 'esm',
    target: 'node20',
    packages: 'external',
    tsconfig: 'tsconfig.json',
    sourcemap: true,
    logLevel: 'warning',
  });
  const bin = path.resolve(PROJECT_ROOT, outdir, BIN_OUTPUT);
  await chmod(bin, 0o755);
  return bin;
};
