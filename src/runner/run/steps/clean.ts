// src/runner/run/steps/clean.ts
import path from 'node:path';

import fg from 'fast-glob';
import { remove } from 'fs-extra/esm';

import { quoteArg } from '@/runner/run/exec/command';
import { DRY_RUN_INDENT } from '@/runner/run/exec/executor';
import type { RunnerConfig, StepOutcome } from '@/runner/run/types';
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_CLEAN } from '@/runner/util/debug-scopes';

import { uninstallCommand } from './compile';
import type { StepContext } from './context';

const GLOB_IGNORE = ['**/.git/**'];

/** Drop entries that live inside another entry (removed with their parent). */
const pruneNested = (paths: readonly string[]): string[] => {
  const sorted = [...new Set(paths)].sort();
  const out: string[] = [];
  for (const p of sorted) {
    const parent = out.find((q) => p.startsWith(q + path.sep));
    if (!parent) out.push(p);
  }
  return out;
};

/**
 * Absolute paths removed by --clean: files matching `clean.files` and
 * directories named in `clean.dirs`, anywhere below the root.
 */
export const collectCleanTargets = async (
  root: string,
  clean: RunnerConfig['clean'],
): Promise<string[]> => {
  const files = clean.files.length
    ? await fg(clean.files, {
        cwd: root,
        absolute: true,
        dot: true,
        onlyFiles: true,
        followSymbolicLinks: false,
        ignore: GLOB_IGNORE,
      })
    : [];
  const dirs = clean.dirs.length
    ? await fg(
        clean.dirs.map((d) => `**/${fg.escapePath(d)}`),
        {
          cwd: root,
          absolute: true,
          dot: true,
          onlyDirectories: true,
          followSymbolicLinks: false,
          ignore: GLOB_IGNORE,
        },
      )
    : [];
  debugLog(
    DBG_SCOPE_CLEAN,
    `matched ${files.length.toString()} files, ${dirs.length.toString()} dirs`,
  );
  return pruneNested([...files, ...dirs].map((p) => path.resolve(p)));
};

/** Uninstall the develop build and delete temporary files, then stop the run. */
export const cleanStep = async (ctx: StepContext): Promise<StepOutcome> => {
  ctx.ui.onMessage(`Uninstalling ${ctx.config.package} development files...`);
  const uninstalled = await ctx.exec.run(uninstallCommand(ctx.config.python));
  if (uninstalled !== 0) return { exitCode: uninstalled };

  ctx.ui.onMessage(`Removing temporary files in ${ctx.root}`);
  const targets = await collectCleanTargets(ctx.root, ctx.config.clean);
  for (const abs of targets) {
    const rel = path.relative(ctx.root, abs).replace(/\\/g, '/');
    if (ctx.flags.dryRun) {
      ctx.ui.onCommand(`${DRY_RUN_INDENT}rm -r ${quoteArg(rel)}`);
      continue;
    }
    try {
      await remove(abs);
    } catch (e) {
      ctx.ui.onError(
        `Could not remove ${rel}: ${e instanceof Error ? e.message : String(e)}`,
      );
      return { exitCode: 1 };
    }
  }

  ctx.ui.onDone();
  return { exitCode: 0, stop: true };
};
