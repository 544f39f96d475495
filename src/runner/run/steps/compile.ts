// src/runner/run/steps/compile.ts
import { command } from '@/runner/run/exec/command';
import type { StepOutcome } from '@/runner/run/types';

import type { StepContext } from './context';
import { runPreflight } from './preflight';

/** `python setup.py -v develop --uninstall` */
export const uninstallCommand = (python: string) =>
  command(python, ['setup.py', '-v', 'develop', '--uninstall']);

/**
 * Reinstall the package in develop mode, compiling its native extensions.
 * macOS builds use clang explicitly.
 */
export const compileStep = async (ctx: StepContext): Promise<StepOutcome> => {
  const pre = await runPreflight(ctx);
  if (pre !== 0) return { exitCode: pre };

  const { python } = ctx.config;
  ctx.ui.onMessage(
    `Compiling and installing ${ctx.config.package} cpp extensions...`,
  );
  const uninstalled = await ctx.exec.run(uninstallCommand(python));
  if (uninstalled !== 0) return { exitCode: uninstalled };

  const env =
    ctx.platform === 'darwin' ? { CC: 'clang', CXX: 'clang++' } : undefined;
  return {
    exitCode: await ctx.exec.run(
      command(python, ['setup.py', '-v', 'develop'], env),
    ),
  };
};
