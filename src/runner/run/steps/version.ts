// src/runner/run/steps/version.ts
import { command, type CommandSpec } from '@/runner/run/exec/command';
import type { StepOutcome } from '@/runner/run/types';

import type { StepContext } from './context';

/** `python -c 'import <pkg>; <pkg>.config.print_config()'` */
export const printConfigCommand = (python: string, pkg: string): CommandSpec =>
  command(python, ['-c', `import ${pkg}; ${pkg}.config.print_config()`]);

/** Report the installed library's configuration (always part of a run). */
export const versionStep = async (ctx: StepContext): Promise<StepOutcome> => ({
  exitCode: await ctx.exec.run(
    printConfigCommand(ctx.config.python, ctx.config.package),
  ),
});
