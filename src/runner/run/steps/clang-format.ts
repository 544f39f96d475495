// src/runner/run/steps/clang-format.ts
import { command } from '@/runner/run/exec/command';
import type { StepOutcome } from '@/runner/run/types';

import type { StepContext } from './context';

const REQUIRED_TOOLS = ['clang-format', 'git'] as const;

/** Git-tracked paths containing the native sources directory. */
export const selectNativeSources = (
  lsFilesOutput: string,
  csrc: string,
): string[] => {
  const needle = csrc.replace(/\\/g, '/').replace(/\/+$/, '');
  return lsFilesOutput
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0 && l.includes(needle));
};

/** Rewrite tracked native sources in place with the repo's .clang-format style. */
export const clangFormatStep = async (
  ctx: StepContext,
): Promise<StepOutcome> => {
  ctx.ui.onMessage('Running clang-format...');
  for (const tool of REQUIRED_TOOLS) {
    if (!ctx.exec.which(tool)) {
      ctx.ui.onMessage(`'${tool}' not found, skipping the formatting.`);
      return { exitCode: 1 };
    }
  }

  const listed = await ctx.exec.capture(command('git', ['ls-files']));
  if (listed.exitCode !== 0) return { exitCode: listed.exitCode };

  const files = selectNativeSources(listed.stdout, ctx.config.csrc);
  if (files.length > 0) {
    const status = await ctx.exec.run(
      command('clang-format', ['-style=file', '-i', ...files]),
    );
    if (status !== 0) return { exitCode: status };
  } else {
    ctx.ui.onMessage(`No tracked files under ${ctx.config.csrc}.`);
  }

  ctx.ui.onDone();
  return { exitCode: 0, stop: true };
};
