// src/runner/run/steps/unittests.ts
import fg from 'fast-glob';

import { command, type CommandSpec } from '@/runner/run/exec/command';
import type { StepOutcome } from '@/runner/run/types';
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_SESSION } from '@/runner/util/debug-scopes';

import type { StepContext } from './context';

export const TORCH_VALIDATE_SCRIPT =
  'import torch; print(torch.__version__); print(torch.rand(5,3))';

/** Test runner prefix: plain python3, or coverage appending to the data file. */
export const testRunner = (coverage: boolean): [string, string[]] =>
  coverage ? ['coverage', ['run', '-a', '--source', '.']] : ['python3', []];

const withRunner = (coverage: boolean, args: string[]): CommandSpec => {
  const [file, prefix] = testRunner(coverage);
  return command(file, [...prefix, ...args]);
};

/** Quick mode: later commands see QUICKTEST=True so slow tests skip themselves. */
export const quickStep = (ctx: StepContext): Promise<StepOutcome> => {
  ctx.exec.exportEnv('QUICKTEST', 'True');
  return Promise.resolve({ exitCode: 0 });
};

/** Clear previous coverage data before the test steps append to it. */
export const coverageEraseStep = async (
  ctx: StepContext,
): Promise<StepOutcome> => ({
  exitCode: await ctx.exec.run(command('coverage', ['erase'])),
});

/** Torch sanity check, then `<runner> -m unittest -v`. */
export const unittestsStep = async (
  ctx: StepContext,
  coverage: boolean,
): Promise<StepOutcome> => {
  const torch = await ctx.exec.run(
    command(ctx.config.python, ['-c', TORCH_VALIDATE_SCRIPT]),
  );
  if (torch !== 0) return { exitCode: torch };
  const tests = withRunner(coverage, ['-m', 'unittest', '-v']);
  return { exitCode: await ctx.exec.run(tests) };
};

/** Root-relative integration scripts matching the configured glob, sorted. */
export const findIntegrationTests = async (
  ctx: StepContext,
): Promise<string[]> => {
  const files = await fg(ctx.config.integration, {
    cwd: ctx.root,
    onlyFiles: true,
  });
  return files.sort();
};

/** Run each network integration script in turn; the first failure ends the run. */
export const netStep = async (
  ctx: StepContext,
  coverage: boolean,
): Promise<StepOutcome> => {
  const files = await findIntegrationTests(ctx);
  if (files.length === 0)
    debugLog(
      DBG_SCOPE_SESSION,
      `no integration scripts match ${ctx.config.integration}`,
    );
  for (const file of files) {
    ctx.ui.onMessage(file);
    const status = await ctx.exec.run(withRunner(coverage, [file]));
    if (status !== 0) return { exitCode: status };
  }
  return { exitCode: 0 };
};

/** Model-zoo tests were never implemented; the flag fails loudly. */
export const ZOO_EXIT_CODE = 255;

export const zooStep = (ctx: StepContext): Promise<StepOutcome> => {
  ctx.ui.onError('--zoo option not yet implemented');
  return Promise.resolve({ exitCode: ZOO_EXIT_CODE });
};

export const coverageReportStep = async (
  ctx: StepContext,
): Promise<StepOutcome> => ({
  exitCode: await ctx.exec.run(
    command('coverage', ['report', '--skip-covered', '-m']),
  ),
});
