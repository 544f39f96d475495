// src/runner/run/steps/checks.ts
import path from 'node:path';

import { command, type CommandSpec } from '@/runner/run/exec/command';
import type { CheckTool, StepOutcome } from '@/runner/run/types';
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_SESSION } from '@/runner/util/debug-scopes';

import type { StepContext } from './context';
import { probePythonVersion } from './preflight';

/** How a failing checker reports itself. */
type FailureStyle = 'style' | 'plain' | 'silent';

type CheckSpec = {
  build: (ctx: StepContext, fix: boolean) => CommandSpec | Promise<CommandSpec>;
  failure: FailureStyle;
  /** mypy's own output already says whether it passed. */
  reportPass: boolean;
};

const formatter =
  (tool: 'isort' | 'black') =>
  (ctx: StepContext, fix: boolean): CommandSpec =>
    command(tool, fix ? [ctx.root] : ['--check', ctx.root]);

const pythonVersionFor = async (ctx: StepContext): Promise<string> => {
  if (ctx.state.pythonVersion) return ctx.state.pythonVersion;
  const probed = await probePythonVersion(ctx);
  if (probed) ctx.state.pythonVersion = probed;
  return probed ?? 'unknown';
};

export const CHECKS: Record<CheckTool, CheckSpec> = {
  isort: { build: formatter('isort'), failure: 'style', reportPass: true },
  black: { build: formatter('black'), failure: 'style', reportPass: true },
  flake8: {
    build: (ctx) => command('flake8', [ctx.root, '--count', '--statistics']),
    failure: 'style',
    reportPass: true,
  },
  pytype: {
    build: async (ctx) =>
      command('pytype', [
        '-j',
        ctx.flags.jobs.toString(),
        `--python-version=${await pythonVersionFor(ctx)}`,
      ]),
    failure: 'plain',
    reportPass: true,
  },
  mypy: {
    build: (ctx) =>
      command('mypy', [ctx.root], {
        MYPYPATH: path.join(ctx.root, ctx.config.package),
      }),
    failure: 'silent',
    reportPass: false,
  },
};

/** `python -m pip install -r <requirements>` */
export const installDepsCommand = (python: string, requirements: string) =>
  command(python, ['-m', 'pip', 'install', '-r', requirements]);

/**
 * Install the development requirements when `tool` is not on PATH.
 * The install status is not fatal: the check itself reports a missing tool.
 */
export const ensureTool = async (
  ctx: StepContext,
  tool: CheckTool,
): Promise<void> => {
  if (ctx.exec.which(tool)) return;
  ctx.ui.onMessage(
    `Pip installing ${ctx.config.package} development dependencies...`,
  );
  const status = await ctx.exec.run(
    installDepsCommand(ctx.config.python, ctx.config.requirements),
  );
  if (status !== 0)
    debugLog(DBG_SCOPE_SESSION, `pip install exited ${status.toString()}`);
};

/** Run one static checker; a non-zero status ends the run with that status. */
export const checkStep = async (
  ctx: StepContext,
  tool: CheckTool,
  fix: boolean,
): Promise<StepOutcome> => {
  const spec = CHECKS[tool];
  await ensureTool(ctx, tool);
  await ctx.exec.run(command(tool, ['--version']));

  const status = await ctx.exec.run(await spec.build(ctx, fix));
  if (status !== 0) {
    if (spec.failure === 'style') ctx.ui.onStyleFailure();
    else if (spec.failure === 'plain') ctx.ui.onFailed();
    return { exitCode: status };
  }
  if (spec.reportPass) ctx.ui.onPassed();
  return { exitCode: 0 };
};
