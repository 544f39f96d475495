// src/runner/run/service.ts
import {
  createDryRunExecutor,
  createProcessExecutor,
  type Executor,
} from '@/runner/run/exec/executor';
import { buildChildEnv } from '@/runner/run/exec/env';
import { ProcessSupervisor } from '@/runner/run/exec/supervisor';
import type { RunFlags, RunnerConfig, RunResult } from '@/runner/run/types';
import type { RunnerUI } from '@/runner/run/ui/types';

import { runSession } from './session';
import { attachSessionSignals } from './session/signals';

export type RunTestsArgs = {
  root: string;
  config: RunnerConfig;
  flags: RunFlags;
  ui: RunnerUI;
  /** Parent environment; defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  /** Override the process executor (tests). */
  executor?: Executor;
};

/**
 * Run the planned stages for a loaded project.
 *
 * Echoes the effective PYTHONPATH, wires SIGINT to the process supervisor
 * and wraps the executor for dry runs.
 */
export const runTests = async (args: RunTestsArgs): Promise<RunResult> => {
  const { root, config, flags, ui } = args;
  const env = buildChildEnv(root, args.env ?? process.env);
  ui.onPythonPath(env.PYTHONPATH ?? '');

  const supervisor = new ProcessSupervisor();
  const base =
    args.executor ?? createProcessExecutor({ cwd: root, env, supervisor });
  const executor = flags.dryRun
    ? createDryRunExecutor(base, (line) => {
        ui.onCommand(line);
      })
    : base;

  const detach = attachSessionSignals(() => {
    supervisor.cancel();
  });
  try {
    return await runSession({
      root,
      config,
      flags,
      executor,
      ui,
      supervisor,
    });
  } finally {
    detach();
  }
};
