// src/runner/run/session/index.ts
import type { Executor } from '@/runner/run/exec/executor';
import type { ProcessSupervisor } from '@/runner/run/exec/supervisor';
import { EXIT_SIGINT, yieldToEventLoop } from '@/runner/run/exec/util';
import { buildPlan, hasBanner, renderRunPlan, stepLabel } from '@/runner/run/plan';
import { runStep, type StepContext } from '@/runner/run/steps';
import type {
  RunFlags,
  RunnerConfig,
  RunResult,
  StepResult,
} from '@/runner/run/types';
import type { RunnerUI } from '@/runner/run/ui/types';
import { debugEnabled, debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_SESSION } from '@/runner/util/debug-scopes';

export type SessionArgs = {
  root: string;
  config: RunnerConfig;
  flags: RunFlags;
  /** Already dry-run aware (see createDryRunExecutor). */
  executor: Executor;
  ui: RunnerUI;
  supervisor?: ProcessSupervisor;
  platform?: NodeJS.Platform;
  now?: () => number;
};

/**
 * Walk the plan in order. The first failing step ends the run with its
 * status; exclusive steps end it with 0. Never terminates the process.
 */
export const runSession = async (args: SessionArgs): Promise<RunResult> => {
  const { root, config, flags, executor, ui, supervisor } = args;
  const now = args.now ?? Date.now;
  const steps = buildPlan(flags);
  if (debugEnabled()) ui.onPlan(renderRunPlan(root, steps, flags));

  const ctx: StepContext = {
    root,
    config,
    flags,
    exec: executor,
    ui,
    platform: args.platform ?? process.platform,
    state: {},
  };

  const results: StepResult[] = [];
  let exitCode = 0;
  for (const step of steps) {
    // Let a pending SIGINT land before starting the next tool.
    await yieldToEventLoop();
    if (supervisor?.cancelled) break;

    const label = stepLabel(step);
    if (hasBanner(step)) ui.onBanner(label);
    const startedAt = now();
    const outcome = await runStep(step, ctx);
    const cancelled = supervisor?.cancelled ?? false;
    results.push({
      label,
      status: cancelled ? 'cancelled' : outcome.exitCode === 0 ? 'ok' : 'failed',
      exitCode: outcome.exitCode,
      durationMs: now() - startedAt,
    });
    debugLog(
      DBG_SCOPE_SESSION,
      `${label}: exit ${outcome.exitCode.toString()}${cancelled ? ' (cancelled)' : ''}`,
    );
    if (cancelled) break;
    if (outcome.exitCode !== 0) {
      exitCode = outcome.exitCode;
      break;
    }
    if (outcome.stop) break;
  }

  const cancelled = supervisor?.cancelled ?? false;
  if (cancelled) {
    exitCode = EXIT_SIGINT;
    ui.onCancelled();
  }
  for (const step of steps.slice(results.length)) {
    results.push({
      label: stepLabel(step),
      status: 'skipped',
      exitCode: 0,
      durationMs: 0,
    });
  }
  if (flags.summary) ui.onSummary(results);
  return { exitCode, results, cancelled };
};
