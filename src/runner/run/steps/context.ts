// src/runner/run/steps/context.ts
import type { Executor } from '@/runner/run/exec/executor';
import type { RunFlags, RunnerConfig } from '@/runner/run/types';
import type { RunnerUI } from '@/runner/run/ui/types';

/** Everything a step needs; `state` carries facts discovered by earlier steps. */
export type StepContext = {
  /** Project root; tools run here and receive it as their target. */
  root: string;
  config: RunnerConfig;
  flags: RunFlags;
  exec: Executor;
  ui: RunnerUI;
  platform: NodeJS.Platform;
  state: {
    /** "<major>.<minor>" of the configured interpreter, once probed. */
    pythonVersion?: string;
  };
};
