// src/runner/run/index.ts
export { buildPlan, renderRunPlan, stepLabel } from './plan';
export { runTests, type RunTestsArgs } from './service';
export { runSession, type SessionArgs } from './session';
export type {
  CheckTool,
  RunFlags,
  RunnerConfig,
  RunResult,
  Step,
  StepResult,
  StepStatus,
} from './types';
export { LoggerUI } from './ui/logger-ui';
export type { RunnerUI } from './ui/types';
