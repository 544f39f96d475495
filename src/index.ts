// src/index.ts
export { makeCli, runCli } from './cli';
export { findConfigPath, type LoadedConfig, loadConfig } from './cli/config/load';
export { configSchema, resolveConfig } from './cli/config/schema';
export { deriveRunFlags } from './cli/derive';
export { normalizeArgv } from './cli/cli-utils';
export {
  buildPlan,
  LoggerUI,
  renderRunPlan,
  runSession,
  runTests,
  stepLabel,
} from './runner/run';
export type {
  CheckTool,
  RunFlags,
  RunnerConfig,
  RunnerUI,
  RunResult,
  Step,
  StepResult,
  StepStatus,
} from './runner/run';
export {
  type CaptureResult,
  createDryRunExecutor,
  createProcessExecutor,
  type Executor,
} from './runner/run/exec/executor';
export { type CommandSpec, renderCommand } from './runner/run/exec/command';
