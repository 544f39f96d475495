// src/runner/run/types.ts

/** Static checkers the runner knows how to drive. */
export type CheckTool = 'isort' | 'black' | 'flake8' | 'pytype' | 'mypy';

/**
 * Resolved switches for one invocation. Implications between CLI flags
 * (codeformat, autofix, quick ⇒ coverage) are already folded in.
 */
export type RunFlags = {
  coverage: boolean;
  quick: boolean;
  net: boolean;
  dryRun: boolean;
  unitTests: boolean;
  zoo: boolean;
  clean: boolean;
  clangFormat: boolean;
  /** Enabled checkers; isort/black may be in fix mode. */
  checks: Record<CheckTool, boolean>;
  fix: { isort: boolean; black: boolean };
  /** Parallel jobs for pytype. */
  jobs: number;
  summary: boolean;
};

/**
 * One banner‑delimited stage of a run, in execution order.
 * `clean` and `clangformat` are exclusive: when planned they are the only work step.
 */
export type Step =
  | { kind: 'dryrun' }
  | { kind: 'clean' }
  | { kind: 'clangformat' }
  | { kind: 'compile' }
  | { kind: 'version' }
  | { kind: 'check'; tool: CheckTool; fix: boolean }
  | { kind: 'quick' }
  | { kind: 'coverage-erase' }
  | { kind: 'unittests'; coverage: boolean }
  | { kind: 'net'; coverage: boolean }
  | { kind: 'zoo' }
  | { kind: 'coverage-report' };

export type StepStatus = 'ok' | 'failed' | 'skipped' | 'cancelled';

export type StepResult = {
  /** Display label (matches the banner). */
  label: string;
  status: StepStatus;
  exitCode: number;
  durationMs: number;
};

/**
 * Outcome reported by a step implementation.
 * - `exitCode !== 0` ends the run with that status.
 * - `stop: true` ends the run after this step even on success (exclusive steps).
 */
export type StepOutcome = {
  exitCode: number;
  stop?: boolean;
};

export type RunResult = {
  exitCode: number;
  results: StepResult[];
  cancelled: boolean;
};

/** Project configuration with every default applied. */
export type RunnerConfig = {
  /** Import name of the library under test (e.g. "monai"). */
  package: string;
  /** Interpreter used for setup.py, pip and probes. */
  python: string;
  /** Requirements file installed when a checker is missing. */
  requirements: string;
  /** Native sources directory (relative to the root) formatted by clang-format. */
  csrc: string;
  /** Glob (relative to the root) of network integration scripts. */
  integration: string;
  /** Minimum interpreter version, "<major>.<minor>". */
  minPython: string;
  /** Default pytype parallelism. */
  jobs: number;
  /** Issue tracker URL shown in the help footer. */
  issues: string | null;
  clean: {
    /** File globs removed by --clean. */
    files: string[];
    /** Directory names removed anywhere below the root. */
    dirs: string[];
  };
  cliDefaults: { debug: boolean; boring: boolean };
};
