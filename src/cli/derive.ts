// src/cli/derive.ts
import type { RunFlags, RunnerConfig } from '@/runner/run/types';

import type { CliOptions } from './options';

/**
 * Fold parsed options into the run flags.
 *
 * - `--codeformat` enables all five checkers.
 * - `--autofix` enables isort and black in fix mode.
 * - `--quick` forces coverage on.
 * - `-j` falls back to `config.jobs`.
 */
export const deriveRunFlags = (
  options: CliOptions,
  config: Pick<RunnerConfig, 'jobs'>,
): RunFlags => {
  const all = Boolean(options.codeformat);
  const autofix = Boolean(options.autofix);
  const quick = Boolean(options.quick);
  return {
    coverage: Boolean(options.coverage) || quick,
    quick,
    net: Boolean(options.net),
    dryRun: Boolean(options.dryrun),
    unitTests: !options.nounittests,
    zoo: Boolean(options.zoo),
    clean: Boolean(options.clean),
    clangFormat: Boolean(options.clangformat),
    checks: {
      isort: all || autofix || Boolean(options.isort),
      black: all || autofix || Boolean(options.black),
      flake8: all || Boolean(options.flake8),
      pytype: all || Boolean(options.pytype),
      mypy: all || Boolean(options.mypy),
    },
    fix: { isort: autofix, black: autofix },
    jobs: options.jobs ?? config.jobs,
    summary: Boolean(options.summary),
  };
};
