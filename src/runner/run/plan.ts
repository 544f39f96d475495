// src/runner/run/plan.ts
import { bold } from '@/runner/util/color';

import type { CheckTool, RunFlags, Step } from './types';

/** Checker order is fixed: import sorting and formatting before linting and typing. */
export const CHECK_ORDER: readonly CheckTool[] = [
  'isort',
  'black',
  'flake8',
  'pytype',
  'mypy',
];

const isFixable = (tool: CheckTool): tool is 'isort' | 'black' =>
  tool === 'isort' || tool === 'black';

/**
 * Build the ordered list of steps for a set of flags (pure).
 *
 * @param flags - Resolved run flags.
 * @returns Steps in execution order.
 */
export const buildPlan = (flags: RunFlags): Step[] => {
  const steps: Step[] = [];
  if (flags.dryRun) steps.push({ kind: 'dryrun' });

  if (flags.clean) return [...steps, { kind: 'clean' }];
  if (flags.clangFormat) return [...steps, { kind: 'clangformat' }];

  steps.push({ kind: 'compile' }, { kind: 'version' });

  for (const tool of CHECK_ORDER) {
    if (!flags.checks[tool]) continue;
    steps.push({
      kind: 'check',
      tool,
      fix: isFixable(tool) ? flags.fix[tool] : false,
    });
  }

  if (flags.quick) steps.push({ kind: 'quick' });
  if (flags.coverage) steps.push({ kind: 'coverage-erase' });
  if (flags.unitTests)
    steps.push({ kind: 'unittests', coverage: flags.coverage });
  if (flags.net) steps.push({ kind: 'net', coverage: flags.coverage });
  if (flags.zoo) steps.push({ kind: 'zoo' });
  if (flags.coverage) steps.push({ kind: 'coverage-report' });
  return steps;
};

/** Display label for a step (also used as its banner). */
export const stepLabel = (step: Step): string => {
  switch (step.kind) {
    case 'clangformat':
      return 'clang-formatting';
    case 'check':
      return step.fix ? `${step.tool}-fix` : step.tool;
    case 'coverage-erase':
    case 'coverage-report':
      return 'coverage';
    default:
      return step.kind;
  }
};

/** Steps that announce themselves with their own message instead of a banner. */
export const hasBanner = (step: Step): boolean =>
  step.kind !== 'compile' && step.kind !== 'version';

/**
 * Render a readable, multi‑line summary of the plan (pure).
 *
 * @param root - Project root the tools run in.
 * @param steps - Planned steps.
 * @param flags - Flags the plan was built from.
 */
export const renderRunPlan = (
  root: string,
  steps: readonly Step[],
  flags: RunFlags,
): string => {
  const work = steps.filter((s) => s.kind !== 'dryrun').map(stepLabel);
  const lines = [
    bold('runtests plan'),
    `root: ${root.replace(/\\/g, '/')}`,
    `steps: ${work.length ? work.join(', ') : 'none'}`,
    `dry run: ${flags.dryRun ? 'yes' : 'no'}`,
    `coverage: ${flags.coverage ? 'yes' : 'no'}`,
    `quick: ${flags.quick ? 'yes' : 'no'}`,
    `pytype jobs: ${flags.jobs.toString()}`,
  ];
  return `runtests:\n  ${lines.join('\n  ')}`;
};
