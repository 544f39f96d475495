// src/runner/run/steps/index.ts
import type { Step, StepOutcome } from '@/runner/run/types';

import { checkStep } from './checks';
import { clangFormatStep } from './clang-format';
import { cleanStep } from './clean';
import { compileStep } from './compile';
import type { StepContext } from './context';
import {
  coverageEraseStep,
  coverageReportStep,
  netStep,
  quickStep,
  unittestsStep,
  zooStep,
} from './unittests';
import { versionStep } from './version';

export type { StepContext } from './context';

/** Dispatch one planned step. */
export const runStep = (step: Step, ctx: StepContext): Promise<StepOutcome> => {
  switch (step.kind) {
    case 'dryrun':
      // Banner only; the session already swapped in the dry-run executor.
      return Promise.resolve({ exitCode: 0 });
    case 'clean':
      return cleanStep(ctx);
    case 'clangformat':
      return clangFormatStep(ctx);
    case 'compile':
      return compileStep(ctx);
    case 'version':
      return versionStep(ctx);
    case 'check':
      return checkStep(ctx, step.tool, step.fix);
    case 'quick':
      return quickStep(ctx);
    case 'coverage-erase':
      return coverageEraseStep(ctx);
    case 'unittests':
      return unittestsStep(ctx, step.coverage);
    case 'net':
      return netStep(ctx, step.coverage);
    case 'zoo':
      return zooStep(ctx);
    case 'coverage-report':
      return coverageReportStep(ctx);
  }
};
