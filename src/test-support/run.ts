// src/test-support/run.ts
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { resolveConfig } from '@/cli/config/schema';
import type { StepContext } from '@/runner/run/steps';
import type { RunFlags, RunnerConfig, StepResult } from '@/runner/run/types';
import type { RunnerUI } from '@/runner/run/ui/types';
import { FakeExecutor } from '@/test/fake-executor';

export const writeScript = async (
  root: string,
  rel: string,
  src: string,
): Promise<string> => {
  const abs = path.join(root, rel);
  await mkdir(path.dirname(abs), { recursive: true });
  await writeFile(abs, src, 'utf8');
  return abs;
};

export const makeTempDir = (prefix = 'runtests-'): Promise<string> =>
  mkdtemp(path.join(os.tmpdir(), prefix));

export const removeDir = (dir: string): Promise<void> =>
  rm(dir, { recursive: true, force: true });

/** All switches off; override what a test needs. */
export const makeFlags = (over: Partial<RunFlags> = {}): RunFlags => ({
  coverage: false,
  quick: false,
  net: false,
  dryRun: false,
  unitTests: false,
  zoo: false,
  clean: false,
  clangFormat: false,
  checks: {
    isort: false,
    black: false,
    flake8: false,
    pytype: false,
    mypy: false,
  },
  fix: { isort: false, black: false },
  jobs: 1,
  summary: false,
  ...over,
});

/** UI that records every event as a line. */
export class RecordingUI implements RunnerUI {
  readonly lines: string[] = [];
  summary: readonly StepResult[] | null = null;

  onPlan(planBody: string): void {
    this.lines.push(`plan:${planBody}`);
  }
  onPythonPath(value: string): void {
    this.lines.push(`pythonpath:${value}`);
  }
  onBanner(label: string): void {
    this.lines.push(`banner:${label}`);
  }
  onMessage(text: string): void {
    this.lines.push(`message:${text}`);
  }
  onCommand(line: string): void {
    this.lines.push(`command:${line}`);
  }
  onPassed(): void {
    this.lines.push('passed');
  }
  onFailed(): void {
    this.lines.push('failed');
  }
  onStyleFailure(): void {
    this.lines.push('style-failure');
  }
  onError(message: string): void {
    this.lines.push(`error:${message}`);
  }
  onDone(): void {
    this.lines.push('done');
  }
  onCancelled(): void {
    this.lines.push('cancelled');
  }
  onSummary(results: readonly StepResult[]): void {
    this.summary = results;
  }
}

/** Step context over a FakeExecutor and a RecordingUI. */
export const makeContext = (args: {
  root?: string;
  config?: Partial<RunnerConfig>;
  flags?: Partial<RunFlags>;
  exec?: FakeExecutor;
  platform?: NodeJS.Platform;
}): StepContext & { exec: FakeExecutor; ui: RecordingUI } => ({
  root: args.root ?? '/work/proj',
  config: { ...resolveConfig({}), ...args.config },
  flags: makeFlags(args.flags),
  exec: args.exec ?? new FakeExecutor(),
  ui: new RecordingUI(),
  platform: args.platform ?? 'linux',
  state: {},
});
