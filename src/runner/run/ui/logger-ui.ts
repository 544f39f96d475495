// src/runner/run/ui/logger-ui.ts
import type { StepResult } from '@/runner/run/types';
import { error, go, ok, separator } from '@/runner/util/color';

import { renderSummary } from './summary';
import type { RunnerUI } from './types';

/** Hint printed after a failed style check. */
export const AUTOFIX_HINT_COMMAND = 'runtests --autofix --nounittests';

/** Line-oriented console UI. */
export class LoggerUI implements RunnerUI {
  onPlan(planBody: string): void {
    console.error(planBody);
  }
  onPythonPath(value: string): void {
    console.log(value);
  }
  onBanner(label: string): void {
    console.log(`${separator()}${go(label)}`);
  }
  onMessage(text: string): void {
    console.log(text);
  }
  onCommand(line: string): void {
    console.log(line);
  }
  onPassed(): void {
    console.log(ok('passed!'));
  }
  onFailed(): void {
    console.log(error('failed!'));
  }
  onStyleFailure(): void {
    console.log(error('Check failed!'));
    console.log(`Please run auto style fixes: ${ok(AUTOFIX_HINT_COMMAND)}`);
  }
  onError(message: string): void {
    console.log(error(`Error: ${message}.`));
    console.log('');
  }
  onDone(): void {
    console.log(ok('done!'));
  }
  onCancelled(): void {
    console.error('runtests: cancelled');
  }
  onSummary(results: readonly StepResult[]): void {
    if (results.length === 0) return;
    console.log(renderSummary(results).trimEnd());
  }
}
