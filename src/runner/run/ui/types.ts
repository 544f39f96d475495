// src/runner/run/ui/types.ts
import type { StepResult } from '@/runner/run/types';

/** Output surface of a run; the session never writes to the console directly. */
export type RunnerUI = {
  /** Multi-line plan (printed in debug mode). */
  onPlan(planBody: string): void;
  /** Echo of the effective PYTHONPATH at start-up. */
  onPythonPath(value: string): void;
  /** Stage banner (separator + label). */
  onBanner(label: string): void;
  /** Plain informational line. */
  onMessage(text: string): void;
  /** Echoed dry-run command line (already indented). */
  onCommand(line: string): void;
  onPassed(): void;
  /** Generic failure word for checkers without fix hints. */
  onFailed(): void;
  /** Style checker failure: "Check failed!" plus the autofix hint. */
  onStyleFailure(): void;
  /** "Error: <message>." followed by a blank line. */
  onError(message: string): void;
  /** Completion of an exclusive step. */
  onDone(): void;
  onCancelled(): void;
  onSummary(results: readonly StepResult[]): void;
};
