// src/runner/run/ui/summary.ts
import { table } from 'table';

import type { StepResult, StepStatus } from '@/runner/run/types';
import { bold, dim, error, ok, stripAnsi, warn } from '@/runner/util/color';

export const pad2 = (n: number): string => n.toString().padStart(2, '0');

export const fmtMs = (ms: number): string => {
  if (ms < 0) ms = 0;
  const s = Math.floor(ms / 1000);
  const mm = Math.floor(s / 60);
  const ss = s % 60;
  return `${pad2(mm)}:${pad2(ss)}`;
};

const statusText = (status: StepStatus): string => {
  switch (status) {
    case 'ok':
      return ok('ok');
    case 'failed':
      return error('failed');
    case 'cancelled':
      return warn('cancelled');
    case 'skipped':
      return dim('skipped');
  }
};

export const headerCells = (): string[] =>
  ['Step', 'Status', 'Exit', 'Time'].map((h) => bold(h));

/** Borderless, left-aligned table of step results. */
export const renderSummary = (results: readonly StepResult[]): string =>
  table(
    [
      headerCells(),
      ...results.map((r) => [
        r.label,
        statusText(r.status),
        r.exitCode.toString(),
        fmtMs(r.durationMs),
      ]),
    ],
    {
      border: {
        topBody: ``,
        topJoin: ``,
        topLeft: ``,
        topRight: ``,
        bottomBody: ``,
        bottomJoin: ``,
        bottomLeft: ``,
        bottomRight: ``,
        bodyLeft: ``,
        bodyRight: ``,
        bodyJoin: ``,
        joinBody: ``,
        joinLeft: ``,
        joinRight: ``,
        joinJoin: ``,
      },
      drawHorizontalLine: () => false,
      columns: {
        0: { alignment: 'left' },
        1: { alignment: 'left' },
        2: { alignment: 'left' },
        3: { alignment: 'left' },
      },
    },
  );
