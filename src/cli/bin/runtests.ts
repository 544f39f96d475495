#!/usr/bin/env node
// src/cli/bin/runtests.ts
// CLI bootstrap: resolve the exit status and let Node exit on its own.
import { runCli } from '..';

void runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err instanceof Error ? (err.stack ?? err.message) : err);
    process.exitCode = 1;
  },
);
