/* src/runner/run/exec/executor.ts
 * Command execution: a process-backed executor and a dry-run wrapper.
 */
import { spawn } from 'node:child_process';

import { DBG_SCOPE_EXEC } from '@/runner/util/debug-scopes';
import { debugLog } from '@/runner/util/debug';

import { type CommandSpec, renderCommand } from './command';
import { which as whichOnPath } from './env';
import type { ProcessSupervisor } from './supervisor';
import { EXIT_NOT_FOUND, toExitStatus } from './util';

export type CaptureResult = { exitCode: number; stdout: string };

export type Executor = {
  /** Run with inherited stdio; resolves to the exit status. */
  run(cmd: CommandSpec): Promise<number>;
  /** Run silently and collect stdout (probes; never suppressed by dry run). */
  capture(cmd: CommandSpec): Promise<CaptureResult>;
  /** Resolve an executable on the session PATH. */
  which(tool: string): string | null;
  /** Add a variable to the environment of every later command. */
  exportEnv(name: string, value: string): void;
};

export type ProcessExecutorOptions = {
  cwd: string;
  env: NodeJS.ProcessEnv;
  supervisor?: ProcessSupervisor;
};

let seq = 0;

const spawnAndWait = (
  cmd: CommandSpec,
  opts: ProcessExecutorOptions,
  env: NodeJS.ProcessEnv,
  onStdout?: (chunk: Buffer) => void,
): Promise<number> =>
  new Promise<number>((resolveP) => {
    const key = `${cmd.file}#${(seq += 1).toString()}`;
    debugLog(DBG_SCOPE_EXEC, `spawn ${renderCommand(cmd)}`);
    const child = spawn(cmd.file, cmd.args, {
      cwd: opts.cwd,
      env: { ...env, ...cmd.env },
      stdio: onStdout ? ['ignore', 'pipe', 'pipe'] : 'inherit',
      windowsHide: true,
    });
    if (typeof child.pid === 'number') opts.supervisor?.track(key, child.pid);
    if (onStdout) child.stdout?.on('data', onStdout);
    // Captured stderr goes to the debug log; the pipe must keep draining.
    const stderr: Buffer[] = [];
    child.stderr?.on('data', (chunk: Buffer) => {
      stderr.push(chunk);
    });

    let settled = false;
    const settle = (status: number): void => {
      if (settled) return;
      settled = true;
      opts.supervisor?.untrack(key);
      const diag = Buffer.concat(stderr).toString('utf8').trim();
      if (diag) debugLog(DBG_SCOPE_EXEC, `stderr ${cmd.file}: ${diag}`);
      debugLog(DBG_SCOPE_EXEC, `exit ${cmd.file}: ${status.toString()}`);
      resolveP(status);
    };
    child.on('error', (e) => {
      const code = 'code' in e ? e.code : undefined;
      console.error(
        code === 'ENOENT'
          ? `runtests: ${cmd.file}: command not found`
          : `runtests: ${cmd.file}: ${e.message}`,
      );
      settle(code === 'ENOENT' ? EXIT_NOT_FOUND : 1);
    });
    child.on('close', (code, signal) => settle(toExitStatus(code, signal)));
  });

/** Executor that spawns real child processes (no shell). */
export const createProcessExecutor = (
  opts: ProcessExecutorOptions,
): Executor => {
  const env: NodeJS.ProcessEnv = { ...opts.env };
  return {
    run: (cmd) => spawnAndWait(cmd, opts, env),
    capture: async (cmd) => {
      const chunks: Buffer[] = [];
      const exitCode = await spawnAndWait(cmd, opts, env, (c) => {
        chunks.push(c);
      });
      return { exitCode, stdout: Buffer.concat(chunks).toString('utf8') };
    },
    which: (tool) => whichOnPath(tool, env),
    exportEnv: (name, value) => {
      env[name] = value;
    },
  };
};

/** Indentation used for echoed dry-run commands. */
export const DRY_RUN_INDENT = '     ';

/**
 * Wrap an executor so `run` prints the command instead of executing it.
 * Probes and PATH lookups still reach the wrapped executor.
 */
export const createDryRunExecutor = (
  inner: Executor,
  print: (line: string) => void,
): Executor => ({
  run: (cmd) => {
    print(`${DRY_RUN_INDENT}${renderCommand(cmd)}`);
    return Promise.resolve(0);
  },
  capture: (cmd) => inner.capture(cmd),
  which: (tool) => inner.which(tool),
  exportEnv: (name, value) => {
    inner.exportEnv(name, value);
  },
});
