import { afterEach, describe, expect, it, vi } from 'vitest';

import { resolveConfig } from '@/cli/config/schema';
import { command, renderCommand } from '@/runner/run/exec/command';
import { ProcessSupervisor } from '@/runner/run/exec/supervisor';
import { PYTHON_VERSION_SCRIPT } from '@/runner/run/steps/preflight';
import type { RunFlags } from '@/runner/run/types';
import { FakeExecutor, type FakeExecutorOptions } from '@/test/fake-executor';
import { makeFlags, RecordingUI } from '@/test-support/run';

import { runSession } from '.';

const ROOT = '/work/proj';
const PROBE = renderCommand(command('python', ['-c', PYTHON_VERSION_SCRIPT]));

const executor = (opts: FakeExecutorOptions = {}) =>
  new FakeExecutor({
    captures: { [PROBE]: { exitCode: 0, stdout: '3.9\n' } },
    ...opts,
  });

const session = (
  flags: Partial<RunFlags>,
  exec: FakeExecutor = executor(),
  supervisor?: ProcessSupervisor,
) => {
  const ui = new RecordingUI();
  let t = 0;
  const run = runSession({
    root: ROOT,
    config: resolveConfig({}),
    flags: makeFlags(flags),
    executor: exec,
    ui,
    supervisor,
    platform: 'linux',
    now: () => (t += 1000),
  });
  return { run, ui, exec };
};

afterEach(() => {
  delete process.env.RUNTESTS_DEBUG;
  vi.restoreAllMocks();
});

describe('runSession', () => {
  it('runs the plan in order', async () => {
    const { run, ui, exec } = session({
      unitTests: true,
      checks: {
        isort: true,
        black: false,
        flake8: false,
        pytype: false,
        mypy: false,
      },
    });
    const result = await run;
    expect(result.exitCode).toBe(0);
    expect(result.cancelled).toBe(false);
    expect(exec.ran).toEqual([
      'python setup.py -v develop --uninstall',
      'python setup.py -v develop',
      `python -c 'import monai; monai.config.print_config()'`,
      'python -m pip install -r requirements-dev.txt',
      'isort --version',
      `isort --check ${ROOT}`,
      `python -c 'import torch; print(torch.__version__); print(torch.rand(5,3))'`,
      'python3 -m unittest -v',
    ]);
    expect(ui.lines).toEqual([
      'message:Compiling and installing monai cpp extensions...',
      'banner:isort',
      'message:Pip installing monai development dependencies...',
      'passed',
      'banner:unittests',
    ]);
    expect(result.results).toEqual([
      { label: 'compile', status: 'ok', exitCode: 0, durationMs: 1000 },
      { label: 'version', status: 'ok', exitCode: 0, durationMs: 1000 },
      { label: 'isort', status: 'ok', exitCode: 0, durationMs: 1000 },
      { label: 'unittests', status: 'ok', exitCode: 0, durationMs: 1000 },
    ]);
  });

  it('ends with the first failing status and skips the rest', async () => {
    const { run, ui } = session(
      {
        unitTests: true,
        summary: true,
        checks: {
          isort: false,
          black: false,
          flake8: true,
          pytype: false,
          mypy: true,
        },
      },
      executor({
        onPath: ['flake8', 'mypy'],
        statuses: { [`flake8 ${ROOT} --count --statistics`]: 3 },
      }),
    );
    const result = await run;
    expect(result.exitCode).toBe(3);
    expect(result.results.map((r) => [r.label, r.status])).toEqual([
      ['compile', 'ok'],
      ['version', 'ok'],
      ['flake8', 'failed'],
      ['mypy', 'skipped'],
      ['unittests', 'skipped'],
    ]);
    expect(ui.lines).toContain('style-failure');
    expect(ui.lines).not.toContain('banner:mypy');
    expect(ui.summary).toEqual(result.results);
  });

  it('does not render a summary unless asked', async () => {
    const { run, ui } = session({});
    await run;
    expect(ui.summary).toBeNull();
  });

  it('exclusive steps end the run successfully', async () => {
    const { run, ui, exec } = session(
      { clangFormat: true, dryRun: true, unitTests: true },
      executor({
        onPath: ['clang-format', 'git'],
        captures: { 'git ls-files': { exitCode: 0, stdout: '' } },
      }),
    );
    const result = await run;
    expect(result.exitCode).toBe(0);
    expect(result.results.map((r) => r.label)).toEqual([
      'dryrun',
      'clang-formatting',
    ]);
    expect(ui.lines[0]).toBe('banner:dryrun');
    expect(ui.lines[1]).toBe('banner:clang-formatting');
    expect(ui.lines.at(-1)).toBe('done');
    expect(exec.ran).toEqual([]);
  });

  it('zoo fails the run with 255', async () => {
    const { run, ui } = session({ zoo: true, coverage: true });
    const result = await run;
    expect(result.exitCode).toBe(255);
    expect(result.results.at(-1)).toMatchObject({
      label: 'coverage',
      status: 'skipped',
    });
    expect(ui.lines).toContain('error:--zoo option not yet implemented');
  });

  it('stops with 130 when cancelled mid-step', async () => {
    const supervisor = new ProcessSupervisor();
    class CancellingExecutor extends FakeExecutor {
      override run(cmd: Parameters<FakeExecutor['run']>[0]) {
        const line = renderCommand(cmd);
        if (line === 'python3 -m unittest -v') {
          this.ran.push(line);
          supervisor.cancel();
          return Promise.resolve(130);
        }
        return super.run(cmd);
      }
    }
    const exec = new CancellingExecutor({
      captures: { [PROBE]: { exitCode: 0, stdout: '3.9\n' } },
    });
    const { run, ui } = session(
      { unitTests: true, net: true },
      exec,
      supervisor,
    );
    const result = await run;
    expect(result).toMatchObject({ exitCode: 130, cancelled: true });
    expect(result.results.map((r) => [r.label, r.status])).toEqual([
      ['compile', 'ok'],
      ['version', 'ok'],
      ['unittests', 'cancelled'],
      ['net', 'skipped'],
    ]);
    expect(ui.lines.at(-1)).toBe('cancelled');
  });

  it('prints the plan in debug mode', async () => {
    process.env.RUNTESTS_DEBUG = '1';
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const { run, ui } = session({ unitTests: true });
    await run;
    expect(ui.lines[0]).toMatch(/^plan:runtests:\n {2}runtests plan\n/);
  });
});
