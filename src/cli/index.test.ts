import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { CommandSpec } from '@/runner/run/exec/command';
import type { RunTestsArgs } from '@/runner/run/service';
import type { RunResult } from '@/runner/run/types';
import { asEsmModule } from '@/test/mock-esm';
import { makeTempDir, removeDir, writeScript } from '@/test-support/run';

const { runTestsMock, execRunMock } = vi.hoisted(() => ({
  runTestsMock: vi.fn<(args: RunTestsArgs) => Promise<RunResult>>(),
  execRunMock: vi.fn<(cmd: CommandSpec) => Promise<number>>(),
}));

vi.mock('@/runner/run/service', () => asEsmModule({ runTests: runTestsMock }));
vi.mock('@/runner/run/exec/executor', async (importOriginal) => {
  const actual =
    await importOriginal<typeof import('@/runner/run/exec/executor')>();
  return {
    ...actual,
    createProcessExecutor: () => ({
      run: execRunMock,
      capture: () => Promise.resolve({ exitCode: 0, stdout: '' }),
      which: () => null,
      exportEnv: () => {},
    }),
  };
});

import { runCli } from '.';

const ENV_KEYS = [
  'RUNTESTS_DEBUG',
  'RUNTESTS_BORING',
  'NO_COLOR',
  'FORCE_COLOR',
] as const;

describe('runCli', () => {
  let dir: string;
  let logged: string[];
  let errors: string[];
  const savedEnv: Partial<Record<(typeof ENV_KEYS)[number], string>> = {};

  /** Arguments the (mocked) runner received on its last call. */
  const lastRun = (): RunTestsArgs => {
    const call = runTestsMock.mock.calls.at(-1);
    if (!call) throw new Error('runTests was not called');
    return call[0];
  };

  beforeEach(async () => {
    dir = await makeTempDir('runtests-cli-');
    logged = [];
    errors = [];
    for (const k of ENV_KEYS) savedEnv[k] = process.env[k];
    vi.spyOn(console, 'log').mockImplementation((...a: unknown[]) => {
      logged.push(a.map(String).join(' '));
    });
    vi.spyOn(console, 'error').mockImplementation((...a: unknown[]) => {
      errors.push(a.map(String).join(' '));
    });
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    runTestsMock.mockResolvedValue({
      exitCode: 0,
      results: [],
      cancelled: false,
    });
    execRunMock.mockResolvedValue(0);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    runTestsMock.mockReset();
    execRunMock.mockReset();
    for (const k of ENV_KEYS) {
      const v = savedEnv[k];
      if (v === undefined) delete process.env[k];
      else process.env[k] = v;
    }
    await removeDir(dir);
  });

  it('requires at least one argument', async () => {
    expect(await runCli([], dir)).toBe(1);
    expect(logged[0]).toBe('Error: Too few arguments to runtests.');
    expect(logged[1]).toBe('');
    expect(logged[2]?.split('\n')[0]).toBe(
      'runtests [--codeformat] [--autofix] [--black] [--isort] [--flake8] [--clangformat] [--pytype] [--mypy]',
    );
    expect(runTestsMock).not.toHaveBeenCalled();
  });

  it('treats an empty first argument as no arguments', async () => {
    expect(await runCli(['', '--net'], dir)).toBe(1);
    expect(logged[0]).toBe('Error: Too few arguments to runtests.');
    expect(runTestsMock).not.toHaveBeenCalled();
  });

  it('rejects unknown options and operands', async () => {
    expect(await runCli(['--coverage', '--bogus'], dir)).toBe(1);
    expect(logged[0]).toBe(
      'Error: Incorrect commandline provided, invalid key: --bogus.',
    );

    logged = [];
    expect(await runCli(['extra'], dir)).toBe(1);
    expect(logged[0]).toBe(
      'Error: Incorrect commandline provided, invalid key: extra.',
    );
    expect(runTestsMock).not.toHaveBeenCalled();
  });

  it('prints usage for --help and exits 1', async () => {
    expect(await runCli(['-h'], dir)).toBe(1);
    expect(logged).toHaveLength(1);
    const usage = logged[0] ?? '';
    expect(usage).toContain('Code style check options:');
    expect(usage).toContain(
      '    -j, --jobs        : number of parallel jobs to run "pytype" (default 1)',
    );
    expect(usage).toContain('please contact the monai maintainers.');
  });

  it('shows the configured issue tracker in the usage footer', async () => {
    await writeScript(
      dir,
      'runtests.config.yml',
      'issues: https://example.com/issues\n',
    );
    await runCli(['--help'], dir);
    expect(logged[0]).toContain(
      'please file an issue at:\n    https://example.com/issues\n',
    );
  });

  it('rejects a non-positive job count', async () => {
    expect(await runCli(['--pytype', '-j', '0'], dir)).toBe(1);
    expect(runTestsMock).not.toHaveBeenCalled();
  });

  it('runs with derived flags and returns the run status', async () => {
    runTestsMock.mockResolvedValue({
      exitCode: 3,
      results: [],
      cancelled: false,
    });
    expect(
      await runCli(['--dryrun', '--nounittest', '-f', '-j', '3'], dir),
    ).toBe(3);
    const args = lastRun();
    expect(args.root).toBe(dir);
    expect(args.flags).toMatchObject({
      dryRun: true,
      unitTests: false,
      jobs: 3,
      checks: {
        isort: true,
        black: true,
        flake8: true,
        pytype: true,
        mypy: true,
      },
    });
  });

  it('takes the job count and project root from the config file', async () => {
    await writeScript(dir, 'runtests.config.yml', 'jobs: 6\n');
    await writeScript(dir, 'sub/.keep', '');
    expect(await runCli(['--pytype'], `${dir}/sub`)).toBe(0);
    expect(lastRun().root).toBe(dir);
    expect(lastRun().flags.jobs).toBe(6);
  });

  it('maps config errors to status 1 on stderr', async () => {
    await writeScript(dir, 'runtests.config.yml', 'jobs: -2\n');
    expect(await runCli(['--coverage'], dir)).toBe(1);
    expect(errors[0]).toMatch(/^runtests: invalid config in .*\njobs: /);
    expect(runTestsMock).not.toHaveBeenCalled();
  });

  it('prints version information and the library configuration', async () => {
    expect(await runCli(['--version'], dir)).toBe(1);
    expect(logged.some((l) => l.startsWith('node: '))).toBe(true);
    expect(logged).toContain(`root: ${dir}`);
    expect(logged).toContain('config: (defaults)');
    expect(execRunMock).toHaveBeenCalledWith({
      file: 'python',
      args: ['-c', 'import monai; monai.config.print_config()'],
    });
  });

  it('exports --debug and --boring for the run', async () => {
    delete process.env.RUNTESTS_BORING;
    await runCli(['-d', '-b', '--coverage'], dir);
    expect(process.env.RUNTESTS_DEBUG).toBe('1');
    expect(process.env.RUNTESTS_BORING).toBe('1');
    expect(process.env.NO_COLOR).toBe('1');
  });

  it('applies config defaults unless the flag is given', async () => {
    await writeScript(
      dir,
      'runtests.config.yml',
      'cliDefaults:\n  debug: true\n  boring: true\n',
    );
    await runCli(['--coverage'], dir);
    expect(process.env.RUNTESTS_DEBUG).toBe('1');

    await runCli(['-D', '-B', '--coverage'], dir);
    expect(process.env.RUNTESTS_DEBUG).toBeUndefined();
    expect(process.env.RUNTESTS_BORING).toBeUndefined();
  });
});
