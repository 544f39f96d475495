import { chmod } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { makeTempDir, removeDir, writeScript } from '@/test-support/run';

import { buildChildEnv, prependPythonPath, which } from './env';

describe('prependPythonPath', () => {
  it('puts the root first and drops empty entries', () => {
    const current = ['', '/opt/lib', ''].join(path.delimiter);
    expect(prependPythonPath('/repo', current)).toBe(
      ['/repo', '/opt/lib'].join(path.delimiter),
    );
  });

  it('is just the root without an inherited value', () => {
    expect(prependPythonPath('/repo')).toBe('/repo');
  });
});

describe('buildChildEnv', () => {
  it('keeps the parent env and rewrites PYTHONPATH', () => {
    const env = buildChildEnv('/repo', { HOME: '/home/u', PYTHONPATH: '/x' });
    expect(env).toEqual({
      HOME: '/home/u',
      PYTHONPATH: ['/repo', '/x'].join(path.delimiter),
    });
  });
});

describe.skipIf(process.platform === 'win32')('which', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('runtests-which-');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('finds an executable file on PATH', async () => {
    const tool = await writeScript(dir, 'bin/isort', '#!/bin/sh\n');
    await chmod(tool, 0o755);
    expect(which('isort', { PATH: path.join(dir, 'bin') })).toBe(tool);
  });

  it('ignores files without an execute bit', async () => {
    await writeScript(dir, 'bin/black', '#!/bin/sh\n');
    await chmod(path.join(dir, 'bin', 'black'), 0o644);
    expect(which('black', { PATH: path.join(dir, 'bin') })).toBeNull();
  });

  it('checks explicit paths as given', async () => {
    const tool = await writeScript(dir, 'tools/flake8', '#!/bin/sh\n');
    await chmod(tool, 0o755);
    expect(which(tool, { PATH: '' })).toBe(tool);
    expect(which(path.join(dir, 'tools', 'nope'), { PATH: '' })).toBeNull();
  });

  it('returns null when PATH is empty', () => {
    expect(which('git', {})).toBeNull();
  });
});
