import { describe, expect, it } from 'vitest';

import { command, quoteArg, renderCommand } from './command';

describe('quoteArg', () => {
  it('leaves plain words alone', () => {
    expect(quoteArg('--python-version=3.9')).toBe('--python-version=3.9');
    expect(quoteArg('/repo/pkg')).toBe('/repo/pkg');
  });

  it('single-quotes words with spaces or metacharacters', () => {
    expect(quoteArg('a b')).toBe(`'a b'`);
    expect(quoteArg('import x; x.y()')).toBe(`'import x; x.y()'`);
  });

  it('escapes embedded single quotes', () => {
    expect(quoteArg(`it's`)).toBe(`'it'\\''s'`);
  });

  it('renders the empty word', () => {
    expect(quoteArg('')).toBe(`''`);
  });
});

describe('renderCommand', () => {
  it('prefixes per-command environment', () => {
    expect(
      renderCommand(command('mypy', ['/repo'], { MYPYPATH: '/repo/pkg' })),
    ).toBe('MYPYPATH=/repo/pkg mypy /repo');
  });

  it('quotes inline scripts', () => {
    expect(
      renderCommand(
        command('python', ['-c', 'import pkg; pkg.config.print_config()']),
      ),
    ).toBe(`python -c 'import pkg; pkg.config.print_config()'`);
  });

  it('omits env when none is given', () => {
    expect(command('coverage', ['erase'])).toEqual({
      file: 'coverage',
      args: ['erase'],
    });
  });
});
