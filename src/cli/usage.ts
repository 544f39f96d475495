// src/cli/usage.ts
import type { RunnerConfig } from '@/runner/run/types';
import { ok, separator } from '@/runner/util/color';

type Entry = readonly [flags: string, text: string];

const examples = (): Entry[] => [
  [
    'runtests --codeformat --coverage',
    `run full tests (${ok('recommended before making pull requests')}).`,
  ],
  [
    'runtests --codeformat --nounittests',
    'run coding style and static type checking.',
  ],
  [
    'runtests --quick',
    'run minimal unit tests, for quick verification during code developments.',
  ],
  [
    'runtests --autofix --nounittests',
    'run automatic code formatting using "isort" and "black".',
  ],
  [
    'runtests --clean',
    'clean up temporary files and run "python setup.py develop --uninstall".',
  ],
];

const groups = (pkg: string, jobs: number): [string, Entry[]][] => [
  [
    'Code style check options:',
    [
      ['--black', 'perform "black" code format checks'],
      ['--autofix', 'format code using "isort" and "black"'],
      ['--isort', 'perform "isort" import sort checks'],
      ['--flake8', 'perform "flake8" code format checks'],
      ['--clangformat', 'format csrc code using "clang-format"'],
    ],
  ],
  [
    'Python type check options:',
    [
      ['--pytype', 'perform "pytype" static type checks'],
      ['--mypy', 'perform "mypy" static type checks'],
      [
        '-j, --jobs',
        `number of parallel jobs to run "pytype" (default ${jobs.toString()})`,
      ],
    ],
  ],
  [
    `${pkg} unit testing options:`,
    [
      [
        '--nounittests',
        'skip doing unit testing (i.e. only format lint testers)',
      ],
      ['--coverage', 'performs coverage analysis of code for tests run'],
      ['-q, --quick', 'disable long running tests'],
      ['--net', 'perform training/inference/eval integration testing'],
      ['--zoo', 'perform model zoo tests (not yet implemented)'],
    ],
  ],
  [
    'Misc. options:',
    [
      ['--dryrun', 'display the commands to the screen without running'],
      [
        '-f, --codeformat',
        'shorthand to run all code style and static analysis tests',
      ],
      ['-c, --clean', 'clean temporary files from tests and exit'],
      [
        '--summary',
        'print a table of stage results when the run finishes',
      ],
      ['-b, --boring', 'disable color and separators (-B to force them on)'],
      ['-d, --debug', 'verbose debug logging to stderr (-D to turn off)'],
      ['-h, --help', 'show this help message and exit'],
      [
        '-v, --version',
        `show ${pkg} and system version information and exit`,
      ],
    ],
  ],
];

const FLAG_WIDTH = 18;
const EXAMPLE_WIDTH = 40;

/** The usage page printed by -h/--help and after argument errors. */
export const renderUsage = (
  config: Pick<RunnerConfig, 'package' | 'jobs' | 'issues'>,
): string => {
  const lines: string[] = [
    'runtests [--codeformat] [--autofix] [--black] [--isort] [--flake8] [--clangformat] [--pytype] [--mypy]',
    '         [--nounittests] [--coverage] [--quick] [--net] [--dryrun] [-j number] [--clean] [--help] [--version]',
    '',
    `${config.package} unit testing utilities.`,
    '',
    'Examples:',
    ...examples().map(
      ([cmd, text]) => `${cmd.padEnd(EXAMPLE_WIDTH)}  # ${text}`,
    ),
  ];
  for (const [title, entries] of groups(config.package, config.jobs)) {
    lines.push('', title);
    for (const [flags, text] of entries) {
      lines.push(`    ${flags.padEnd(FLAG_WIDTH)}: ${text}`);
    }
  }
  lines.push('');
  const lead = `${separator()}For bug reports, questions, and discussions,`;
  if (config.issues) {
    lines.push(`${lead} please file an issue at:`, `    ${config.issues}`);
  } else {
    lines.push(`${lead} please contact the ${config.package} maintainers.`);
  }
  lines.push('');
  return lines.join('\n');
};
