// src/cli/options.ts
import { type Command, Option } from 'commander';

import { parsePositiveInt, tagDefault } from './cli-utils';

/** Parsed option bag (Commander camel-cases the long names). */
export type CliOptions = {
  coverage?: boolean;
  quick?: boolean;
  net?: boolean;
  dryrun?: boolean;
  nounittests?: boolean;
  codeformat?: boolean;
  autofix?: boolean;
  black?: boolean;
  isort?: boolean;
  flake8?: boolean;
  pytype?: boolean;
  mypy?: boolean;
  clangformat?: boolean;
  jobs?: number;
  clean?: boolean;
  zoo?: boolean;
  help?: boolean;
  version?: boolean;
  boring?: boolean;
  debug?: boolean;
  summary?: boolean;
};

/** Register every runtests option on the root command. */
export const registerOptions = (
  cli: Command,
  defaults: { debug: boolean; boring: boolean },
): Command => {
  cli
    .option('--coverage', 'coverage analysis of the code exercised by tests')
    .option('-q, --quick', 'disable long running tests')
    .option('--net', 'training/inference/eval integration testing')
    .option('--dryrun', 'display the commands without running them')
    .option('--nounittests', 'skip unit testing')
    .option('-f, --codeformat', 'run all code style and static analysis checks')
    .option('--autofix', 'format code using "isort" and "black"')
    .option('--black', '"black" code format checks')
    .option('--isort', '"isort" import sort checks')
    .option('--flake8', '"flake8" code format checks')
    .option('--pytype', '"pytype" static type checks')
    .option('--mypy', '"mypy" static type checks')
    .option('--clangformat', 'format native sources using "clang-format"')
    .addOption(
      new Option(
        '-j, --jobs <n>',
        'number of parallel jobs for "pytype"',
      ).argParser(parsePositiveInt),
    )
    .option('-c, --clean', 'clean temporary files and exit')
    .option('--zoo', 'model zoo tests (not implemented)')
    .option('-h, --help', 'show this help message and exit')
    .option('-v, --version', 'show version information and exit')
    .option('--summary', 'print a table of stage results at the end');

  const optDebug = new Option('-d, --debug', 'enable verbose debug logging');
  const optNoDebug = new Option(
    '-D, --no-debug',
    'disable verbose debug logging',
  );
  tagDefault(defaults.debug ? optDebug : optNoDebug, true);
  cli.addOption(optDebug).addOption(optNoDebug);

  const optBoring = new Option(
    '-b, --boring',
    'disable all color and styling (useful for tests/CI)',
  );
  const optNoBoring = new Option(
    '-B, --no-boring',
    'do not disable color/styling',
  );
  tagDefault(defaults.boring ? optBoring : optNoBoring, true);
  cli.addOption(optBoring).addOption(optNoBoring);
  return cli;
};
