/* src/cli/index.ts
 * Root CLI for runtests: a single command whose options select the stages.
 * Parsing never exits the process; runCli resolves to the exit status.
 */
import { Command, CommanderError } from 'commander';

import { type LoadedConfig, loadConfig } from '@/cli/config/load';
import { resolveConfig } from '@/cli/config/schema';
import { buildChildEnv } from '@/runner/run/exec/env';
import { createProcessExecutor } from '@/runner/run/exec/executor';
import { runTests } from '@/runner/run/service';
import { printConfigCommand } from '@/runner/run/steps/version';
import { LoggerUI } from '@/runner/run/ui/logger-ui';
import type { RunnerUI } from '@/runner/run/ui/types';
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_CLI } from '@/runner/util/debug-scopes';
import { getVersionInfo, printVersionInfo } from '@/runner/version';

import { fromCli, normalizeArgv } from './cli-utils';
import { deriveRunFlags } from './derive';
import { type CliOptions, registerOptions } from './options';
import { renderUsage } from './usage';

/** Exit status for usage, help and version output. */
export const EXIT_USAGE = 1;

/**
 * Resolve --debug/--boring against config defaults and export the result
 * to the environment the color and debug helpers read.
 * Without a flag or a config default the inherited environment is kept.
 */
export const applyGlobalFlags = (
  cli: Command,
  defaults: { debug: boolean; boring: boolean },
): void => {
  const opts = cli.opts<CliOptions>();
  const debug = fromCli(cli, 'debug') ? Boolean(opts.debug) : defaults.debug;
  if (debug) process.env.RUNTESTS_DEBUG = '1';
  else if (fromCli(cli, 'debug')) delete process.env.RUNTESTS_DEBUG;

  const boring = fromCli(cli, 'boring')
    ? Boolean(opts.boring)
    : defaults.boring;
  if (boring) {
    process.env.RUNTESTS_BORING = '1';
    process.env.FORCE_COLOR = '0';
    process.env.NO_COLOR = '1';
  } else if (fromCli(cli, 'boring')) {
    delete process.env.RUNTESTS_BORING;
    delete process.env.FORCE_COLOR;
    delete process.env.NO_COLOR;
  }
};

/** True when no option was given on the command line and nothing was left over. */
const noArguments = (cli: Command): boolean =>
  cli.args.length === 0 &&
  !cli.options.some((o) => fromCli(cli, o.attributeName()));

/**
 * Build the root CLI without side effects (safe for tests).
 *
 * @param onExit - Receives the exit status once the action has finished.
 * @param loaded - Project config; built-in defaults at the working directory when omitted.
 * @param ui - Output surface; console logger by default.
 */
export const makeCli = (
  onExit: (code: number) => void,
  loaded: LoadedConfig = {
    root: process.cwd(),
    path: null,
    config: resolveConfig({}),
  },
  ui: RunnerUI = new LoggerUI(),
): Command => {
  const { root, config } = loaded;
  const cli = new Command();
  cli
    .name('runtests')
    .description(`${config.package} unit testing utilities.`)
    .helpOption(false)
    .allowUnknownOption(true)
    .allowExcessArguments(true)
    .exitOverride();
  registerOptions(cli, config.cliDefaults);

  const usage = (): void => {
    console.log(renderUsage(config));
  };

  cli.action(async () => {
    applyGlobalFlags(cli, config.cliDefaults);
    const opts = cli.opts<CliOptions>();
    debugLog(DBG_SCOPE_CLI, `options ${JSON.stringify(opts)}`);

    if (noArguments(cli)) {
      ui.onError('Too few arguments to runtests');
      usage();
      onExit(EXIT_USAGE);
      return;
    }
    // Unknown options and operands are left in args, first one first.
    const stray = cli.args[0];
    if (stray !== undefined) {
      ui.onError(`Incorrect commandline provided, invalid key: ${stray}`);
      usage();
      onExit(EXIT_USAGE);
      return;
    }
    if (opts.help) {
      usage();
      onExit(EXIT_USAGE);
      return;
    }
    if (opts.version) {
      printVersionInfo(await getVersionInfo(root, loaded.path));
      const exec = createProcessExecutor({
        cwd: root,
        env: buildChildEnv(root, process.env),
      });
      const status = await exec.run(
        printConfigCommand(config.python, config.package),
      );
      debugLog(DBG_SCOPE_CLI, `print_config exit ${status.toString()}`);
      onExit(EXIT_USAGE);
      return;
    }

    const result = await runTests({
      root,
      config,
      flags: deriveRunFlags(opts, config),
      ui,
    });
    onExit(result.exitCode);
  });
  return cli;
};

/**
 * Parse user arguments and run.
 *
 * @param argv - Arguments after the executable (process.argv.slice(2)).
 * @returns Process exit status; never calls process.exit.
 */
export const runCli = async (
  argv: readonly string[],
  cwd: string = process.cwd(),
): Promise<number> => {
  let loaded: LoadedConfig;
  try {
    loaded = await loadConfig(cwd);
  } catch (e) {
    console.error(e instanceof Error ? e.message : String(e));
    return EXIT_USAGE;
  }
  let exitCode = 0;
  const cli = makeCli((code) => {
    exitCode = code;
  }, loaded);
  try {
    await cli.parseAsync(normalizeArgv(argv), { from: 'user' });
  } catch (e) {
    // Commander already wrote its message to stderr.
    if (e instanceof CommanderError) return EXIT_USAGE;
    throw e;
  }
  return exitCode;
};
