/* src/cli/config/schema.ts
 * Zod schema and defaults for runtests configuration (runtests.config.*).
 */
import { z } from 'zod';

import type { RunnerConfig } from '@/runner/run/types';

// Common coercer for boolean-ish values
const coerceBool = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((v) => {
    if (typeof v === 'boolean') return v;
    if (typeof v === 'number') return v === 1;
    const s = v.trim().toLowerCase();
    if (s === '1' || s === 'true') return true;
    if (s === '0' || s === 'false') return false;
    return undefined;
  })
  .optional();

// YAML reads 3.6 as a number; normalize to "3.6" before validating the shape.
const versionSchema = z
  .union([z.string(), z.number()])
  .transform((v) => String(v).trim())
  .pipe(
    z.string().regex(/^\d+\.\d+$/, {
      message: 'must be a "<major>.<minor>" version string',
    }),
  );

const globList = z.array(
  z.string().min(1, { message: 'entries must be non-empty strings' }),
);

const cleanSchema = z
  .object({
    files: globList.optional(),
    dirs: globList.optional(),
  })
  .strict()
  .optional();

export const cliDefaultsSchema = z
  .object({
    debug: coerceBool,
    boring: coerceBool,
  })
  .strict()
  .optional();

export const configSchema = z
  .object({
    package: z
      .string()
      .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, {
        message: 'package must be a Python import name',
      })
      .optional(),
    python: z.string().min(1).optional(),
    requirements: z.string().min(1).optional(),
    csrc: z.string().min(1).optional(),
    integration: z.string().min(1).optional(),
    minPython: versionSchema.optional(),
    jobs: z.coerce.number().int().positive().optional(),
    issues: z.string().url().optional(),
    clean: cleanSchema,
    cliDefaults: cliDefaultsSchema,
  })
  .strict();
export type ConfigInput = z.input<typeof configSchema>;

export const DEFAULT_PACKAGE = 'monai';

export const DEFAULT_CLEAN_FILES: readonly string[] = [
  '**/*.py[co]',
  '**/.coverage',
];

/** Directory names removed by --clean (the egg-info name follows the package). */
export const defaultCleanDirs = (pkg: string): string[] => [
  '__pycache__',
  '.eggs',
  `${pkg}.egg-info`,
  'build',
  'dist',
  '.mypy_cache',
  '.pytype',
  '.coverage',
];

/**
 * Validate a raw config node and apply defaults.
 *
 * @throws ZodError when the node does not match the schema.
 */
export const resolveConfig = (node: unknown): RunnerConfig => {
  const parsed = configSchema.parse(node ?? {});
  const pkg = parsed.package ?? DEFAULT_PACKAGE;
  return {
    package: pkg,
    python: parsed.python ?? 'python',
    requirements: parsed.requirements ?? 'requirements-dev.txt',
    csrc: parsed.csrc ?? `${pkg}/csrc`,
    integration: parsed.integration ?? 'tests/integration_*.py',
    minPython: parsed.minPython ?? '3.6',
    jobs: parsed.jobs ?? 1,
    issues: parsed.issues ?? null,
    clean: {
      files: parsed.clean?.files ?? [...DEFAULT_CLEAN_FILES],
      dirs: parsed.clean?.dirs ?? defaultCleanDirs(pkg),
    },
    cliDefaults: {
      debug: parsed.cliDefaults?.debug ?? false,
      boring: parsed.cliDefaults?.boring ?? false,
    },
  };
};
