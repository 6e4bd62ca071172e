import * as path from 'node:path';
import { z } from 'zod';
import { DEFAULT_LAUNCHER } from './command.js';
import type { RunMode, RunnerConfig } from './types.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * CLI options as received from commander (all strings/booleans).
 */
export interface CliOptions {
  inputCase: string;
  outputCase?: string;
  study?: string;
  initOnly: boolean;
  execOnly: boolean;
  numCpus: string;
  log: boolean;
  launcher?: string;
  dryRun: boolean;
  verbose: boolean;
}

/**
 * Injectable dependencies for loadRunnerConfig.
 * Defaults to real implementations; tests can override.
 */
export interface ConfigDeps {
  env: Record<string, string | undefined>;
  cwd: () => string;
}

const defaultDeps: ConfigDeps = {
  env: process.env,
  cwd: () => process.cwd(),
};

const requiredPath = (name: string) =>
  z.string({ required_error: `${name} environment variable is not set` })
    .min(1, { message: `${name} environment variable is empty` });

const envSchema = z.object({
  STAND_EXE: requiredPath('STAND_EXE'),
  NEXUS_EXE: requiredPath('NEXUS_EXE'),
  PARALLEL_LAUNCHER: z.string().optional(),
});

const numCpusSchema = z.coerce
  .number({ invalid_type_error: 'num-cpus must be a number' })
  .int({ message: 'num-cpus must be an integer' })
  .min(1, { message: 'num-cpus must be >= 1' });

/**
 * Decide which stages run from the two mode flags.
 * Both flags together would run nothing, so that combination is rejected.
 */
export function resolveRunMode(initOnly: boolean, execOnly: boolean): RunMode {
  if (initOnly && execOnly) {
    throw new ConfigError('--init-only and --exec-only cannot be used together');
  }
  if (initOnly) return 'init-only';
  if (execOnly) return 'exec-only';
  return 'both';
}

/**
 * Load runner configuration from environment variables and CLI flags.
 *
 * Defaults are applied here and nowhere else: output case and study fall back
 * to the input case, the launcher to PARALLEL_LAUNCHER and then `mpiexec`.
 */
export function loadRunnerConfig(
  cliOptions: CliOptions,
  deps: Partial<ConfigDeps> = {},
): RunnerConfig {
  const { env, cwd } = { ...defaultDeps, ...deps };

  if (cliOptions.inputCase === '') {
    throw new ConfigError('Input case name is required');
  }

  const envResult = envSchema.safeParse(env);
  if (!envResult.success) {
    throw new ConfigError(envResult.error.issues.map((i) => i.message).join(', '));
  }

  const cpusResult = numCpusSchema.safeParse(cliOptions.numCpus);
  if (!cpusResult.success) {
    throw new ConfigError(
      `Invalid num-cpus value "${cliOptions.numCpus}": ${cpusResult.error.issues.map((i) => i.message).join(', ')}`,
    );
  }

  const mode = resolveRunMode(cliOptions.initOnly, cliOptions.execOnly);
  const envLauncher = envResult.data.PARALLEL_LAUNCHER;

  return {
    inputCase: cliOptions.inputCase,
    outputCase: cliOptions.outputCase || cliOptions.inputCase,
    study: cliOptions.study || cliOptions.inputCase,
    mode,
    workerCount: cpusResult.data,
    log: cliOptions.log,
    dryRun: cliOptions.dryRun,
    verbose: cliOptions.verbose,
    initExe: envResult.data.STAND_EXE,
    execExe: envResult.data.NEXUS_EXE,
    launcher: cliOptions.launcher || envLauncher || DEFAULT_LAUNCHER,
    workDir: path.resolve(cwd()),
  };
}
