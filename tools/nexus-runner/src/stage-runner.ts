import { spawn as nodeSpawn } from 'node:child_process';
import type { OutputSinks } from './sinks.js';
import type { LaunchCommand, StageName, StageOutcome } from './types.js';

/**
 * Options passed to the spawnProcess function.
 */
export interface SpawnProcessOptions {
  cwd: string;
  env: Record<string, string | undefined>;
  stdio: ['ignore', 'pipe', 'pipe'];
}

/**
 * Minimal child process interface for dependency injection.
 */
export interface ChildProcessLike {
  pid: number | undefined;
  stdout: { on(event: 'data', listener: (chunk: Buffer) => void): void } | null;
  stderr: { on(event: 'data', listener: (chunk: Buffer) => void): void } | null;
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): void;
  on(event: 'error', listener: (err: Error) => void): void;
  kill(signal?: NodeJS.Signals): boolean;
}

/**
 * Injectable dependencies for the stage runner.
 */
export interface StageRunnerDeps {
  spawnProcess: (command: string, args: string[], options: SpawnProcessOptions) => ChildProcessLike;
  now: () => number;
  cwd: string;
  env: Record<string, string | undefined>;
}

/**
 * Runs one stage at a time as a child process.
 */
export interface StageRunner {
  run(stage: StageName, command: LaunchCommand, sinks: OutputSinks): Promise<StageOutcome>;
  /** Pid of the child currently running, if any. */
  activePid(): number | undefined;
  /** Send a signal to the running child. Returns false when nothing is running. */
  killActive(signal?: NodeJS.Signals): boolean;
}

function defaultSpawnProcess(command: string, args: string[], options: SpawnProcessOptions): ChildProcessLike {
  // Double cast needed: node ChildProcess uses complex overloaded signatures for
  // on()/kill() that are structurally incompatible with our minimal interface.
  return nodeSpawn(command, args, options) as unknown as ChildProcessLike;
}

const defaultDeps: StageRunnerDeps = {
  spawnProcess: defaultSpawnProcess,
  now: () => Date.now(),
  cwd: process.cwd(),
  env: process.env,
};

/**
 * Create a StageRunner that spawns stage binaries and waits for them to exit.
 *
 * The returned promise never rejects for child failures: a child that cannot be
 * started resolves as `launch-failed`, one terminated by a signal as `killed`
 * and a non-zero exit code as `failed`.
 */
export function createStageRunner(deps: Partial<StageRunnerDeps> = {}): StageRunner {
  const resolved: StageRunnerDeps = { ...defaultDeps, ...deps };
  let active: ChildProcessLike | undefined;

  return {
    run(stage: StageName, command: LaunchCommand, sinks: OutputSinks): Promise<StageOutcome> {
      return new Promise((resolve) => {
        const [executable, ...args] = command;
        if (executable === undefined || executable === '') {
          resolve({ status: 'launch-failed', stage, error: new Error('Empty launch command') });
          return;
        }

        const startTime = resolved.now();
        let child: ChildProcessLike;
        try {
          child = resolved.spawnProcess(executable, args, {
            cwd: resolved.cwd,
            env: resolved.env,
            stdio: ['ignore', 'pipe', 'pipe'],
          });
        } catch (err) {
          resolve({ status: 'launch-failed', stage, error: err instanceof Error ? err : new Error(String(err)) });
          return;
        }
        active = child;

        child.stdout?.on('data', (chunk: Buffer) => {
          sinks.stdout.write(chunk);
        });

        child.stderr?.on('data', (chunk: Buffer) => {
          sinks.stderr.write(chunk);
        });

        let settled = false;

        child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
          if (settled) return;
          settled = true;
          if (active === child) active = undefined;

          const durationMs = resolved.now() - startTime;
          if (signal !== null) {
            resolve({ status: 'killed', stage, signal, durationMs });
          } else if (code === 0) {
            resolve({ status: 'succeeded', stage, exitCode: 0, durationMs });
          } else {
            resolve({ status: 'failed', stage, exitCode: code ?? 1, durationMs });
          }
        });

        child.on('error', (err: Error) => {
          if (settled) return;
          settled = true;
          if (active === child) active = undefined;

          resolve({ status: 'launch-failed', stage, error: err });
        });
      });
    },

    activePid(): number | undefined {
      return active?.pid;
    },

    killActive(signal?: NodeJS.Signals): boolean {
      if (!active) return false;
      return active.kill(signal ?? 'SIGTERM');
    },
  };
}
