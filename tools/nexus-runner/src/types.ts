export type StageName = 'init' | 'exec';

export type RunMode = 'both' | 'init-only' | 'exec-only';

/**
 * Everything needed to launch one stage.
 */
export interface StageRequest {
  readonly stageBinary: string;
  readonly inputCase: string;
  readonly outputCase: string;
  readonly study: string;
  readonly workerCount: number;
}

/** Executable followed by its arguments. */
export type LaunchCommand = readonly string[];

export type StageOutcome =
  | { status: 'succeeded'; stage: StageName; exitCode: 0; durationMs: number }
  | { status: 'failed'; stage: StageName; exitCode: number; durationMs: number }
  | { status: 'killed'; stage: StageName; signal: NodeJS.Signals; durationMs: number }
  | { status: 'launch-failed'; stage: StageName; error: Error }
  | { status: 'cancelled'; stage: StageName; signal: NodeJS.Signals };

export type FailedOutcome = Exclude<StageOutcome, { status: 'succeeded' }>;

export type RunResult =
  | { state: 'done'; stagesRun: StageName[] }
  | { state: 'failed'; stagesRun: StageName[]; outcome: FailedOutcome; capturedStderr?: string };

export interface RunnerConfig {
  inputCase: string;
  outputCase: string;
  study: string;
  mode: RunMode;
  workerCount: number;
  log: boolean;
  dryRun: boolean;
  verbose: boolean;
  initExe: string;
  execExe: string;
  launcher: string;
  workDir: string;
}
