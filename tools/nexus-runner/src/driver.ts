import { composeCommand } from './command.js';
import { createCaptureSinks, openLogSinks, type OutputSinks } from './sinks.js';
import type { StageRunner } from './stage-runner.js';
import type { Logger } from './logger.js';
import type {
  FailedOutcome,
  LaunchCommand,
  RunMode,
  RunResult,
  RunnerConfig,
  StageName,
  StageOutcome,
  StageRequest,
} from './types.js';

export type DriverState = 'START' | 'INIT_PENDING' | 'EXEC_PENDING' | 'DONE' | 'FAILED';

export interface Driver {
  run(): Promise<RunResult>;
  getState(): DriverState;
  /** Stop before the next stage launches. The stage already running is not touched. */
  requestStop(signal: NodeJS.Signals): void;
}

export interface DriverDeps {
  stageRunner: StageRunner;
  logger: Logger;
  openSinks?: (config: RunnerConfig) => Promise<OutputSinks>;  // default: log files or capture buffers
  print?: (line: string) => void;  // default: process.stdout
}

async function defaultOpenSinks(config: RunnerConfig): Promise<OutputSinks> {
  if (config.log) {
    return openLogSinks(config.inputCase, config.workDir);
  }
  return createCaptureSinks();
}

/**
 * Next state of a run. DONE and FAILED are absorbing.
 */
export function transition(state: DriverState, mode: RunMode, outcome?: StageOutcome): DriverState {
  switch (state) {
    case 'START':
      return mode === 'exec-only' ? 'EXEC_PENDING' : 'INIT_PENDING';
    case 'INIT_PENDING':
      if (outcome?.status !== 'succeeded') return 'FAILED';
      return mode === 'init-only' ? 'DONE' : 'EXEC_PENDING';
    case 'EXEC_PENDING':
      return outcome?.status === 'succeeded' ? 'DONE' : 'FAILED';
    case 'DONE':
    case 'FAILED':
      return state;
  }
}

/**
 * Stages a mode would run, in order.
 */
export function plannedStages(mode: RunMode): StageName[] {
  switch (mode) {
    case 'init-only':
      return ['init'];
    case 'exec-only':
      return ['exec'];
    case 'both':
      return ['init', 'exec'];
  }
}

export function buildStageRequest(config: RunnerConfig, stage: StageName): StageRequest {
  return {
    stageBinary: stage === 'init' ? config.initExe : config.execExe,
    inputCase: config.inputCase,
    outputCase: config.outputCase,
    study: config.study,
    workerCount: config.workerCount,
  };
}

export function stageCommand(config: RunnerConfig, stage: StageName): LaunchCommand {
  return composeCommand(buildStageRequest(config, stage), config.launcher);
}

export function createDriver(config: RunnerConfig, deps: DriverDeps): Driver {
  const { stageRunner, logger } = deps;
  const openSinks = deps.openSinks ?? defaultOpenSinks;
  const print = deps.print ?? ((line: string) => process.stdout.write(line + '\n'));

  let state: DriverState = 'START';
  let stopSignal: NodeJS.Signals | undefined;

  function moveTo(next: DriverState): void {
    logger.debug('State transition', { from: state, to: next });
    state = next;
  }

  async function runStages(sinks: OutputSinks): Promise<{ stagesRun: StageName[]; failure?: FailedOutcome }> {
    const stagesRun: StageName[] = [];

    while (state === 'INIT_PENDING' || state === 'EXEC_PENDING') {
      const stage: StageName = state === 'INIT_PENDING' ? 'init' : 'exec';
      const stageLogger = logger.child({ stage });

      let outcome: StageOutcome;
      if (stopSignal !== undefined) {
        outcome = { status: 'cancelled', stage, signal: stopSignal };
      } else {
        const command = stageCommand(config, stage);
        stageLogger.debug('Launching stage', { command: command.join(' ') });
        outcome = await stageRunner.run(stage, command, sinks);
      }
      moveTo(transition(state, config.mode, outcome));

      if (outcome.status !== 'succeeded') {
        return { stagesRun, failure: outcome };
      }
      stageLogger.debug('Stage completed', { durationMs: outcome.durationMs });
      stagesRun.push(stage);
    }

    return { stagesRun };
  }

  return {
    async run(): Promise<RunResult> {
      if (state !== 'START') {
        throw new Error(`Driver already ran (state: ${state})`);
      }

      if (config.dryRun) {
        for (const stage of plannedStages(config.mode)) {
          print(stageCommand(config, stage).join(' '));
        }
        moveTo('DONE');
        return { state: 'done', stagesRun: [] };
      }

      // Sinks are open before the first stage; an open failure launches nothing.
      let sinks: OutputSinks;
      try {
        sinks = await openSinks(config);
      } catch (err) {
        moveTo('FAILED');
        throw err;
      }

      moveTo(transition('START', config.mode));

      let result: { stagesRun: StageName[]; failure?: FailedOutcome };
      try {
        result = await runStages(sinks);
      } catch (err) {
        await sinks.close().catch((closeErr: unknown) => {
          logger.error('Failed to close output sinks', {
            error: closeErr instanceof Error ? closeErr.message : String(closeErr),
          });
        });
        throw err;
      }

      if (result.failure === undefined) {
        await sinks.close();
        return { state: 'done', stagesRun: result.stagesRun };
      }

      // A close error must not hide which stage failed.
      try {
        await sinks.close();
      } catch (closeErr) {
        logger.error('Failed to close output sinks', {
          error: closeErr instanceof Error ? closeErr.message : String(closeErr),
        });
      }

      return {
        state: 'failed',
        stagesRun: result.stagesRun,
        outcome: result.failure,
        capturedStderr: sinks.stderrText?.(),
      };
    },

    getState(): DriverState {
      return state;
    },

    requestStop(signal: NodeJS.Signals): void {
      if (stopSignal === undefined) stopSignal = signal;
    },
  };
}
