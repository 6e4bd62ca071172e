#!/usr/bin/env node
import { Command } from 'commander';
import { loadRunnerConfig } from './config.js';
import { createLogger } from './logger.js';
import { createStageRunner } from './stage-runner.js';
import { createDriver } from './driver.js';
import { setupShutdownHandlers } from './shutdown.js';
import { describeOutcome, exitCodeFor } from './outcome.js';

/**
 * Options as parsed by commander, before validation.
 */
interface ProgramOptions {
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

const program = new Command()
  .name('nexus-runner')
  .description('Initialize and run a simulation case')
  .argument('<input_case>', 'Input case name')
  .option('-o, --output-case <name>', 'Output case name. Defaults to the input case name.')
  .option('-s, --study <name>', 'Study name or VDB directory name. Defaults to the input case name.')
  .option('--init-only', 'Run initialization only', false)
  .option('--exec-only', 'Run a simulation without initialization', false)
  .option('-n, --num-cpus <n>', 'Number of processes', '1')
  .option('--log', 'Write <input_case>.o.log and <input_case>.e.log', false)
  .option('--launcher <command>', 'Parallel launcher used when --num-cpus > 1 (env: PARALLEL_LAUNCHER)')
  .option('--dry-run', 'Print the stage commands without running them', false)
  .option('--verbose', 'Verbose output', false)
  .action(async (inputCase: string, options: ProgramOptions) => {
    try {
      // 1. Load config
      const config = loadRunnerConfig({
        inputCase,
        outputCase: options.outputCase,
        study: options.study,
        initOnly: options.initOnly,
        execOnly: options.execOnly,
        numCpus: options.numCpus,
        log: options.log,
        launcher: options.launcher,
        dryRun: options.dryRun,
        verbose: options.verbose,
      });

      // 2. Create dependencies
      const logger = createLogger(config.verbose);
      const stageRunner = createStageRunner({ cwd: config.workDir });
      const driver = createDriver(config, { stageRunner, logger });
      setupShutdownHandlers({ driver, stageRunner, logger });

      // 3. Run
      logger.debug('Starting run', {
        inputCase: config.inputCase,
        outputCase: config.outputCase,
        study: config.study,
        mode: config.mode,
        workerCount: config.workerCount,
        log: config.log,
      });
      const result = await driver.run();

      // 4. Report
      if (result.state === 'failed') {
        if (result.capturedStderr) {
          process.stderr.write(result.capturedStderr);
        }
        logger.error(describeOutcome(result.outcome), { completedStages: result.stagesRun });
      } else if (config.mode !== 'both' && !config.dryRun) {
        logger.info('Partial run completed', { mode: config.mode, stages: result.stagesRun });
      }
      process.exitCode = exitCodeFor(result);
    } catch (err) {
      console.error('Fatal error:', err instanceof Error ? err.message : String(err));
      process.exit(1);
    }
  });

program.parse();
