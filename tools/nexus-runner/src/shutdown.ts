import type { StageRunner } from './stage-runner.js';
import type { Driver } from './driver.js';
import type { Logger } from './logger.js';

export interface ShutdownDeps {
  onSignal: (signal: NodeJS.Signals, handler: () => void) => void;
  exit: (code: number) => void;
}

export interface ShutdownOptions {
  driver: Pick<Driver, 'requestStop'>;
  stageRunner: StageRunner;
  logger: Logger;
}

const defaultDeps: ShutdownDeps = {
  onSignal: (signal, handler) => process.on(signal, handler),
  exit: (code) => process.exit(code),
};

/**
 * Register SIGINT and SIGTERM handlers.
 *
 * On the first signal:
 * 1. Ask the driver to stop before launching another stage.
 * 2. Forward the signal to the running stage, if any; it then resolves as killed.
 * The run ends through the driver's normal path, so log files are closed.
 * A second signal exits the process at once.
 */
export function setupShutdownHandlers(
  options: ShutdownOptions,
  deps: Partial<ShutdownDeps> = {},
): void {
  const resolved: ShutdownDeps = { ...defaultDeps, ...deps };
  const { driver, stageRunner, logger } = options;

  let shutdownInProgress = false;

  function handle(signal: NodeJS.Signals): void {
    if (shutdownInProgress) {
      logger.warn('Second signal received, exiting', { signal });
      resolved.exit(1);
      return;
    }
    shutdownInProgress = true;
    driver.requestStop(signal);

    const pid = stageRunner.activePid();
    if (pid === undefined) {
      logger.info('Received shutdown signal, no further stages will start', { signal });
      return;
    }

    logger.info('Received shutdown signal, stopping active stage...', { signal, pid });
    if (!stageRunner.killActive(signal)) {
      logger.error('Failed to signal active stage; waiting for it to exit', { signal, pid });
    }
  }

  resolved.onSignal('SIGINT', () => handle('SIGINT'));
  resolved.onSignal('SIGTERM', () => handle('SIGTERM'));
}
