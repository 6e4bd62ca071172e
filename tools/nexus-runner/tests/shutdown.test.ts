import { describe, it, expect, vi } from 'vitest';
import { setupShutdownHandlers, type ShutdownDeps } from '../src/shutdown.js';
import type { StageRunner } from '../src/stage-runner.js';
import type { Driver } from '../src/driver.js';
import type { Logger } from '../src/logger.js';

// ---------- Test helpers ----------

function makeLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(),
  };
}

function makeDriver(): Pick<Driver, 'requestStop'> & { requestStop: ReturnType<typeof vi.fn> } {
  return { requestStop: vi.fn() };
}

function makeStageRunner(pid: number | undefined, killResult = true): StageRunner & {
  killActive: ReturnType<typeof vi.fn>;
} {
  return {
    run: vi.fn(),
    activePid: () => pid,
    killActive: vi.fn(() => killResult),
  };
}

function makeDeps(): ShutdownDeps & {
  handlers: Map<string, () => void>;
  exit: ReturnType<typeof vi.fn>;
} {
  const handlers = new Map<string, () => void>();
  return {
    handlers,
    onSignal: vi.fn((signal: NodeJS.Signals, handler: () => void) => {
      handlers.set(signal, handler);
    }),
    exit: vi.fn(),
  };
}

function fire(deps: ReturnType<typeof makeDeps>, signal: NodeJS.Signals): void {
  const handler = deps.handlers.get(signal);
  if (!handler) throw new Error(`No handler registered for ${signal}`);
  handler();
}

// ---------- Tests ----------

describe('setupShutdownHandlers', () => {
  it('registers SIGINT and SIGTERM handlers', () => {
    const deps = makeDeps();
    setupShutdownHandlers({ driver: makeDriver(), stageRunner: makeStageRunner(100), logger: makeLogger() }, deps);

    expect([...deps.handlers.keys()]).toEqual(['SIGINT', 'SIGTERM']);
  });

  it('stops the driver and forwards the first signal to the active stage without exiting', () => {
    const deps = makeDeps();
    const driver = makeDriver();
    const stageRunner = makeStageRunner(100);
    setupShutdownHandlers({ driver, stageRunner, logger: makeLogger() }, deps);

    fire(deps, 'SIGTERM');

    expect(driver.requestStop).toHaveBeenCalledWith('SIGTERM');
    expect(stageRunner.killActive).toHaveBeenCalledWith('SIGTERM');
    expect(deps.exit).not.toHaveBeenCalled();
  });

  it('leaves the driver to finish when a signal arrives between stages', () => {
    const deps = makeDeps();
    const driver = makeDriver();
    const stageRunner = makeStageRunner(undefined);
    setupShutdownHandlers({ driver, stageRunner, logger: makeLogger() }, deps);

    fire(deps, 'SIGINT');

    expect(driver.requestStop).toHaveBeenCalledWith('SIGINT');
    expect(stageRunner.killActive).not.toHaveBeenCalled();
    expect(deps.exit).not.toHaveBeenCalled();
  });

  it('does not exit when the active stage cannot be signalled', () => {
    const deps = makeDeps();
    const logger = makeLogger();
    setupShutdownHandlers({ driver: makeDriver(), stageRunner: makeStageRunner(100, false), logger }, deps);

    fire(deps, 'SIGTERM');

    expect(logger.error).toHaveBeenCalledWith('Failed to signal active stage; waiting for it to exit', {
      signal: 'SIGTERM',
      pid: 100,
    });
    expect(deps.exit).not.toHaveBeenCalled();
  });

  it('exits on a second signal', () => {
    const deps = makeDeps();
    const driver = makeDriver();
    const stageRunner = makeStageRunner(100);
    setupShutdownHandlers({ driver, stageRunner, logger: makeLogger() }, deps);

    fire(deps, 'SIGINT');
    fire(deps, 'SIGINT');

    expect(driver.requestStop).toHaveBeenCalledTimes(1);
    expect(stageRunner.killActive).toHaveBeenCalledTimes(1);
    expect(deps.exit).toHaveBeenCalledWith(1);
  });
});
