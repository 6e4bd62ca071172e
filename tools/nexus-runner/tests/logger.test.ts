import { describe, it, expect, vi } from 'vitest';
import { createLogger, type LoggerDeps } from '../src/logger.js';

/** Fixed date for deterministic tests. */
const FIXED_DATE = new Date('2026-03-02T09:15:00.000Z');
const FIXED_ISO = '2026-03-02T09:15:00.000Z';

/** Create test deps with captured stderr output. */
function makeDeps(overrides?: Partial<LoggerDeps>): LoggerDeps & { stderrOutput: string[] } {
  const stderrOutput: string[] = [];
  return {
    writeStderr: vi.fn((data: string) => {
      stderrOutput.push(data);
    }),
    now: vi.fn(() => FIXED_DATE),
    stderrOutput,
    ...overrides,
  };
}

describe('createLogger', () => {
  it('formats info messages as [timestamp] [INFO] message', () => {
    const deps = makeDeps();
    const logger = createLogger(false, deps);

    logger.info('run started');

    expect(deps.stderrOutput).toEqual([`[${FIXED_ISO}] [INFO] run started\n`]);
  });

  it('formats warn and error levels', () => {
    const deps = makeDeps();
    const logger = createLogger(false, deps);

    logger.warn('exiting on signal');
    logger.error('Initialization failed. Return code = 3');

    expect(deps.stderrOutput).toEqual([
      `[${FIXED_ISO}] [WARN] exiting on signal\n`,
      `[${FIXED_ISO}] [ERROR] Initialization failed. Return code = 3\n`,
    ]);
  });

  it('serializes context object in log output', () => {
    const deps = makeDeps();
    const logger = createLogger(false, deps);

    logger.error('Simulation failed. Return code = 1', { completedStages: ['init'] });

    expect(deps.stderrOutput[0]).toBe(
      `[${FIXED_ISO}] [ERROR] Simulation failed. Return code = 1 {"completedStages":["init"]}\n`,
    );
  });

  it('omits an empty context object', () => {
    const deps = makeDeps();
    const logger = createLogger(false, deps);

    logger.info('no context', {});

    expect(deps.stderrOutput[0]).toBe(`[${FIXED_ISO}] [INFO] no context\n`);
  });

  it('suppresses debug when not verbose', () => {
    const deps = makeDeps();
    const logger = createLogger(false, deps);

    logger.debug('State transition', { from: 'START', to: 'INIT_PENDING' });

    expect(deps.stderrOutput).toHaveLength(0);
  });

  it('shows debug when verbose', () => {
    const deps = makeDeps();
    const logger = createLogger(true, deps);

    logger.debug('State transition', { from: 'START', to: 'INIT_PENDING' });

    expect(deps.stderrOutput[0]).toBe(
      `[${FIXED_ISO}] [DEBUG] State transition {"from":"START","to":"INIT_PENDING"}\n`,
    );
  });

  describe('child', () => {
    it('adds bound fields to every line', () => {
      const deps = makeDeps();
      const logger = createLogger(false, deps).child({ stage: 'exec' });

      logger.error('Simulation failed. Return code = 3');

      expect(deps.stderrOutput[0]).toBe(
        `[${FIXED_ISO}] [ERROR] Simulation failed. Return code = 3 {"stage":"exec"}\n`,
      );
    });

    it('puts bound fields before call-site fields and lets the call site override them', () => {
      const deps = makeDeps();
      const logger = createLogger(true, deps).child({ stage: 'init', attempt: 1 });

      logger.debug('Stage completed', { durationMs: 12, attempt: 2 });

      expect(deps.stderrOutput[0]).toBe(
        `[${FIXED_ISO}] [DEBUG] Stage completed {"stage":"init","attempt":2,"durationMs":12}\n`,
      );
    });

    it('keeps the verbose setting of its parent', () => {
      const deps = makeDeps();
      const logger = createLogger(false, deps).child({ stage: 'init' });

      logger.debug('Launching stage');

      expect(deps.stderrOutput).toHaveLength(0);
    });
  });
});
