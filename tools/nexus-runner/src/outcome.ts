import type { FailedOutcome, RunResult, StageName } from './types.js';

const STAGE_LABELS: Record<StageName, string> = {
  init: 'Initialization',
  exec: 'Simulation',
};

export function stageLabel(stage: StageName): string {
  return STAGE_LABELS[stage];
}

/**
 * User-facing message for a stage that did not succeed.
 */
export function describeOutcome(outcome: FailedOutcome): string {
  const label = stageLabel(outcome.stage);
  switch (outcome.status) {
    case 'failed':
      return `${label} failed. Return code = ${outcome.exitCode}`;
    case 'killed':
      return `${label} was terminated by signal ${outcome.signal}`;
    case 'launch-failed':
      return `${label} could not be launched: ${outcome.error.message}`;
    case 'cancelled':
      return `${label} was not started: received ${outcome.signal}`;
  }
}

/**
 * Process exit code for a run result.
 * A stage's own exit status is propagated when it fits in 1-255; anything else maps to 1.
 */
export function exitCodeFor(result: RunResult): number {
  if (result.state === 'done') return 0;
  const { outcome } = result;
  if (outcome.status === 'failed' && outcome.exitCode >= 1 && outcome.exitCode <= 255) {
    return outcome.exitCode;
  }
  return 1;
}
