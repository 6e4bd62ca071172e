import type { LaunchCommand, StageRequest } from './types.js';

export const DEFAULT_LAUNCHER = 'mpiexec';

/**
 * Build the argument vector for a stage.
 *
 * With more than one worker the base invocation is wrapped by the
 * parallel launcher: `<launcher> -np <n> <binary> <input> -c <output> -s <study>`.
 * Nothing is validated here; binary resolution belongs to config loading.
 */
export function composeCommand(request: StageRequest, launcher: string = DEFAULT_LAUNCHER): LaunchCommand {
  const base = [
    request.stageBinary,
    request.inputCase,
    '-c',
    request.outputCase,
    '-s',
    request.study,
  ];

  if (request.workerCount > 1) {
    return [launcher, '-np', String(request.workerCount), ...base];
  }
  return base;
}
