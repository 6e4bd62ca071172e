export type LogContext = Record<string, unknown>;

export interface Logger {
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  /** Logger that adds `bindings` to the context of every line, e.g. `{ stage: 'init' }`. */
  child(bindings: LogContext): Logger;
}

/**
 * Injectable dependencies for createLogger.
 * Defaults to real implementations; tests can override.
 */
export interface LoggerDeps {
  writeStderr: (data: string) => void;
  now: () => Date;
}

const defaultDeps: LoggerDeps = {
  writeStderr: (data: string) => process.stderr.write(data),
  now: () => new Date(),
};

type Level = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG';

/**
 * Format: [ISO-timestamp] [LEVEL] message { context }
 * Bound fields come first in the context, call-site fields override them.
 */
function formatLogLine(timestamp: string, level: Level, message: string, context: LogContext): string {
  const line = `[${timestamp}] [${level}] ${message}`;
  return Object.keys(context).length > 0 ? `${line} ${JSON.stringify(context)}\n` : `${line}\n`;
}

/**
 * Create a structured logger that writes to stderr.
 *
 * - info, warn, error: always shown
 * - debug: only shown when verbose=true
 * - stdout is left to the simulation binaries and dry-run output
 */
export function createLogger(verbose: boolean, deps: Partial<LoggerDeps> = {}): Logger {
  const resolved: LoggerDeps = { ...defaultDeps, ...deps };

  function build(bindings: LogContext): Logger {
    function log(level: Level, message: string, context?: LogContext): void {
      if (level === 'DEBUG' && !verbose) return;
      resolved.writeStderr(
        formatLogLine(resolved.now().toISOString(), level, message, { ...bindings, ...context }),
      );
    }

    return {
      info: (message, context) => log('INFO', message, context),
      warn: (message, context) => log('WARN', message, context),
      error: (message, context) => log('ERROR', message, context),
      debug: (message, context) => log('DEBUG', message, context),
      child: (extra) => build({ ...bindings, ...extra }),
    };
  }

  return build({});
}
