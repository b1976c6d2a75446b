import pino from 'pino';

export type Logger = pino.Logger;

const logger: Logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level(label: string) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/** A logger that drops everything; handy for tests and dry runs. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

function formatArgs(args: unknown[]): string {
  return args
    .map((a) => {
      if (a instanceof Error) return a.stack || a.message;
      if (typeof a === 'object' && a !== null) {
        try {
          return JSON.stringify(a);
        } catch {
          return String(a);
        }
      }
      return String(a);
    })
    .join(' ');
}

/**
 * Redirect console methods to pino so stray console.log/error/warn calls
 * (ours or a dependency's) produce structured JSON output on the server.
 */
export function routeConsoleToLogger(target: Logger = logger): void {
  console.log = (...args: unknown[]) => target.info(formatArgs(args));
  console.error = (...args: unknown[]) => target.error(formatArgs(args));
  console.warn = (...args: unknown[]) => target.warn(formatArgs(args));
  console.info = (...args: unknown[]) => target.info(formatArgs(args));
  console.debug = (...args: unknown[]) => target.debug(formatArgs(args));
}

export default logger;
