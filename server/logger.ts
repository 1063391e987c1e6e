import pino from 'pino';

/**
 * Logs go to stderr so command output on stdout (export paths, probe results)
 * stays pipeable.
 */
const logger: pino.Logger = pino(
  {
    name: 'market-data-sync',
    level: process.env.LOG_LEVEL || 'info',
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2),
);

export function formatArgs(args: unknown[]): string {
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

let consoleRedirected = false;

/**
 * Redirect console methods to pino so the tagged `console.*` calls in the
 * services produce structured JSON output. Only the CLI entry point installs
 * this; tests keep the plain console.
 */
export function redirectConsoleToLogger(target: pino.Logger = logger): void {
  if (consoleRedirected) return;
  consoleRedirected = true;
  console.log = (...args: unknown[]) => target.info(formatArgs(args));
  console.error = (...args: unknown[]) => target.error(formatArgs(args));
  console.warn = (...args: unknown[]) => target.warn(formatArgs(args));
  console.info = (...args: unknown[]) => target.info(formatArgs(args));
  console.debug = (...args: unknown[]) => target.debug(formatArgs(args));
}

export default logger;
