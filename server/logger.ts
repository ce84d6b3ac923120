import pino from 'pino';

const logger: pino.Logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'ema-screener', pid: process.pid },
  redact: ['headers["x-update-secret"]', 'secret'],
  formatters: {
    level(label: string) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

// Redirect console methods to pino so startup validation and third-party
// console output end up as structured JSON lines too.
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

console.log = (...args: unknown[]) => logger.info(formatArgs(args));
console.error = (...args: unknown[]) => logger.error(formatArgs(args));
console.warn = (...args: unknown[]) => logger.warn(formatArgs(args));
console.info = (...args: unknown[]) => logger.info(formatArgs(args));
console.debug = (...args: unknown[]) => logger.debug(formatArgs(args));

export function moduleLogger(module: string): pino.Logger {
  return logger.child({ module });
}

export default logger;
