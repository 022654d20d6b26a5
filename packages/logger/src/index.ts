import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

const options: LoggerOptions = {
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'autodj' },
};

// The terminal belongs to the status view, so logs go to a file when one is configured.
function createRootLogger(): Logger {
  const file = process.env.LOG_FILE;
  if (file) {
    return pino(options, pino.destination({ dest: file, mkdir: true, sync: false }));
  }
  return pino(options, pino.destination(2));
}

export const logger: Logger = createRootLogger();

export function createChildLogger(bindings: Record<string, string>): Logger {
  return logger.child(bindings);
}
