import pino, { type LoggerOptions } from 'pino';

const pretty = process.env['FXLOG_LOG_PRETTY'] === 'true';

// Build options conditionally to satisfy exactOptionalPropertyTypes
const options: LoggerOptions = {
  name: 'fxlog',
  level: process.env['FXLOG_LOG_LEVEL'] ?? 'warn',
  base: {
    pid: undefined,
    hostname: undefined,
  },
};

// stderr only: stdout may be carrying a bar region
if (pretty) {
  options.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
      destination: 2,
    },
  };
}

export const logger = pretty ? pino(options) : pino(options, pino.destination(2));

export function createLogger(module: string): pino.Logger {
  return logger.child({ module });
}
