import pino, { type Logger, type DestinationStream } from 'pino';

const REDACT_PATHS = [
  'token',
  'apiKey',
  'password',
  'secret',
];

export function createRootLogger(destination?: DestinationStream, level?: string): Logger {
  return pino(
    {
      name: 'linetag',
      level: level ?? process.env.LOG_LEVEL ?? 'warn',
      redact: {
        paths: REDACT_PATHS,
        censor: '[REDACTED]',
      },
      formatters: {
        level(label) {
          return { level: label };
        },
      },
    },
    // stdout carries the CLI's own notices; logs go to stderr
    destination ?? pino.destination(2),
  );
}

let logger = createRootLogger();

/** Replace the root logger, e.g. once the CLI has read LOG_LEVEL through its env config. */
export function setRootLogger(next: Logger): void {
  logger = next;
}

export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

export function getLogger(): Logger {
  return logger;
}
