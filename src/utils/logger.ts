import pino from 'pino';

// stdout belongs to the REPL, so every log line goes to stderr
const STDERR = 2;

export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

function createBaseLogger(): pino.Logger {
  const level = process.env.LOG_LEVEL || 'warn';

  if (process.env.NODE_ENV === 'development') {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
          destination: STDERR,
        },
      },
    });
  }

  return pino({ level }, pino.destination(STDERR));
}

const baseLogger = createBaseLogger();

export function createLogger(context?: Record<string, unknown>): pino.Logger {
  return context ? baseLogger.child(context) : baseLogger;
}

export const logger = createLogger();
