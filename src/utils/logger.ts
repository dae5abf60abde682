import pino from 'pino';

let correlationId: string | undefined;

export function setCorrelationId(id: string): void {
  correlationId = id;
}

export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

function buildBaseLogger(): pino.Logger {
  const level = process.env.LOG_LEVEL || 'info';
  if (process.env.NODE_ENV === 'development') {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    });
  }
  // Keep test output quiet unless a level is asked for explicitly
  if (process.env.VITEST && !process.env.LOG_LEVEL) {
    return pino({ level: 'silent' });
  }
  return pino({ level, base: { service: 'auto-reply-assistant' } });
}

const baseLogger = buildBaseLogger();

export function createLogger(context?: Record<string, unknown>): pino.Logger {
  const correlationIdValue = correlationId || generateCorrelationId();
  if (!correlationId) {
    setCorrelationId(correlationIdValue);
  }

  return baseLogger.child({
    correlationId: correlationIdValue,
    ...context,
  });
}

export type Logger = pino.Logger;
