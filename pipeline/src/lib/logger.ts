import pino from 'pino';

// Structured logs go to stderr; stdout carries the run summary
export const logger = pino(
  {
    level: process.env.LOG_LEVEL || 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    // Redact credentials that may ride along in oracle or storage errors
    redact: {
      paths: [
        'authorization',
        'Authorization',
        'token',
        'accessToken',
        'secretAccessKey',
        'sessionToken',
        'credentials',
      ],
      censor: '[REDACTED]',
    },
  },
  pino.destination(2)
);

// Create child logger with run context
export function createRunLogger(runId: string, command?: string) {
  return logger.child({
    runId,
    ...(command && { command }),
  });
}

export type Logger = typeof logger;
