import pino from 'pino';

const level = process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info');

// stderr keeps stdout free for reports printed by the CLI
export const logger = pino(
  {
    level,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
    },
  },
  pino.destination(2),
);

/** Create a child logger bound to a detection run */
export function runLogger(runId: string, extra?: Record<string, unknown>): pino.Logger {
  return logger.child({ runId, ...extra });
}
