import pino from 'pino';

const logLevel = process.env.LOG_LEVEL || 'info';

// stdout carries the AGI protocol, so everything goes to stderr
export const logger = pino(
  {
    level: logLevel,
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'agi-tts',
      environment: process.env.NODE_ENV || 'development',
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  },
  pino.destination(2)
);

export type Logger = pino.Logger;
