import { pino } from 'pino';

const logger = pino({
  name: 'nimbus-sdk',
  level: process.env.LOG_LEVEL || 'info',
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = typeof logger;

export function createLogger(module: string): Logger {
  return logger.child({ module });
}

export default logger;
