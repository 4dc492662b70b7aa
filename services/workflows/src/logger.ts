import type { LoggerOptions } from 'pino';
import { stdTimeFunctions } from 'pino';

export const REDACTED_PATHS = ['req.headers.authorization', 'req.headers.cookie'];

/** Fastify logger options; request credentials never reach the log. */
export const createLogger = (level: string): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime,
  redact: { paths: REDACTED_PATHS, censor: '[redacted]' }
});
