import pino, { type Logger } from 'pino';

type LogFn = {
  (obj: object, msg?: string): void;
  (msg: string): void;
};

/**
 * The subset of a pino logger the engine writes to. Both a standalone pino
 * logger and Fastify's request/app logger satisfy it.
 */
export interface EngineLogger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

export function createLogger(name: string): Logger {
  return pino({ name, level: process.env.LOG_LEVEL ?? 'info' });
}

export const defaultLogger: EngineLogger = createLogger('beatcut-engine');
