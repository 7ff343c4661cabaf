import pino, { type Logger, type LoggerOptions } from 'pino';

import { config } from '../config';

export type ContextFields = {
  traceId?: string;
  appointmentId?: string;
  providerId?: number;
  [key: string]: unknown;
};

export type SharedLogger = Logger & {
  withContext(context: ContextFields): SharedLogger;
};

function attachContextAPI(base: Logger): SharedLogger {
  return Object.assign(base, {
    withContext: (context: ContextFields): SharedLogger => attachContextAPI(base.child(context))
  });
}

export function createLogger(options: LoggerOptions = {}): SharedLogger {
  const base = pino({
    level: config.LOG_LEVEL,
    base: {
      service: config.SERVICE_NAME
    },
    ...options
  });

  return attachContextAPI(base);
}

export const logger = createLogger();
