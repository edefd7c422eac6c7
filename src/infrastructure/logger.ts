import pino, { LoggerOptions } from 'pino';

/**
 * The slice of pino's API the pipeline uses. Fastify's `app.log` and a bare
 * `pino()` instance both satisfy it, so workers and scripts share one shape.
 */
export interface Logger {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
  child(bindings: Record<string, unknown>): Logger;
}

export function buildLoggerOptions(params: {
  level: string;
  nodeEnv: 'development' | 'production' | 'test';
  name?: string;
}): LoggerOptions {
  return {
    name: params.name,
    level: params.level,
    transport:
      params.nodeEnv === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    redact: ['req.headers.authorization', 'req.headers.cookie', 'headers.Authorization', 'erp.token'],
  };
}

export function createLogger(params: Parameters<typeof buildLoggerOptions>[0]): Logger {
  return pino(buildLoggerOptions(params));
}
