import pino, { Logger, LoggerOptions } from 'pino';

export type AppLogger = Logger;

export interface LoggerConfig {
  level?: string;
  name?: string;
}

/** Create the Pino logger shared by the services and the Fastify server. */
export function createLogger(config: LoggerConfig = {}): AppLogger {
  const options: LoggerOptions = {
    name: config.name ?? 'telegram-gateway',
    level: config.level ?? inferDefaultLevel(),
    redact: ['req.headers["x-telegram-bot-api-secret-token"]'],
  };

  return pino(options);
}

function inferDefaultLevel(): string {
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}
