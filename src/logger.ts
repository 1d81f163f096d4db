import pino, { type Logger } from 'pino';
import { loadConfig } from './config.js';

export type { Logger };

/** Create a logger writing to stderr; stdout carries program output. */
export function createLogger(level: string = loadConfig().logLevel): Logger {
  return pino({ name: 'stackvm', level }, pino.destination(2));
}

export const logger: Logger = createLogger();
