import { destination, pino, type DestinationStream, type Logger } from 'pino';
import type { AppConfig } from './config/schema.js';

export type { Logger };

/**
 * Structured logger shared by every transport. Output always goes to stderr:
 * in stdio mode stdout carries protocol frames only.
 */
export function createLogger(level: AppConfig['LOG_LEVEL'] = 'info', stream: DestinationStream = destination(2)): Logger {
  return pino({ name: 'gael-tools-gateway', level }, stream);
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
