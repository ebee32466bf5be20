import { pino, destination } from 'pino';
import type { Logger, LogLevel } from '../types/logger.js';

/**
 * pino logger for the CLI.
 * Writes to stderr so stdout only carries WHOIS output.
 */
export function createLogger(level: LogLevel, name = 'whoiskit'): Logger {
  return pino({ name, level }, destination(2));
}
