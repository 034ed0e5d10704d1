import pino from 'pino';
import type { Logger } from 'pino';
import type { LogLevel } from './config.js';

/**
 * Structured logger for the CLI.
 *
 * Writes to stderr so stdout carries nothing but the JSON report.
 */
export function createLogger(level: LogLevel): Logger {
  return pino({ name: 'export-summary', level }, pino.destination(2));
}
