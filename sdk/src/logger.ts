import { pino } from 'pino';
import type { LevelWithSilent } from 'pino';
import { LOG_LEVEL_ENV } from './constants.js';

/**
 * Logging surface the SDK components write to. A pino logger satisfies it;
 * so does anything else with the same four methods.
 */
export interface SdkLogger {
  debug(...a: unknown[]): void;
  info(...a: unknown[]): void;
  warn(...a: unknown[]): void;
  error(...a: unknown[]): void;
}

export type LogLevel = LevelWithSilent;

const LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some(level => level === value);
}

function levelFromEnv(): LogLevel {
  const value = process.env[LOG_LEVEL_ENV]?.toLowerCase();
  return value !== undefined && isLogLevel(value) ? value : 'warn';
}

export const makeLogger = (level: LogLevel = levelFromEnv(), name = 'ledger-sdk'): SdkLogger =>
  pino({ name, level });
