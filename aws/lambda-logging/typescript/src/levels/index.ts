/**
 * Severity levels.
 *
 * Levels are plain integers so that custom severities can sit between the
 * named ones. Names are matched case-insensitively on input and always
 * rendered upper-case.
 *
 * @module levels
 */

import { InvalidLevelError } from '../errors/index.js';

/**
 * Named severity levels.
 */
export const LogLevel = {
  NotSet: 0,
  Debug: 10,
  Info: 20,
  Warning: 30,
  Error: 40,
  Critical: 50,
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Canonical level names, as rendered in log entries.
 */
export type LevelName = 'NOTSET' | 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL';

/**
 * Anything a caller may pass where a level is expected.
 */
export type LevelInput = number | string;

const NAME_BY_LEVEL = new Map<number, LevelName>([
  [LogLevel.NotSet, 'NOTSET'],
  [LogLevel.Debug, 'DEBUG'],
  [LogLevel.Info, 'INFO'],
  [LogLevel.Warning, 'WARNING'],
  [LogLevel.Error, 'ERROR'],
  [LogLevel.Critical, 'CRITICAL'],
]);

const LEVEL_BY_NAME = new Map<string, number>([
  ['NOTSET', LogLevel.NotSet],
  ['DEBUG', LogLevel.Debug],
  ['INFO', LogLevel.Info],
  ['WARNING', LogLevel.Warning],
  ['WARN', LogLevel.Warning],
  ['ERROR', LogLevel.Error],
  ['CRITICAL', LogLevel.Critical],
  ['FATAL', LogLevel.Critical],
]);

/**
 * Map a level input to its numeric severity.
 *
 * @throws {InvalidLevelError} for unknown names and for numbers that are not
 * non-negative integers
 */
export function parseLevel(input: LevelInput): number {
  if (typeof input === 'number') {
    if (Number.isInteger(input) && input >= 0) {
      return input;
    }
    throw new InvalidLevelError(input);
  }

  // Names from the environment are often lowercase (`log_level=debug`).
  const level = LEVEL_BY_NAME.get(input.trim().toUpperCase());
  if (level === undefined) {
    throw new InvalidLevelError(input);
  }
  return level;
}

/**
 * Render a numeric level. Unnamed levels render as `Level <n>`.
 */
export function levelName(level: number): string {
  return NAME_BY_LEVEL.get(level) ?? `Level ${level}`;
}

/**
 * Whether the input names a known level, without throwing.
 */
export function isValidLevel(input: LevelInput): boolean {
  if (typeof input === 'number') {
    return Number.isInteger(input) && input >= 0;
  }
  return LEVEL_BY_NAME.has(input.trim().toUpperCase());
}
