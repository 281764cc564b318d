/**
 * Logging setup.
 *
 * `setup` installs a fresh formatter on every root handler, sets the root
 * level and quiets the AWS SDK loggers. It never throws: an invalid level
 * falls back to INFO and is reported through the root logger.
 *
 * @module setup
 */

import { InvalidLevelError } from '../errors/index.js';
import { JsonFormatter } from '../formatter/index.js';
import { LogLevel, parseLevel, type LevelInput } from '../levels/index.js';
import { defaultRegistry, type Formatter, type Logger, type LoggerRegistry } from '../logging/index.js';
import type { FieldMap } from '../types/index.js';

/**
 * Builds the formatter `setup` installs.
 */
export type FormatterFactory<F extends Formatter = Formatter> = (fields: FieldMap) => F;

/**
 * Loggers whose level follows `auxiliaryLevel`.
 */
export const DEFAULT_AUXILIARY_LOGGERS: readonly string[] = ['aws-sdk', '@aws-sdk', '@smithy'];

export const jsonFormatterFactory: FormatterFactory<JsonFormatter> = (fields) => new JsonFormatter({ fields });

/**
 * Setup options.
 */
export interface SetupOptions {
  /** Root level (default DEBUG) */
  level?: LevelInput;
  /** Fields added to every entry */
  fields?: FieldMap;
  /** Formatter factory (default JsonFormatter); `null` leaves handlers as they are */
  formatter?: FormatterFactory | null;
  /** Level for the auxiliary loggers (default: the root level) */
  auxiliaryLevel?: LevelInput;
  /** Auxiliary logger names */
  auxiliaryLoggers?: readonly string[];
  /** Registry to configure (default: the process-wide one) */
  registry?: LoggerRegistry;
}

/**
 * Configure logging for an invocation.
 *
 * @returns the installed formatter, to pass to later `addField` calls;
 * `undefined` only when `formatter` is `null`
 */
export function setup(options?: Omit<SetupOptions, 'formatter'> & { formatter?: undefined }): JsonFormatter;
export function setup<F extends Formatter>(
  options: Omit<SetupOptions, 'formatter'> & { formatter: FormatterFactory<F> }
): F;
export function setup(options?: SetupOptions): Formatter | undefined;
export function setup(options: SetupOptions = {}): Formatter | undefined {
  const registry = options.registry ?? defaultRegistry;
  const factory = options.formatter === undefined ? jsonFormatterFactory : options.formatter;

  let installed: Formatter | undefined;
  if (factory) {
    installed = factory(options.fields ?? {});
    for (const handler of registry.root.handlers) {
      handler.setFormatter(installed);
    }
    registry.activeFormatter = installed;
  }

  const level = applyLevel([registry.root], options.level ?? 'DEBUG', registry.root);

  const auxiliaryLoggers = (options.auxiliaryLoggers ?? DEFAULT_AUXILIARY_LOGGERS).map((name) =>
    registry.getLogger(name)
  );
  applyLevel(auxiliaryLoggers, options.auxiliaryLevel ?? level, registry.root);

  return installed;
}

/**
 * Merge fields into the formatter most recently installed by `setup`.
 * Does nothing before the first `setup` call.
 */
export function addField(fields: FieldMap, registry: LoggerRegistry = defaultRegistry): void {
  registry.activeFormatter?.addField?.(fields);
}

/**
 * Set one level on every logger. An invalid level becomes INFO and is reported
 * once, after the loggers are set.
 */
function applyLevel(loggers: readonly Logger[], level: LevelInput, reporter: Logger): number {
  let resolved: number;
  let invalid = false;
  try {
    resolved = parseLevel(level);
  } catch (error) {
    if (!(error instanceof InvalidLevelError)) {
      throw error;
    }
    resolved = LogLevel.Info;
    invalid = true;
  }

  for (const logger of loggers) {
    logger.setLevel(resolved);
  }
  if (invalid) {
    reporter.error('Invalid log level: %s', level);
  }
  return resolved;
}
