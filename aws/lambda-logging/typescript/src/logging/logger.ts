/**
 * Named loggers.
 *
 * A logger filters by its effective level, builds a record with the caller's
 * source location and hands it to its own handlers and then to those of its
 * ancestors while `propagate` is set.
 */

import { LogLevel, parseLevel, type LevelInput } from '../levels/index.js';
import { captureCallSite } from './callsite.js';
import { StreamHandler, type Handler } from './handler.js';
import { LogRecord } from './record.js';

/**
 * Used when a record reaches no handler at all.
 */
const LAST_RESORT = new StreamHandler(process.stderr, { level: LogLevel.Warning });

/**
 * Logger options.
 */
export interface LoggerOptions {
  /** Initial level (default NOTSET: inherit from the parent) */
  level?: number;
  /** Resolves the parent logger; absent for the root logger */
  parent?: () => Logger | undefined;
}

export class Logger {
  readonly name: string;
  level: number;
  propagate = true;

  private readonly handlerList: Handler[] = [];
  private readonly resolveParent: () => Logger | undefined;

  constructor(name: string, options: LoggerOptions = {}) {
    this.name = name;
    this.level = options.level ?? LogLevel.NotSet;
    this.resolveParent = options.parent ?? (() => undefined);
  }

  get parent(): Logger | undefined {
    return this.resolveParent();
  }

  get handlers(): readonly Handler[] {
    return this.handlerList;
  }

  addHandler(handler: Handler): void {
    if (!this.handlerList.includes(handler)) {
      this.handlerList.push(handler);
    }
  }

  removeHandler(handler: Handler): void {
    const index = this.handlerList.indexOf(handler);
    if (index !== -1) {
      this.handlerList.splice(index, 1);
    }
  }

  /**
   * @throws {InvalidLevelError} if the level is not recognised
   */
  setLevel(level: LevelInput): void {
    this.level = parseLevel(level);
  }

  /**
   * The first level set on this logger or an ancestor.
   */
  getEffectiveLevel(): number {
    let current: Logger | undefined = this;
    while (current) {
      if (current.level !== LogLevel.NotSet) {
        return current.level;
      }
      current = current.parent;
    }
    return LogLevel.NotSet;
  }

  isEnabledFor(level: number): boolean {
    return level >= this.getEffectiveLevel();
  }

  debug(message: unknown, ...args: unknown[]): void {
    this.emitAt(LogLevel.Debug, message, args, undefined, this.debug);
  }

  info(message: unknown, ...args: unknown[]): void {
    this.emitAt(LogLevel.Info, message, args, undefined, this.info);
  }

  warning(message: unknown, ...args: unknown[]): void {
    this.emitAt(LogLevel.Warning, message, args, undefined, this.warning);
  }

  warn(message: unknown, ...args: unknown[]): void {
    this.emitAt(LogLevel.Warning, message, args, undefined, this.warn);
  }

  error(message: unknown, ...args: unknown[]): void {
    this.emitAt(LogLevel.Error, message, args, undefined, this.error);
  }

  critical(message: unknown, ...args: unknown[]): void {
    this.emitAt(LogLevel.Critical, message, args, undefined, this.critical);
  }

  /**
   * Log at ERROR with an error attached; formatters render its stack as the
   * `exception` field.
   */
  exception(message: unknown, error: unknown, ...args: unknown[]): void {
    this.emitAt(LogLevel.Error, message, args, error, this.exception);
  }

  log(level: number, message: unknown, ...args: unknown[]): void {
    this.emitAt(level, message, args, undefined, this.log);
  }

  /**
   * Dispatch a record to this logger's handlers and its ancestors'.
   */
  handle(record: LogRecord): void {
    let reached = 0;
    let current: Logger | undefined = this;

    while (current) {
      for (const handler of current.handlers) {
        reached++;
        handler.handle(record);
      }
      if (!current.propagate) {
        break;
      }
      current = current.parent;
    }

    if (reached === 0) {
      LAST_RESORT.handle(record);
    }
  }

  private emitAt(
    level: number,
    message: unknown,
    args: readonly unknown[],
    error: unknown,
    boundary: Function
  ): void {
    if (!this.isEnabledFor(level)) {
      return;
    }

    this.handle(
      new LogRecord({
        name: this.name,
        level,
        message,
        args,
        error,
        callSite: captureCallSite(boundary),
      })
    );
  }
}
