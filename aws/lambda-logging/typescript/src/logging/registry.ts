/**
 * Logger registry: the root logger, one logger per dotted name, and the
 * formatter most recently installed by `setup`.
 */

import { LogLevel } from '../levels/index.js';
import { StreamHandler, type Formatter, type Handler } from './handler.js';
import { Logger } from './logger.js';

/**
 * Registry options.
 */
export interface LoggerRegistryOptions {
  /** Root logger level (default WARNING) */
  rootLevel?: number;
  /** Handlers attached to the root logger */
  handlers?: readonly Handler[];
}

export class LoggerRegistry {
  readonly root: Logger;

  /**
   * Formatter installed by the last `setup` call against this registry.
   */
  activeFormatter: Formatter | undefined;

  private readonly loggers = new Map<string, Logger>();

  constructor(options: LoggerRegistryOptions = {}) {
    this.root = new Logger('root', { level: options.rootLevel ?? LogLevel.Warning });
    for (const handler of options.handlers ?? []) {
      this.root.addHandler(handler);
    }
  }

  /**
   * Get or create a logger. No name (or `root`) returns the root logger.
   */
  getLogger(name?: string): Logger {
    if (!name || name === 'root') {
      return this.root;
    }

    const existing = this.loggers.get(name);
    if (existing) {
      return existing;
    }

    const logger = new Logger(name, { parent: () => this.parentOf(name) });
    this.loggers.set(name, logger);
    return logger;
  }

  /**
   * Names of every logger created so far, root excluded.
   */
  loggerNames(): string[] {
    return [...this.loggers.keys()];
  }

  private parentOf(name: string): Logger {
    let prefix = name;
    let dot = prefix.lastIndexOf('.');
    while (dot > 0) {
      prefix = prefix.slice(0, dot);
      const ancestor = this.loggers.get(prefix);
      if (ancestor) {
        return ancestor;
      }
      dot = prefix.lastIndexOf('.');
    }
    return this.root;
  }
}

/**
 * Process-wide registry. Its root logger writes to stdout, which the Lambda
 * runtime forwards to CloudWatch Logs.
 */
export const defaultRegistry = new LoggerRegistry({ handlers: [new StreamHandler()] });

/**
 * Get a logger from the process-wide registry.
 */
export function getLogger(name?: string): Logger {
  return defaultRegistry.getLogger(name);
}
