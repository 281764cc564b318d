/**
 * Log record: one logging event, created per call and discarded after it has
 * been handled.
 */

import { format } from 'node:util';
import { levelName } from '../levels/index.js';
import type { CallSite } from '../types/index.js';
import { UNKNOWN_CALL_SITE } from './callsite.js';

/**
 * Options for creating a log record.
 */
export interface LogRecordInit {
  /** Name of the logger that created the record */
  name: string;
  /** Numeric severity */
  level: number;
  /** Raw message: text, a structured mapping, or a JSON string */
  message: unknown;
  /** printf-style arguments for a text message */
  args?: readonly unknown[];
  /** Attached error, if the call was made while handling one */
  error?: unknown;
  /** Source location of the call */
  callSite?: CallSite;
  /** Creation time (defaults to now) */
  created?: Date;
}

export class LogRecord {
  readonly name: string;
  readonly levelNo: number;
  readonly levelName: string;
  readonly message: unknown;
  readonly args: readonly unknown[];
  readonly error: unknown;
  readonly created: Date;
  readonly pathname: string;
  readonly filename: string;
  readonly module: string;
  readonly funcName: string;
  readonly lineno: number;
  readonly process: number;

  /**
   * Formatted exception text. Filled in by the first formatter that needs it
   * and reused by every later one.
   */
  exceptionText?: string;

  constructor(init: LogRecordInit) {
    const site = init.callSite ?? UNKNOWN_CALL_SITE;

    this.name = init.name;
    this.levelNo = init.level;
    this.levelName = levelName(init.level);
    this.message = init.message;
    this.args = init.args ?? [];
    this.error = init.error;
    this.created = init.created ?? new Date();
    this.pathname = site.pathname;
    this.filename = site.filename;
    this.module = site.module;
    this.funcName = site.funcName;
    this.lineno = site.lineno;
    this.process = process.pid;
  }

  /**
   * Whether an error is attached to the record.
   */
  get hasError(): boolean {
    return this.error !== undefined;
  }

  /**
   * Render the message text, substituting printf-style arguments.
   */
  getMessage(): string {
    if (typeof this.message === 'string') {
      return this.args.length > 0 ? format(this.message, ...this.args) : this.message;
    }
    return format(this.message, ...this.args);
  }
}
