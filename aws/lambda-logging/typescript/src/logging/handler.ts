/**
 * Output handlers.
 *
 * A handler owns a formatter and writes each record it accepts to a sink.
 * Handlers never throw: emit failures are reported on stderr.
 */

import { LogLevel, parseLevel, type LevelInput } from '../levels/index.js';
import type { FieldMap } from '../types/index.js';
import type { LogRecord } from './record.js';

/**
 * Renders a record to a single line of text.
 */
export interface Formatter {
  format(record: LogRecord): string;

  /**
   * Merge fields into the formatter's template, for formatters that have one.
   */
  addField?(fields: FieldMap): void;
}

/**
 * Anything a line of text can be written to.
 */
export interface TextSink {
  write(chunk: string): unknown;
}

/**
 * Handler options.
 */
export interface HandlerOptions {
  /** Minimum level this handler accepts (default NOTSET: everything) */
  level?: LevelInput;
  /** Formatter (default: `LEVEL:name:message` text) */
  formatter?: Formatter;
}

/**
 * Plain text rendering used by handlers without a formatter.
 */
export function formatPlain(record: LogRecord): string {
  return `${record.levelName}:${record.name}:${record.getMessage()}`;
}

export abstract class Handler {
  level: number;
  formatter: Formatter | undefined;

  constructor(options: HandlerOptions = {}) {
    this.level = options.level === undefined ? LogLevel.NotSet : parseLevel(options.level);
    this.formatter = options.formatter;
  }

  setLevel(level: LevelInput): void {
    this.level = parseLevel(level);
  }

  setFormatter(formatter: Formatter | undefined): void {
    this.formatter = formatter;
  }

  format(record: LogRecord): string {
    return this.formatter ? this.formatter.format(record) : formatPlain(record);
  }

  /**
   * Emit the record if it passes this handler's level.
   *
   * @returns whether the record was accepted
   */
  handle(record: LogRecord): boolean {
    if (record.levelNo < this.level) {
      return false;
    }
    try {
      this.emit(record);
    } catch (error) {
      this.handleError(error, record);
    }
    return true;
  }

  protected abstract emit(record: LogRecord): void;

  protected handleError(error: unknown, record: LogRecord): void {
    const detail = error instanceof Error ? (error.stack ?? error.message) : String(error);
    process.stderr.write(
      `--- Logging error ---\n${detail}\nRecord from logger "${record.name}" at ${record.pathname}:${record.lineno}\n`
    );
  }
}

/**
 * Writes one formatted line per record to a text sink.
 */
export class StreamHandler extends Handler {
  readonly stream: TextSink;

  constructor(stream: TextSink = process.stdout, options: HandlerOptions = {}) {
    super(options);
    this.stream = stream;
  }

  protected emit(record: LogRecord): void {
    this.stream.write(`${this.format(record)}\n`);
  }
}

/**
 * Keeps formatted lines in memory, for tests.
 */
export class MemoryHandler extends Handler {
  private lines: string[] = [];
  private records: LogRecord[] = [];

  protected emit(record: LogRecord): void {
    this.lines.push(this.format(record));
    this.records.push(record);
  }

  getLines(): string[] {
    return [...this.lines];
  }

  getRecords(): LogRecord[] {
    return [...this.records];
  }

  clear(): void {
    this.lines = [];
    this.records = [];
  }
}
