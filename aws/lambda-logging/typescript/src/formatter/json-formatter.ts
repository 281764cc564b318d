/**
 * JSON formatter.
 *
 * Renders a record as one JSON object: the template fields, then `message`,
 * then `exception` when an error is attached. Formatting never throws.
 *
 * The field template is mutable and unsynchronized. Share a formatter only
 * within one thread; `addField` racing a `format` call from a worker thread is
 * unsupported.
 *
 * @example
 * ```typescript
 * const formatter = new JsonFormatter({ fields: { service: 'orders' } });
 * handler.setFormatter(formatter);
 * formatter.addField({ aws_request_id: context.awsRequestId });
 * ```
 */

import type { Formatter, LogRecord } from '../logging/index.js';
import type { FieldMap, RecordAttributes } from '../types/index.js';
import { formatException } from './exception.js';
import { classifyMessage, renderMessage } from './message.js';
import { defaultJsonSerializer, serialize, type JsonDefault } from './serializer.js';
import { FieldTemplate, type FieldPresetName } from './template.js';

/**
 * JSON formatter options.
 */
export interface JsonFormatterOptions {
  /** Fields added to (or overriding) the preset */
  fields?: FieldMap;
  /** Base field set (default `location`) */
  preset?: FieldPresetName;
  /** Serializer for values JSON cannot represent (default: string coercion) */
  jsonDefault?: JsonDefault;
  /** Timestamp rendering (default ISO-8601) */
  formatTime?: (date: Date) => string;
  /** Replace string messages that parse as JSON with the parsed value (default true) */
  parseJsonMessages?: boolean;
}

export const isoTime = (date: Date): string => date.toISOString();

export class JsonFormatter implements Formatter {
  private readonly template: FieldTemplate;
  private readonly jsonDefault: JsonDefault;
  private readonly formatTime: (date: Date) => string;
  private readonly parseJsonMessages: boolean;

  constructor(options: JsonFormatterOptions = {}) {
    this.template = FieldTemplate.fromPreset(options.preset ?? 'location', options.fields);
    this.jsonDefault = options.jsonDefault ?? defaultJsonSerializer;
    this.formatTime = options.formatTime ?? isoTime;
    this.parseJsonMessages = options.parseJsonMessages ?? true;
  }

  addField(fields: FieldMap): void {
    this.template.merge(fields);
  }

  fields(): FieldMap {
    return this.template.snapshot();
  }

  format(record: LogRecord): string {
    const entry = this.template.resolve(this.attributesOf(record));
    entry.message = renderMessage(classifyMessage(record), this.parseJsonMessages);

    const exceptionText = this.exceptionTextOf(record);
    if (exceptionText) {
      entry.exception = exceptionText;
    }

    return serialize(entry, this.jsonDefault);
  }

  private exceptionTextOf(record: LogRecord): string | undefined {
    if (record.hasError && record.exceptionText === undefined) {
      record.exceptionText = formatException(record.error);
    }
    return record.exceptionText;
  }

  private attributesOf(record: LogRecord): RecordAttributes {
    return {
      timestamp: this.timestampOf(record.created),
      created: record.created.getTime(),
      level: record.levelName,
      levelNo: record.levelNo,
      name: record.name,
      message: record.getMessage(),
      pathname: record.pathname,
      filename: record.filename,
      module: record.module,
      funcName: record.funcName,
      lineno: record.lineno,
      process: record.process,
    };
  }

  private timestampOf(date: Date): string {
    try {
      return this.formatTime(date);
    } catch {
      return isoTime(date);
    }
  }
}
