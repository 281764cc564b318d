/**
 * Message resolution.
 */

import type { LogRecord } from '../logging/index.js';

/**
 * A record's message, classified once per format call.
 */
export type Message =
  | { readonly kind: 'structured'; readonly value: Record<string, unknown> }
  | { readonly kind: 'text'; readonly value: string };

/**
 * Whether a value is a plain object literal (or has a null prototype).
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

export function classifyMessage(record: LogRecord): Message {
  if (isPlainObject(record.message)) {
    return { kind: 'structured', value: record.message };
  }
  return { kind: 'text', value: record.getMessage() };
}

/**
 * Parse text as JSON, returning the text itself when it is not JSON or when
 * it holds an integer a number cannot represent exactly.
 */
export function parseJsonOrText(text: string): unknown {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return text;
  }
  return hasUnsafeInteger(parsed) ? text : parsed;
}

function hasUnsafeInteger(value: unknown): boolean {
  if (typeof value === 'number') {
    return Number.isInteger(value) && !Number.isSafeInteger(value);
  }
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return Object.values(value).some(hasUnsafeInteger);
}

/**
 * The value written to the `message` field.
 */
export function renderMessage(message: Message, parseJson: boolean): unknown {
  if (message.kind === 'structured') {
    return message.value;
  }
  return parseJson ? parseJsonOrText(message.value) : message.value;
}
