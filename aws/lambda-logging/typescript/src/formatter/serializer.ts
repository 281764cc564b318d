/**
 * JSON serialization that never throws.
 *
 * Values JSON cannot represent (bigint, symbol, functions, Map, Set, Error,
 * circular references) go through the configured default serializer, whose
 * own failures fall back to a string rendering.
 */

import { inspect } from 'node:util';

/**
 * Converts a value JSON cannot represent into one it can.
 */
export type JsonDefault = (value: unknown) => unknown;

/**
 * String rendering that cannot fail, even for null-prototype objects or
 * throwing `toString` implementations.
 */
export function safeString(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  try {
    return String(value);
  } catch {
    return inspect(value);
  }
}

/**
 * Default serializer: coerce to a string.
 */
export const defaultJsonSerializer: JsonDefault = (value) => safeString(value);

const CIRCULAR = '[Circular]';

/**
 * Serialize a value to a single-line JSON string.
 */
export function serialize(value: unknown, jsonDefault: JsonDefault = defaultJsonSerializer): string {
  return JSON.stringify(normalize(value, jsonDefault, new Set())) ?? 'null';
}

/**
 * Rebuild a value as a tree JSON.stringify accepts without throwing.
 */
export function normalize(value: unknown, jsonDefault: JsonDefault, ancestors: Set<object>): unknown {
  switch (typeof value) {
    case 'string':
    case 'boolean':
    case 'undefined':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : null;
    case 'bigint':
    case 'symbol':
    case 'function':
      return fallback(value, jsonDefault, ancestors);
  }

  if (typeof value !== 'object' || value === null) {
    return null;
  }
  if (ancestors.has(value)) {
    return CIRCULAR;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (value instanceof Error || value instanceof Map || value instanceof Set) {
    return fallback(value, jsonDefault, ancestors);
  }

  ancestors.add(value);
  try {
    return normalizeObject(value, jsonDefault, ancestors);
  } catch {
    return fallback(value, jsonDefault, ancestors);
  } finally {
    ancestors.delete(value);
  }
}

function normalizeObject(value: object, jsonDefault: JsonDefault, ancestors: Set<object>): unknown {
  const toJSON: unknown = Reflect.get(value, 'toJSON');
  if (typeof toJSON === 'function') {
    const replacement: unknown = Reflect.apply(toJSON, value, []);
    return normalize(replacement, jsonDefault, ancestors);
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown) => {
      const normalized = normalize(item, jsonDefault, ancestors);
      return normalized === undefined ? null : normalized;
    });
  }

  const result: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    const normalized = normalize(item, jsonDefault, ancestors);
    if (normalized !== undefined) {
      defineField(result, key, normalized);
    }
  }
  return result;
}

/**
 * Add an own enumerable property. Plain assignment of `__proto__` would
 * replace the prototype instead.
 */
export function defineField(target: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

function fallback(value: unknown, jsonDefault: JsonDefault, ancestors: Set<object>): unknown {
  let replacement: unknown;
  try {
    replacement = jsonDefault(value);
  } catch {
    return safeString(value);
  }
  // A second unrepresentable value from the custom serializer is stringified.
  return normalize(replacement, defaultJsonSerializer, ancestors);
}
