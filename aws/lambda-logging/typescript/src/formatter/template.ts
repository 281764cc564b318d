/**
 * Field templates.
 *
 * A template maps output field names to values. String values may reference
 * record attributes as `{attribute}`; tokens that name no attribute are left
 * as written, so literal values containing braces survive untouched.
 */

import type { FieldMap, FieldValue, RecordAttributes } from '../types/index.js';
import { defineField } from './serializer.js';

/**
 * Built-in field presets.
 *
 * `location` folds the source position into one field; `classic` splits it
 * into file, function and line.
 */
export const FIELD_PRESETS = {
  location: {
    timestamp: '{timestamp}',
    level: '{level}',
    location: '{name}.{funcName}:{lineno}',
  },
  classic: {
    timestamp: '{timestamp}',
    level: '{level}',
    filename: '{filename}',
    funcName: '{funcName}',
    line: '{lineno}',
  },
} as const satisfies Record<string, FieldMap>;

export type FieldPresetName = keyof typeof FIELD_PRESETS;

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Substitute `{attribute}` tokens.
 */
export function interpolate(template: string, attributes: RecordAttributes): string {
  return template.replace(PLACEHOLDER, (token: string, key: string) =>
    Object.hasOwn(attributes, key) ? String(attributes[key]) : token
  );
}

export class FieldTemplate {
  private readonly entries = new Map<string, FieldValue>();

  constructor(fields: FieldMap = {}) {
    this.merge(fields);
  }

  /**
   * Start from a preset, then apply overrides.
   */
  static fromPreset(preset: FieldPresetName, overrides: FieldMap = {}): FieldTemplate {
    const template = new FieldTemplate(FIELD_PRESETS[preset]);
    template.merge(overrides);
    return template;
  }

  /**
   * Add or replace fields. Replaced fields keep their position.
   */
  merge(fields: FieldMap): void {
    for (const [key, value] of Object.entries(fields)) {
      this.entries.set(key, value);
    }
  }

  snapshot(): FieldMap {
    return Object.fromEntries(this.entries);
  }

  /**
   * Resolve every field against a record's attributes, omitting falsy results.
   */
  resolve(attributes: RecordAttributes): Record<string, unknown> {
    const resolved: Record<string, unknown> = {};
    for (const [key, value] of this.entries) {
      const result = typeof value === 'string' ? interpolate(value, attributes) : value;
      if (result) {
        defineField(resolved, key, result);
      }
    }
    return resolved;
  }
}
