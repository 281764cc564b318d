/**
 * JSON log formatting.
 */

export { JsonFormatter, isoTime } from './json-formatter.js';
export type { JsonFormatterOptions } from './json-formatter.js';
export { FieldTemplate, FIELD_PRESETS, interpolate } from './template.js';
export type { FieldPresetName } from './template.js';
export { classifyMessage, renderMessage, parseJsonOrText, isPlainObject } from './message.js';
export type { Message } from './message.js';
export { formatException } from './exception.js';
export { serialize, normalize, safeString, defaultJsonSerializer, defineField } from './serializer.js';
export type { JsonDefault } from './serializer.js';
