/**
 * AWS Lambda JSON Logging
 *
 * Single-line JSON log entries with request metadata for AWS Lambda
 * functions.
 *
 * ## Features
 *
 * - **JSON Formatter**: timestamp, level, source location and message on one line
 * - **Structured Messages**: objects and JSON strings are embedded as structured `message` values
 * - **Request Metadata**: request id, function name, version and ARN on every entry
 * - **Exception Text**: stacks and cause chains of attached errors
 * - **Never Throws**: invalid levels and unserializable values degrade, they do not fail the invocation
 *
 * ## Quick Start
 *
 * ```typescript
 * import { getLogger, wrap, addField } from 'aws-lambda-json-logging';
 *
 * const log = getLogger('orders');
 *
 * export const handler = wrap(async (event: { orderId: string }) => {
 *   addField({ order_id: event.orderId });
 *   log.info('order received');
 *   log.info({ step: 'validate', ok: true });
 *   return { statusCode: 202 };
 * });
 * ```
 *
 * Each call writes a line such as:
 *
 * ```json
 * {"timestamp":"2024-03-01T10:00:00.000Z","level":"INFO","location":"orders.<anonymous>:7","aws_request_id":"...","order_id":"o-1","message":"order received"}
 * ```
 *
 * @module aws-lambda-json-logging
 */

// ============================================================================
// Levels
// ============================================================================

export { LogLevel, parseLevel, levelName, isValidLevel } from './levels/index.js';
export type { LevelName, LevelInput } from './levels/index.js';

// ============================================================================
// Errors
// ============================================================================

export { LambdaLoggingError, InvalidLevelError, isLambdaLoggingError } from './errors/index.js';
export type { LambdaLoggingErrorCode } from './errors/index.js';

// ============================================================================
// Types
// ============================================================================

export type { FieldValue, FieldMap, CallSite, RecordAttributes } from './types/index.js';

// ============================================================================
// Logging facility
// ============================================================================

export {
  LogRecord,
  Handler,
  StreamHandler,
  MemoryHandler,
  formatPlain,
  Logger,
  LoggerRegistry,
  defaultRegistry,
  getLogger,
  captureCallSite,
  parseStackFrame,
} from './logging/index.js';

export type {
  LogRecordInit,
  Formatter,
  TextSink,
  HandlerOptions,
  LoggerOptions,
  LoggerRegistryOptions,
} from './logging/index.js';

// ============================================================================
// Formatter
// ============================================================================

export {
  JsonFormatter,
  isoTime,
  FieldTemplate,
  FIELD_PRESETS,
  formatException,
  serialize,
  safeString,
  defaultJsonSerializer,
} from './formatter/index.js';

export type { JsonFormatterOptions, FieldPresetName, JsonDefault, Message } from './formatter/index.js';

// ============================================================================
// Setup, configuration and middleware
// ============================================================================

export { setup, addField, jsonFormatterFactory, DEFAULT_AUXILIARY_LOGGERS } from './setup/index.js';
export type { SetupOptions, FormatterFactory } from './setup/index.js';

export { configFromEnvironment, DEFAULT_LEVEL, DEFAULT_AUXILIARY_LEVEL } from './config/index.js';
export type { LoggingEnvironment } from './config/index.js';

export { wrap, extractRequestId } from './lambda/index.js';
export type { LambdaContext, WrapOptions } from './lambda/index.js';
