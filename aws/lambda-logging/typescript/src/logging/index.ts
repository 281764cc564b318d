/**
 * Logging facility: records, handlers, loggers and the registry.
 */

export { LogRecord } from './record.js';
export type { LogRecordInit } from './record.js';
export { captureCallSite, parseStackFrame, UNKNOWN_CALL_SITE } from './callsite.js';
export { Handler, StreamHandler, MemoryHandler, formatPlain } from './handler.js';
export type { Formatter, TextSink, HandlerOptions } from './handler.js';
export { Logger } from './logger.js';
export type { LoggerOptions } from './logger.js';
export { LoggerRegistry, defaultRegistry, getLogger } from './registry.js';
export type { LoggerRegistryOptions } from './registry.js';
