/**
 * Shared type definitions for the Lambda logging package.
 *
 * @module types
 */

/**
 * A template field value.
 *
 * Strings are templates: `{attribute}` tokens naming a record attribute are
 * substituted at format time. Other values are emitted as literals.
 */
export type FieldValue = string | number | boolean | null | undefined;

/**
 * Output field name to field value.
 */
export type FieldMap = Record<string, FieldValue>;

/**
 * Source location of a logging call.
 */
export interface CallSite {
  /** Full path (or URL) of the calling file */
  pathname: string;
  /** Base name of the calling file */
  filename: string;
  /** File name without its extension */
  module: string;
  /** Calling function, `<anonymous>` for unnamed functions */
  funcName: string;
  /** Line number, 0 when unknown */
  lineno: number;
}

/**
 * Attributes of a record that templates can reference.
 */
export type RecordAttributes = Readonly<Record<string, string | number>>;
