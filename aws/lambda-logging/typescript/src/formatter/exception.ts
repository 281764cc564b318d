/**
 * Exception text for records with an attached error.
 */

import { safeString } from './serializer.js';

function describeError(error: Error): string {
  return error.stack ?? `${error.name}: ${error.message}`;
}

/**
 * Render an error and its `cause` chain. Values thrown that are not Error
 * instances are rendered as strings.
 */
export function formatException(error: unknown): string {
  if (!(error instanceof Error)) {
    return safeString(error);
  }

  const parts = [describeError(error)];
  const seen = new Set<unknown>([error]);
  let cause: unknown = error.cause;

  while (cause !== undefined && !seen.has(cause)) {
    seen.add(cause);
    if (cause instanceof Error) {
      parts.push(`Caused by: ${describeError(cause)}`);
      cause = cause.cause;
    } else {
      parts.push(`Caused by: ${safeString(cause)}`);
      cause = undefined;
    }
  }

  return parts.join('\n');
}
