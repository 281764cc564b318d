/**
 * Call-site capture from V8 stack frames.
 */

import { basename, extname } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { CallSite } from '../types/index.js';

/**
 * Call site reported when no frame can be parsed.
 */
export const UNKNOWN_CALL_SITE: Readonly<CallSite> = Object.freeze({
  pathname: '(unknown file)',
  filename: '(unknown file)',
  module: '(unknown module)',
  funcName: '(unknown function)',
  lineno: 0,
});

// "    at fn (/path/file.js:12:5)" or "    at /path/file.js:12:5"
const FRAME_PATTERN = /^\s*at\s+(?:(.*?)\s+\()?(.+?):(\d+):(\d+)\)?\s*$/;

/**
 * Parse one line of a V8 stack trace.
 *
 * @returns the call site, or undefined when the line is not a frame
 */
export function parseStackFrame(line: string): CallSite | undefined {
  const match = FRAME_PATTERN.exec(line);
  if (!match) {
    return undefined;
  }

  const pathname = toPath(match[2]);
  const filename = basename(pathname);

  return {
    pathname,
    filename,
    module: filename.slice(0, filename.length - extname(filename).length),
    funcName: functionName(match[1]),
    lineno: Number.parseInt(match[3], 10),
  };
}

/**
 * Capture the call site of the caller of `boundary`.
 *
 * Frames of `boundary` and everything it called are dropped, so the first
 * remaining frame is the code that invoked it.
 */
export function captureCallSite(boundary: Function): CallSite {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, boundary);

  const lines = holder.stack?.split('\n') ?? [];
  for (const line of lines.slice(1)) {
    const site = parseStackFrame(line);
    if (site) {
      return site;
    }
  }
  return { ...UNKNOWN_CALL_SITE };
}

function functionName(raw: string | undefined): string {
  if (!raw) {
    return '<anonymous>';
  }
  const name = raw.replace(/^async\s+/, '');
  return name === 'Object.<anonymous>' ? '<anonymous>' : name;
}

function toPath(location: string): string {
  if (!location.startsWith('file://')) {
    return location;
  }
  try {
    return fileURLToPath(location);
  } catch {
    return location;
  }
}
