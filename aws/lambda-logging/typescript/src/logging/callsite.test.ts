/**
 * Tests for call-site capture
 */

import { describe, it, expect } from 'vitest';
import { UNKNOWN_CALL_SITE, captureCallSite, parseStackFrame } from './callsite.js';

describe('parseStackFrame', () => {
  it('should parse a named frame', () => {
    expect(parseStackFrame('    at handler (/var/task/index.js:12:5)')).toEqual({
      pathname: '/var/task/index.js',
      filename: 'index.js',
      module: 'index',
      funcName: 'handler',
      lineno: 12,
    });
  });

  it('should parse an anonymous frame', () => {
    expect(parseStackFrame('    at /var/task/index.js:3:1')).toEqual({
      pathname: '/var/task/index.js',
      filename: 'index.js',
      module: 'index',
      funcName: '<anonymous>',
      lineno: 3,
    });
  });

  it('should strip async markers and convert file URLs', () => {
    const site = parseStackFrame('    at async Runtime.handleOnce (file:///var/runtime/index.mjs:1085:29)');

    expect(site?.funcName).toBe('Runtime.handleOnce');
    expect(site?.pathname).toBe('/var/runtime/index.mjs');
    expect(site?.module).toBe('index');
    expect(site?.lineno).toBe(1085);
  });

  it('should treat module-level frames as anonymous', () => {
    expect(parseStackFrame('    at Object.<anonymous> (/app/main.ts:4:7)')?.funcName).toBe('<anonymous>');
  });

  it('should keep only the last extension out of the module name', () => {
    expect(parseStackFrame('    at run (/app/orders.test.ts:9:2)')?.module).toBe('orders.test');
  });

  it('should return undefined for lines that are not frames', () => {
    expect(parseStackFrame('Error: boom')).toBeUndefined();
    expect(parseStackFrame('')).toBeUndefined();
  });
});

describe('captureCallSite', () => {
  function probe() {
    return captureCallSite(probe);
  }

  function namedCaller() {
    return probe();
  }

  it('should report the caller of the boundary function', () => {
    const site = namedCaller();

    expect(site.funcName).toBe('namedCaller');
    expect(site.filename).toBe('callsite.test.ts');
    expect(site.module).toBe('callsite.test');
    expect(site.lineno).toBeGreaterThan(0);
  });

  it('should expose a fixed unknown call site', () => {
    expect(UNKNOWN_CALL_SITE).toEqual({
      pathname: '(unknown file)',
      filename: '(unknown file)',
      module: '(unknown module)',
      funcName: '(unknown function)',
      lineno: 0,
    });
  });
});
