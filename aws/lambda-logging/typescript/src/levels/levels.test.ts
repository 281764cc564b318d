/**
 * Tests for severity levels
 */

import { describe, it, expect } from 'vitest';
import { InvalidLevelError } from '../errors/index.js';
import { LogLevel, isValidLevel, levelName, parseLevel } from './index.js';

describe('parseLevel', () => {
  it('should parse canonical level names', () => {
    expect(parseLevel('DEBUG')).toBe(10);
    expect(parseLevel('INFO')).toBe(20);
    expect(parseLevel('WARNING')).toBe(30);
    expect(parseLevel('ERROR')).toBe(40);
    expect(parseLevel('CRITICAL')).toBe(50);
  });

  it('should accept aliases and ignore case and surrounding whitespace', () => {
    expect(parseLevel('warn')).toBe(LogLevel.Warning);
    expect(parseLevel(' Fatal ')).toBe(LogLevel.Critical);
    expect(parseLevel('notset')).toBe(LogLevel.NotSet);
  });

  it('should accept non-negative integers as custom levels', () => {
    expect(parseLevel(25)).toBe(25);
    expect(parseLevel(0)).toBe(0);
  });

  it('should reject unknown names', () => {
    expect(() => parseLevel('not-a-real-level')).toThrow(InvalidLevelError);
    expect(() => parseLevel('')).toThrow('Invalid log level: ');
  });

  it('should reject negative and fractional numbers', () => {
    expect(() => parseLevel(-1)).toThrow(InvalidLevelError);
    expect(() => parseLevel(1.5)).toThrow(InvalidLevelError);
  });
});

describe('levelName', () => {
  it('should render named levels', () => {
    expect(levelName(LogLevel.Warning)).toBe('WARNING');
    expect(levelName(LogLevel.Critical)).toBe('CRITICAL');
  });

  it('should render unnamed levels by number', () => {
    expect(levelName(25)).toBe('Level 25');
  });
});

describe('isValidLevel', () => {
  it('should report validity without throwing', () => {
    expect(isValidLevel('info')).toBe(true);
    expect(isValidLevel(35)).toBe(true);
    expect(isValidLevel('loud')).toBe(false);
    expect(isValidLevel(-5)).toBe(false);
  });
});
