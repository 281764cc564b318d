/**
 * Tests for loggers, handlers and the registry
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { InvalidLevelError } from '../errors/index.js';
import { LogLevel } from '../levels/index.js';
import { Handler, MemoryHandler, StreamHandler } from './handler.js';
import { LogRecord } from './record.js';
import { LoggerRegistry } from './registry.js';

class FailingHandler extends Handler {
  protected emit(): void {
    throw new Error('sink unavailable');
  }
}

describe('Logger', () => {
  let memory: MemoryHandler;
  let registry: LoggerRegistry;

  beforeEach(() => {
    memory = new MemoryHandler();
    registry = new LoggerRegistry({ handlers: [memory] });
  });

  describe('level filtering', () => {
    it('should inherit WARNING from the root logger by default', () => {
      const logger = registry.getLogger('app');
      logger.info('dropped');
      logger.warning('kept');

      expect(memory.getLines()).toEqual(['WARNING:app:kept']);
    });

    it('should use the nearest level set on an ancestor', () => {
      registry.getLogger('app').setLevel('DEBUG');
      registry.getLogger('app.db').debug('query');

      expect(memory.getLines()).toEqual(['DEBUG:app.db:query']);
      expect(registry.getLogger('app.db').getEffectiveLevel()).toBe(LogLevel.Debug);
    });

    it('should reject invalid levels on setLevel', () => {
      expect(() => registry.getLogger('app').setLevel('loud')).toThrow(InvalidLevelError);
    });

    it('should apply handler levels after logger levels', () => {
      const errorsOnly = new MemoryHandler({ level: 'ERROR' });
      const logger = registry.getLogger('app');
      logger.addHandler(errorsOnly);

      logger.warning('warn');
      logger.error('fail');

      expect(errorsOnly.getLines()).toEqual(['ERROR:app:fail']);
      expect(memory.getLines()).toEqual(['WARNING:app:warn', 'ERROR:app:fail']);
    });
  });

  describe('messages', () => {
    it('should substitute printf-style arguments', () => {
      registry.getLogger('app').error('value %s=%d', 'a', 3);

      expect(memory.getLines()).toEqual(['ERROR:app:value a=3']);
    });

    it('should log at every named level', () => {
      registry.root.setLevel('DEBUG');
      const logger = registry.getLogger('app');
      logger.debug('d');
      logger.info('i');
      logger.warn('w');
      logger.error('e');
      logger.critical('c');
      logger.log(35, 'custom');

      expect(memory.getLines()).toEqual([
        'DEBUG:app:d',
        'INFO:app:i',
        'WARNING:app:w',
        'ERROR:app:e',
        'CRITICAL:app:c',
        'Level 35:app:custom',
      ]);
    });

    it('should attach errors logged through exception()', () => {
      const error = new Error('boom');
      registry.getLogger('app').exception('failed', error);

      const [record] = memory.getRecords();
      expect(record.levelNo).toBe(LogLevel.Error);
      expect(record.error).toBe(error);
      expect(record.hasError).toBe(true);
    });

    it('should record the calling function', () => {
      const logger = registry.getLogger('app');
      function emitFromNamed() {
        logger.warning('here');
      }

      emitFromNamed();

      const [record] = memory.getRecords();
      expect(record.funcName).toBe('emitFromNamed');
      expect(record.filename).toBe('logger.test.ts');
      expect(record.lineno).toBeGreaterThan(0);
    });
  });

  describe('propagation', () => {
    it('should stop at a logger with propagate disabled', () => {
      const local = new MemoryHandler();
      const logger = registry.getLogger('quiet');
      logger.addHandler(local);
      logger.propagate = false;

      logger.error('only local');

      expect(local.getLines()).toEqual(['ERROR:quiet:only local']);
      expect(memory.getLines()).toEqual([]);
    });

    it('should add a handler once and remove it', () => {
      const local = new MemoryHandler();
      const logger = registry.getLogger('app');
      logger.addHandler(local);
      logger.addHandler(local);
      expect(logger.handlers).toHaveLength(1);

      logger.removeHandler(local);
      expect(logger.handlers).toHaveLength(0);
    });
  });

  describe('failures', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should report emit failures on stderr without throwing', () => {
      const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      const logger = registry.getLogger('app');
      logger.addHandler(new FailingHandler());

      expect(() => logger.error('still fine')).not.toThrow();
      expect(stderr).toHaveBeenCalledTimes(1);
      expect(String(stderr.mock.calls[0][0])).toMatch(/^--- Logging error ---\nError: sink unavailable/);
      expect(memory.getLines()).toEqual(['ERROR:app:still fine']);
    });

    it('should fall back to stderr when no handler is reachable', () => {
      const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      const bare = new LoggerRegistry();
      bare.getLogger('orphan').warning('lost');

      expect(stderr).toHaveBeenCalledWith('WARNING:orphan:lost\n');
    });
  });
});

describe('StreamHandler', () => {
  it('should write one line per record', () => {
    const chunks: string[] = [];
    const handler = new StreamHandler({ write: (chunk: string) => chunks.push(chunk) });

    handler.handle(new LogRecord({ name: 'app', level: LogLevel.Info, message: 'hi' }));

    expect(chunks).toEqual(['INFO:app:hi\n']);
  });

  it('should use the installed formatter', () => {
    const chunks: string[] = [];
    const handler = new StreamHandler({ write: (chunk: string) => chunks.push(chunk) });
    handler.setFormatter({ format: (record) => `<${record.getMessage()}>` });

    handler.handle(new LogRecord({ name: 'app', level: LogLevel.Info, message: 'hi' }));

    expect(chunks).toEqual(['<hi>\n']);
  });
});

describe('LoggerRegistry', () => {
  it('should return the same logger for the same name', () => {
    const registry = new LoggerRegistry();

    expect(registry.getLogger('app')).toBe(registry.getLogger('app'));
    expect(registry.getLogger()).toBe(registry.root);
    expect(registry.getLogger('root')).toBe(registry.root);
  });

  it('should resolve parents to the nearest existing ancestor', () => {
    const registry = new LoggerRegistry();
    const child = registry.getLogger('a.b.c');

    expect(child.parent).toBe(registry.root);

    const a = registry.getLogger('a');
    expect(child.parent).toBe(a);

    const ab = registry.getLogger('a.b');
    expect(child.parent).toBe(ab);
    expect(registry.loggerNames()).toEqual(['a.b.c', 'a', 'a.b']);
  });

  it('should default the root level to WARNING', () => {
    expect(new LoggerRegistry().root.level).toBe(LogLevel.Warning);
    expect(new LoggerRegistry({ rootLevel: LogLevel.Debug }).root.level).toBe(LogLevel.Debug);
  });
});
