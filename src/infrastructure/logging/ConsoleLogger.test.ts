/**
 * Unit tests for ConsoleLogger
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { ConsoleLogger } from './ConsoleLogger';

describe('ConsoleLogger', () => {
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;
  let consoleWarnSpy: MockInstance<typeof console.warn>;
  let consoleInfoSpy: MockInstance<typeof console.info>;
  let consoleDebugSpy: MockInstance<typeof console.debug>;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    consoleWarnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    consoleInfoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    consoleDebugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('at debug level', () => {
    let logger: ConsoleLogger;

    beforeEach(() => {
      logger = new ConsoleLogger('debug');
    });

    it('should write every level', () => {
      logger.error('error message');
      logger.warn('warning message');
      logger.info('info message');
      logger.debug('debug message');

      expect(consoleErrorSpy).toHaveBeenCalledWith('error message');
      expect(consoleWarnSpy).toHaveBeenCalledWith('warning message');
      expect(consoleInfoSpy).toHaveBeenCalledWith('info message');
      expect(consoleDebugSpy).toHaveBeenCalledWith('debug message');
    });

    it('should handle multiple arguments', () => {
      logger.debug('message', { key: 'value' }, 123);
      expect(consoleDebugSpy).toHaveBeenCalledWith('message', { key: 'value' }, 123);
    });
  });

  it('should default to info and drop debug messages', () => {
    const logger = new ConsoleLogger();

    logger.debug('debug message');
    logger.info('info message');

    expect(consoleDebugSpy).not.toHaveBeenCalled();
    expect(consoleInfoSpy).toHaveBeenCalledWith('info message');
  });

  it('should only write errors at error level', () => {
    const logger = new ConsoleLogger('error');

    logger.warn('warning message');
    logger.info('info message');
    logger.error('error message');

    expect(consoleWarnSpy).not.toHaveBeenCalled();
    expect(consoleInfoSpy).not.toHaveBeenCalled();
    expect(consoleErrorSpy).toHaveBeenCalledWith('error message');
  });

  it('should always write log messages', () => {
    const logger = new ConsoleLogger('error');

    logger.log('test message');

    expect(consoleLogSpy).toHaveBeenCalledWith('test message');
  });
});
