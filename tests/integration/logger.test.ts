import { describe, it, expect, afterEach, vi } from 'vitest';

import { loglevelAdapter } from '@adapter/loglevel';
import { declareHelpers } from '@core/lifecycle-registry';
import { createRecorder, type Recorder } from '@test-helper/test-helpers';
import { begin, end, setLogger } from '../../src/index';
import { loggerInstance } from '../../src/logger';

// Mock the default adapter to ensure we have a baseline spy
vi.mock('@adapter/loglevel', () => ({
  loglevelAdapter: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    getLevel: vi.fn(() => 3),
    levels: { DEBUG: 1 },
  },
}));

const createCustomLogger = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  getLevel: () => 0,
  levels: { DEBUG: 1 },
});

describe('Logger Architecture', () => {
  // We keep a reference to the mocked default adapter
  const defaultLogger = loglevelAdapter;

  afterEach(() => {
    setLogger(defaultLogger);
  });

  describe('Integration & Switching', () => {
    it('should log the default driver lifecycle through the default adapter', () => {
      class DefaultCase {
        declare readonly a: Recorder;
      }
      declareHelpers(DefaultCase, { a: createRecorder([])({}) });
      const testCase = new DefaultCase();

      begin(testCase);
      end(testCase);

      expect(defaultLogger.info).toHaveBeenCalledWith('[Lifecycle] 1 helper(s) ready.');
      expect(defaultLogger.info).toHaveBeenCalledWith('[Lifecycle] 1 helper(s) torn down.');
      // getLevel() is above DEBUG, so the declaration order is not logged.
      expect(defaultLogger.debug).not.toHaveBeenCalled();
    });

    it('should redirect the default driver to the new logger when setLogger is called', () => {
      const customLogger = createCustomLogger();
      class SwitchedCase {
        declare readonly a: Recorder;
        declare readonly b: Recorder;
      }
      const recorder = createRecorder([]);
      declareHelpers(SwitchedCase, { a: recorder({}), b: recorder({}) });
      const testCase = new SwitchedCase();

      // The driver was created before the switch and still follows it.
      setLogger(customLogger);
      begin(testCase);

      expect(customLogger.debug).toHaveBeenCalledWith(
        '[Lifecycle] Setting up helpers in order: a, b',
      );
      expect(customLogger.info).toHaveBeenCalledWith('[Lifecycle] 2 helper(s) ready.');
      expect(defaultLogger.info).not.toHaveBeenCalled();
      end(testCase);
    });

    it('should report teardown failures of the default driver as warnings', () => {
      const customLogger = createCustomLogger();
      const leak = new Error('a leaked');
      class LeakyCase {
        declare readonly a: Recorder;
      }
      declareHelpers(LeakyCase, { a: createRecorder([])({ failOnTeardown: leak }) });
      const testCase = new LeakyCase();
      setLogger(customLogger);

      begin(testCase);
      expect(() => end(testCase)).toThrow('Teardown failed for 1 helper(s): a');

      expect(customLogger.warn).toHaveBeenCalledWith(
        '[Lifecycle] Teardown of helper "a" failed; continuing with the remaining helpers.',
        leak,
      );
    });
  });

  describe('API & Properties', () => {
    it('should proxy property getters (levels) correctly', () => {
      setLogger({ ...defaultLogger, levels: { DEBUG: 999 } });

      // It should access the property on the CURRENT logger, not the initial one
      expect(loggerInstance.levels.DEBUG).toBe(999);
    });

    it('should proxy methods (getLevel) correctly', () => {
      const mockLogger = {
        ...defaultLogger,
        getLevel: vi.fn().mockReturnValue(5),
      };

      setLogger(mockLogger);

      expect(loggerInstance.getLevel()).toBe(5);
      expect(mockLogger.getLevel).toHaveBeenCalled();
    });
  });
});
