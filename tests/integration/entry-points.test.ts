/**
 * @fileoverview High-level integration tests for the library's public entry points.
 *
 * These tests validate that the pure and pre-configured entry points behave as
 * designed: the pure driver only uses what it is given, and the main entry point
 * logs through Loglevel.
 */
import { afterEach, describe, expect, test, vi } from 'vitest';

import type { HelperContext } from '../../src/pure';

// --- Mocks for External Libraries ---
// These mocks are hoisted to the top and run before any imports.
const { mockLoglevelInfo } = vi.hoisted(() => ({ mockLoglevelInfo: vi.fn() }));
vi.mock('loglevel', () => ({
  default: {
    info: mockLoglevelInfo,
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    getLevel: () => 3,
    levels: { DEBUG: 1 },
  },
}));

describe('Library Entry Point Integration Tests', () => {
  afterEach(() => {
    vi.clearAllMocks();
  });

  /**
   * Validates the contract of the `pure.ts` entry point.
   */
  test('Verifies the "pure" entry point is decoupled and uses the provided logger', async () => {
    // ARRANGE: Dynamically import the pure entry *inside the test*.
    // This ensures the module is loaded AFTER vi.mock has run.
    const { createLifecyclePure, declareHelpers, defineHelper } = await import(
      '../../src/pure'
    );
    const mockLogger = {
      error: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      debug: vi.fn(),
      getLevel: () => 3,
      levels: { DEBUG: 1 },
    };
    const greeting = defineHelper({
      kind: 'greeting',
      bind: ({ config }: HelperContext<string>) => ({ text: config }),
    });
    class PureCase {
      declare readonly hello: { text: string };
    }
    declareHelpers(PureCase, { hello: greeting('hi') });
    const driver = createLifecyclePure({ logger: mockLogger });

    // ACT
    const text = driver.run(new PureCase(), (testCase) => testCase.hello.text);

    // ASSERT
    expect(text).toBe('hi');
    expect(mockLogger.info).toHaveBeenCalledWith('[Lifecycle] 1 helper(s) ready.');
    expect(mockLoglevelInfo).not.toHaveBeenCalled();
  });

  /**
   * Validates the contract of the main `index.ts` entry point.
   */
  test('Verifies the main entry point uses the pre-configured Loglevel adapter', async () => {
    // ARRANGE: Dynamically import the main entry point *inside the test*.
    const { begin, declareHelpers, defineHelper, end, stateOf } = await import(
      '../../src/index'
    );
    const empty = defineHelper({ kind: 'empty', bind: () => ({}) });
    class MainCase {
      declare readonly nothing: object;
    }
    declareHelpers(MainCase, { nothing: empty() });
    const testCase = new MainCase();

    // ACT
    begin(testCase);
    end(testCase);

    // ASSERT
    expect(stateOf(testCase)).toBe('done');
    expect(mockLoglevelInfo).toHaveBeenCalledWith('[Lifecycle] 1 helper(s) ready.');
    expect(mockLoglevelInfo).toHaveBeenCalledWith('[Lifecycle] 1 helper(s) torn down.');
  });
});
