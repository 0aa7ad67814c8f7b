/**
 * @fileoverview Tests for the scoped property override and its guaranteed restore.
 */
import { createLifecycleDriver } from '@core/lifecycle-driver';
import { OutOfLifecycle, SetupFailed } from '@core/lifecycle-errors';
import { declareHelpers } from '@core/lifecycle-registry';
import {
  propertyOverride,
  type PropertyOverride,
} from '@helpers/property-override';
import { describe, expect, test } from 'vitest';

import { mockLogger } from '@test-helper/test-helpers';

describe('propertyOverride', () => {
  const driver = createLifecycleDriver({ logger: mockLogger });

  class OverrideCase {
    declare readonly clock: PropertyOverride;
  }

  test('Verifies an own property is replaced for the test and restored afterwards', () => {
    const settings = { region: 'eu-west' };
    class RegionCase extends OverrideCase {}
    declareHelpers(RegionCase, {
      clock: propertyOverride({ target: settings, key: 'region', value: 'us-east' }),
    });
    const testCase = new RegionCase();

    driver.begin(testCase);
    expect(settings.region).toBe('us-east');
    expect(testCase.clock.current()).toBe('us-east');
    expect(testCase.clock.installed).toBe(true);
    expect(testCase.clock.original).toEqual({
      value: 'eu-west',
      writable: true,
      enumerable: true,
      configurable: true,
    });

    driver.end(testCase);
    expect(settings.region).toBe('eu-west');
    expect(Object.keys(settings)).toEqual(['region']);
  });

  test('Verifies a property that did not exist is removed again', () => {
    const target: Record<string, unknown> = {};
    class AbsentCase extends OverrideCase {}
    declareHelpers(AbsentCase, {
      clock: propertyOverride({ target, key: 'now', value: 1_700_000_000_000 }),
    });
    const testCase = new AbsentCase();

    driver.begin(testCase);
    expect(target.now).toBe(1_700_000_000_000);
    expect(testCase.clock.original).toBeUndefined();

    driver.end(testCase);
    expect('now' in target).toBe(false);
  });

  test('Verifies an inherited method shows through again after the override', () => {
    class Mailer {
      send(): string {
        return 'smtp';
      }
    }
    const mailer = new Mailer();
    class InheritedCase extends OverrideCase {}
    declareHelpers(InheritedCase, {
      clock: propertyOverride({ target: mailer, key: 'send', value: () => 'captured' }),
    });
    const testCase = new InheritedCase();

    driver.begin(testCase);
    expect(mailer.send()).toBe('captured');

    driver.end(testCase);
    expect(mailer.send()).toBe('smtp');
    expect(Object.prototype.hasOwnProperty.call(mailer, 'send')).toBe(false);
  });

  test('Verifies nested overrides of one property unwind in reverse order', () => {
    const config = { level: 'info' };
    class NestedCase {
      declare readonly outer: PropertyOverride;
      declare readonly inner: PropertyOverride;
    }
    declareHelpers(NestedCase, {
      outer: propertyOverride({ target: config, key: 'level', value: 'debug' }),
      inner: propertyOverride({ target: config, key: 'level', value: 'trace' }),
    });
    const testCase = new NestedCase();

    driver.begin(testCase);
    expect(config.level).toBe('trace');
    expect(testCase.inner.original?.value).toBe('debug');

    driver.end(testCase);
    expect(config.level).toBe('info');
  });

  test('Verifies a non-configurable property fails setup without changing it', () => {
    const frozen = Object.freeze({ mode: 'production' });
    class FrozenCase extends OverrideCase {}
    declareHelpers(FrozenCase, {
      clock: propertyOverride({ target: frozen, key: 'mode', value: 'test' }),
    });

    expect(() => driver.begin(new FrozenCase())).toThrow(SetupFailed);
    expect(frozen.mode).toBe('production');
  });

  test('Verifies no part of the override can be read once torn down', () => {
    const settings = { region: 'eu-west' };
    class LateCase extends OverrideCase {}
    declareHelpers(LateCase, {
      clock: propertyOverride({ target: settings, key: 'region', value: 'us-east' }),
    });
    const testCase = new LateCase();

    driver.begin(testCase);
    const retained = testCase.clock;
    driver.end(testCase);

    expect(() => retained.current()).toThrow(OutOfLifecycle);
    expect(() => retained.installed).toThrow(OutOfLifecycle);
    expect(() => retained.original).toThrow(OutOfLifecycle);
    expect(() => retained.target).toThrow(OutOfLifecycle);
    expect(() => retained.key).toThrow(OutOfLifecycle);
    expect(() => retained.replacement).toThrow(
      'Helper "clock" was accessed outside its lifecycle: it has already been torn down.',
    );
    expect(settings.region).toBe('eu-west');
  });
});
