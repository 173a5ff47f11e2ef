import { describe, expect, it } from 'vitest';
import { DEFAULT_PROVIDER_PRECEDENCE, loadConfig } from '../src/config';

describe('config', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      storage: 'postgres',
      databaseUrl: undefined,
      port: 3000,
      timeZone: 'UTC',
      defaultDailyGoal: 10_000,
      reconcileIntervalMs: 240 * 60_000,
      reconcileForegroundIntervalMs: 15 * 60_000,
      consumptionOrder: 'purchased-first',
      providerPrecedence: DEFAULT_PROVIDER_PRECEDENCE,
      autoProtectMissedDays: false
    });
  });

  it('parses overrides', () => {
    const config = loadConfig({
      STORAGE_DRIVER: 'memory',
      TIME_ZONE: 'Europe/Berlin',
      DEFAULT_DAILY_GOAL: '8000',
      RECONCILE_FOREGROUND_MINUTES: '5',
      SHIELD_CONSUMPTION_ORDER: 'recurring-first',
      PROVIDER_PRECEDENCE: ' motion_sensor , health_store ,',
      AUTO_PROTECT_MISSED_DAYS: '1'
    });
    expect(config.storage).toBe('memory');
    expect(config.timeZone).toBe('Europe/Berlin');
    expect(config.defaultDailyGoal).toBe(8000);
    expect(config.reconcileForegroundIntervalMs).toBe(300_000);
    expect(config.consumptionOrder).toBe('recurring-first');
    expect(config.providerPrecedence).toEqual(['motion_sensor', 'health_store']);
    expect(config.autoProtectMissedDays).toBe(true);
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ TIME_ZONE: 'Mars/Base' })).toThrow();
    expect(() => loadConfig({ PORT: 'abc' })).toThrow();
    expect(() => loadConfig({ DEFAULT_DAILY_GOAL: '0' })).toThrow();
  });
});
