import { FixedClock, LocalCalendar } from '../src/calendar';
import { DEFAULT_PROVIDER_PRECEDENCE, type AppConfig } from '../src/config';
import { createLogger } from '../src/logger';
import { ObservationFetchFailure } from '../src/errors';
import { overlaps, type ObservationProvider } from '../src/providers/observationProvider';
import { createServices } from '../src/services';
import { InMemoryStore } from '../src/store';
import type { DailyLog, DayBounds, DayKey, ShieldInventory, StepObservation } from '../src/types';
import { listDays } from '../src/utils';

export const testConfig: AppConfig = {
  storage: 'memory',
  port: 3000,
  timeZone: 'UTC',
  defaultDailyGoal: 10_000,
  reconcileIntervalMs: 240 * 60_000,
  reconcileForegroundIntervalMs: 15 * 60_000,
  consumptionOrder: 'purchased-first',
  providerPrecedence: DEFAULT_PROVIDER_PRECEDENCE,
  autoProtectMissedDays: false
};

export function dailyLog(date: DayKey, steps: number, overrides: Partial<DailyLog> = {}): DailyLog {
  const goalTarget = overrides.goalTarget ?? 10_000;
  return {
    date,
    steps,
    goalTarget,
    goalMet: steps >= goalTarget,
    shieldUsed: false,
    contributingSessionIds: [],
    state: 'finalized',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides
  };
}

export function shieldInventory(overrides: Partial<ShieldInventory> = {}): ShieldInventory {
  return {
    recurringAvailable: 0,
    purchasedAvailable: 0,
    lastRecurringRefillPeriod: null,
    usedThisPeriod: 0,
    totalUsedLifetime: 0,
    purchasedLifetime: 0,
    purchasedConsumedLifetime: 0,
    ...overrides
  };
}

/** Fixed observations with switchable failures and call counters. */
export class InMemoryObservationProvider implements ObservationProvider {
  private observations: StepObservation[] = [];
  private readonly failingDays = new Set<DayKey>();
  private failRanges = false;
  rangeCalls = 0;
  dayCalls = 0;

  constructor(private readonly calendar: LocalCalendar) {}

  add(...observations: StepObservation[]): this {
    this.observations.push(...observations);
    return this;
  }

  replace(observations: StepObservation[]): this {
    this.observations = [...observations];
    return this;
  }

  failDay(day: DayKey): this {
    this.failingDays.add(day);
    return this;
  }

  failRangeFetches(enabled = true): this {
    this.failRanges = enabled;
    return this;
  }

  async fetchDay(day: DayKey, bounds: DayBounds): Promise<StepObservation[]> {
    this.dayCalls += 1;
    if (this.failingDays.has(day)) {
      throw new ObservationFetchFailure([day]);
    }
    return this.observations.filter((observation) => overlaps(observation, bounds));
  }

  async fetchRange(start: DayKey, end: DayKey): Promise<Map<DayKey, StepObservation[]>> {
    this.rangeCalls += 1;
    const days = listDays(start, end);
    const failing = days.filter((day) => this.failingDays.has(day));
    if (this.failRanges || failing.length > 0) {
      throw new ObservationFetchFailure(this.failRanges ? days : failing);
    }
    const result = new Map<DayKey, StepObservation[]>();
    days.forEach((day) => {
      const bounds = this.calendar.bounds(day);
      result.set(
        day,
        this.observations.filter((observation) => overlaps(observation, bounds))
      );
    });
    return result;
  }
}

/** Wires the services against in-process collaborators only. */
export function createHarness(now: string, config: Partial<AppConfig> = {}) {
  const clock = new FixedClock(now);
  const store = new InMemoryStore();
  const merged: AppConfig = { ...testConfig, ...config };
  const calendar = new LocalCalendar(merged.timeZone, clock);
  const provider = new InMemoryObservationProvider(calendar);
  const services = createServices({
    store,
    clock,
    config: merged,
    logger: createLogger({ NODE_ENV: 'test' }),
    provider
  });
  return { clock, store, calendar, provider, ...services };
}
