import { describe, expect, it } from 'vitest';
import type { StepObservation } from '../src/types';
import { createHarness } from './support';

const NOW = '2026-03-10T12:00:00.000Z';
const week = { start: '2026-03-04', end: '2026-03-10' };

function hourAt(day: string, hour: number, steps: number, provider = 'health_store'): StepObservation {
  const startMs = Date.parse(`${day}T${String(hour).padStart(2, '0')}:00:00.000Z`);
  return { provider, startMs, endMs: startMs + 60 * 60 * 1000, steps };
}

describe('reconciliation', () => {
  it('backfills closed days from the provider', async () => {
    const harness = createHarness(NOW);
    harness.provider.add(hourAt('2026-03-08', 9, 11_000), hourAt('2026-03-09', 9, 4000));

    const report = await harness.reconciliation.reconcile(week);
    expect(report).toEqual({
      window: week,
      changedDates: ['2026-03-08', '2026-03-09'],
      failedDates: [],
      cancelled: false
    });
    expect(harness.provider.rangeCalls).toBe(1);
    expect(await harness.steps.loadDailyLog('2026-03-08')).toMatchObject({
      steps: 11_000,
      goalMet: true,
      state: 'finalized'
    });
    expect(await harness.steps.loadDailyLog('2026-03-07')).toBeUndefined();
    const streak = await harness.streaks.getStreak();
    expect(streak.currentStreak).toBe(0);
    expect(streak.longestStreak).toBe(1);
  });

  it('never lowers a closed day when upstream reports less', async () => {
    const harness = createHarness(NOW);
    harness.provider.add(hourAt('2026-03-08', 9, 11_000));
    await harness.reconciliation.reconcile(week);

    harness.provider.replace([hourAt('2026-03-08', 9, 6000)]);
    const report = await harness.reconciliation.reconcile(week);
    expect(report.changedDates).toEqual([]);
    expect((await harness.steps.loadDailyLog('2026-03-08'))?.steps).toBe(11_000);
  });

  it('applies upward corrections to closed days', async () => {
    const harness = createHarness(NOW);
    harness.provider.add(hourAt('2026-03-09', 9, 4000));
    await harness.reconciliation.reconcile(week);

    harness.provider.add(hourAt('2026-03-09', 10, 7000));
    const report = await harness.reconciliation.reconcile(week);
    expect(report.changedDates).toEqual(['2026-03-09']);
    expect(await harness.steps.loadDailyLog('2026-03-09')).toMatchObject({ steps: 11_000, goalMet: true });
  });

  it('falls back to single days and skips the ones that fail', async () => {
    const harness = createHarness(NOW);
    harness.provider.add(hourAt('2026-03-08', 9, 11_000), hourAt('2026-03-09', 9, 12_000)).failDay('2026-03-09');

    const report = await harness.reconciliation.reconcile(week);
    expect(report.failedDates).toEqual(['2026-03-09']);
    expect(report.changedDates).toEqual(['2026-03-08']);
    expect(harness.provider.rangeCalls).toBe(1);
    expect(harness.provider.dayCalls).toBe(7);
    expect(await harness.steps.loadDailyLog('2026-03-09')).toBeUndefined();
  });

  it('stops between days when cancelled and keeps committed days', async () => {
    const harness = createHarness(NOW);
    harness.provider.add(hourAt('2026-03-05', 9, 11_000), hourAt('2026-03-06', 9, 11_000));
    const controller = new AbortController();
    harness.ctx.events.on('dailyLogChanged', () => controller.abort());

    const report = await harness.reconciliation.reconcile(week, controller.signal);
    expect(report.cancelled).toBe(true);
    expect(report.changedDates).toEqual(['2026-03-05']);
    expect(await harness.steps.loadDailyLog('2026-03-06')).toBeUndefined();
  });

  it('sizes the default window by tier', async () => {
    const harness = createHarness(NOW);
    expect(await harness.reconciliation.defaultWindow()).toEqual({ start: '2026-02-09', end: '2026-03-10' });

    await harness.entitlements.setEntitlement({ tier: 'pro' });
    expect(await harness.reconciliation.defaultWindow()).toEqual({ start: '2025-03-11', end: '2026-03-10' });
  });

  it('throttles scheduled and foreground runs', async () => {
    const harness = createHarness(NOW);

    expect((await harness.reconciliation.runIfDue('scheduled')).ran).toBe(true);
    expect(await harness.reconciliation.runIfDue('scheduled')).toEqual({
      ran: false,
      trigger: 'scheduled',
      nextDueAt: '2026-03-10T16:00:00.000Z'
    });
    expect((await harness.reconciliation.runIfDue('foreground')).ran).toBe(false);
    expect((await harness.reconciliation.runIfDue('manual')).ran).toBe(true);

    harness.clock.advance(16 * 60 * 1000);
    expect((await harness.reconciliation.runIfDue('foreground')).ran).toBe(true);
  });

  it('shares one run between concurrent callers', async () => {
    const harness = createHarness(NOW);
    const [first, second] = await Promise.all([
      harness.reconciliation.runIfDue('manual'),
      harness.reconciliation.runIfDue('foreground')
    ]);
    expect(second.report).toBe(first.report);
    expect(harness.provider.rangeCalls).toBe(5);
  });

  it('protects missed days after a run when enabled', async () => {
    const harness = createHarness(NOW, { autoProtectMissedDays: true });
    harness.provider.add(hourAt('2026-03-07', 9, 10_000), hourAt('2026-03-08', 9, 10_000));

    await harness.reconciliation.reconcile(week);
    const day9 = await harness.steps.loadDailyLog('2026-03-09');
    expect(day9?.shieldUsed).toBe(true);
    expect((await harness.streaks.getStreak()).currentStreak).toBe(3);
  });
});
