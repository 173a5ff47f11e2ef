import { describe, expect, it } from 'vitest';
import { emptyStreakState } from '../src/engine/streak';
import { mergeDailyLog, mergeShieldInventory, mergeStreakState } from '../src/engine/syncMerge';
import { dailyLog, shieldInventory } from './support';

describe('cross-device merge', () => {
  it('takes a remote day that is missing locally', () => {
    const remote = dailyLog('2026-03-08', 8000);
    const { merged, changed } = mergeDailyLog(undefined, remote);
    expect(changed).toBe(true);
    expect(merged).toEqual(remote);
  });

  it('keeps max steps, ORs flags and unions sessions', () => {
    const local = dailyLog('2026-03-08', 5000, { contributingSessionIds: ['a'], goalTarget: 6000, goalMet: false });
    const remote = dailyLog('2026-03-08', 7000, {
      contributingSessionIds: ['b', 'a'],
      goalTarget: 9000,
      goalMet: true
    });
    const { merged, changed } = mergeDailyLog(local, remote);
    expect(changed).toBe(true);
    expect(merged.steps).toBe(7000);
    expect(merged.goalMet).toBe(true);
    expect(merged.goalTarget).toBe(6000);
    expect(merged.contributingSessionIds).toEqual(['a', 'b']);
  });

  it('reports no change when only the timestamp differs', () => {
    const local = dailyLog('2026-03-08', 5000);
    const remote = { ...local, updatedAt: '2026-03-09T00:00:00.000Z' };
    const outcome = mergeDailyLog(local, remote);
    expect(outcome.changed).toBe(false);
    expect(outcome.merged).toBe(local);
  });

  it('lets the newer run win while longest only grows', () => {
    const local = {
      ...emptyStreakState(),
      currentStreak: 3,
      longestStreak: 10,
      streakStartDate: '2026-03-06',
      lastGoalMetDate: '2026-03-08',
      breakBoundary: '2026-03-01',
      legacyBadges: [{ streakLength: 30, achievedStreak: 31, earnedAt: '2026-01-01T00:00:00.000Z' }]
    };
    const remote = {
      ...emptyStreakState(),
      currentStreak: 5,
      longestStreak: 6,
      streakStartDate: '2026-03-05',
      lastGoalMetDate: '2026-03-09',
      breakBoundary: '2026-02-20',
      legacyBadges: [
        { streakLength: 30, achievedStreak: 33, earnedAt: '2026-02-01T00:00:00.000Z' },
        { streakLength: 60, achievedStreak: 61, earnedAt: '2026-02-02T00:00:00.000Z' }
      ]
    };
    const { merged, changed } = mergeStreakState(local, remote);
    expect(changed).toBe(true);
    expect(merged.currentStreak).toBe(5);
    expect(merged.streakStartDate).toBe('2026-03-05');
    expect(merged.longestStreak).toBe(10);
    expect(merged.breakBoundary).toBe('2026-03-01');
    expect(merged.legacyBadges.map((badge) => [badge.streakLength, badge.achievedStreak])).toEqual([
      [30, 31],
      [60, 61]
    ]);
  });

  it('does not multiply shields within one grant period', () => {
    const local = shieldInventory({
      recurringAvailable: 2,
      purchasedAvailable: 2,
      lastRecurringRefillPeriod: '2026-03',
      totalUsedLifetime: 1,
      purchasedLifetime: 3,
      purchasedConsumedLifetime: 1
    });
    const remote = shieldInventory({
      recurringAvailable: 1,
      purchasedAvailable: 0,
      lastRecurringRefillPeriod: '2026-03',
      usedThisPeriod: 1,
      totalUsedLifetime: 2,
      purchasedLifetime: 2,
      purchasedConsumedLifetime: 2
    });
    const { merged } = mergeShieldInventory(local, remote);
    expect(merged).toEqual({
      recurringAvailable: 1,
      purchasedAvailable: 1,
      lastRecurringRefillPeriod: '2026-03',
      usedThisPeriod: 1,
      totalUsedLifetime: 2,
      purchasedLifetime: 3,
      purchasedConsumedLifetime: 2
    });
  });

  it('takes the recurring bucket from the newer grant period', () => {
    const local = shieldInventory({ recurringAvailable: 0, usedThisPeriod: 2, totalUsedLifetime: 2, lastRecurringRefillPeriod: '2026-03' });
    const remote = shieldInventory({ recurringAvailable: 2, totalUsedLifetime: 2, lastRecurringRefillPeriod: '2026-04' });
    const { merged } = mergeShieldInventory(local, remote);
    expect(merged.recurringAvailable).toBe(2);
    expect(merged.usedThisPeriod).toBe(0);
    expect(merged.lastRecurringRefillPeriod).toBe('2026-04');
  });
});
