import type { DailyLog, LegacyBadge, ShieldInventory, StreakState } from '../types';

export interface MergeOutcome<T> {
  merged: T;
  changed: boolean;
}

function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') return JSON.stringify(value) ?? 'null';
  if (Array.isArray(value)) return '[' + value.map(stableStringify).join(',') + ']';
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return '{' + entries.map(([k, v]) => JSON.stringify(k) + ':' + stableStringify(v)).join(',') + '}';
}

function sameJson(a: unknown, b: unknown): boolean {
  return stableStringify(a) === stableStringify(b);
}

/**
 * Another device's copy of a day: max steps, OR the flags, union the session
 * references. The local goal target stays frozen.
 */
export function mergeDailyLog(local: DailyLog | undefined, remote: DailyLog): MergeOutcome<DailyLog> {
  if (!local) {
    return { merged: { ...remote, steps: Math.max(0, Math.floor(remote.steps)) }, changed: true };
  }
  const merged: DailyLog = {
    ...local,
    steps: Math.max(local.steps, Math.floor(remote.steps)),
    goalMet: local.goalMet || remote.goalMet,
    shieldUsed: local.shieldUsed || remote.shieldUsed,
    contributingSessionIds: [
      ...new Set([...local.contributingSessionIds, ...remote.contributingSessionIds])
    ].sort(),
    state: local.state === 'finalized' || remote.state === 'finalized' ? 'finalized' : 'open'
  };
  const changed = !sameJson({ ...merged, updatedAt: '' }, { ...local, updatedAt: '' });
  return {
    merged: changed ? merged : local,
    changed
  };
}

function unionBadges(local: LegacyBadge[], remote: LegacyBadge[]): LegacyBadge[] {
  const byLength = new Map<number, LegacyBadge>();
  [...local, ...remote].forEach((badge) => {
    const held = byLength.get(badge.streakLength);
    if (!held || badge.earnedAt < held.earnedAt) {
      byLength.set(badge.streakLength, badge);
    }
  });
  return [...byLength.values()].sort((a, b) => a.streakLength - b.streakLength);
}

/**
 * The copy whose last counted day is newer owns the current run; longest and
 * the break boundary only move forward. Pending milestones stay device-local.
 */
export function mergeStreakState(local: StreakState, remote: StreakState): MergeOutcome<StreakState> {
  const remoteNewer = (remote.lastGoalMetDate ?? '') > (local.lastGoalMetDate ?? '');
  const runOwner = remoteNewer ? remote : local;
  const boundaries = [local.breakBoundary, remote.breakBoundary].filter(
    (value): value is string => value !== null
  );
  const merged: StreakState = {
    ...local,
    currentStreak: runOwner.currentStreak,
    streakStartDate: runOwner.streakStartDate,
    lastGoalMetDate: runOwner.lastGoalMetDate,
    consecutiveGoalDays: runOwner.consecutiveGoalDays,
    lastCelebratedMilestone: runOwner.lastCelebratedMilestone,
    celebratedRunStart: runOwner.celebratedRunStart,
    longestStreak: Math.max(local.longestStreak, remote.longestStreak, runOwner.currentStreak),
    breakBoundary: boundaries.length > 0 ? boundaries.sort()[boundaries.length - 1] : null,
    legacyBadges: unionBadges(local.legacyBadges, remote.legacyBadges)
  };
  const changed = !sameJson(merged, local);
  return { merged: changed ? merged : local, changed };
}

/**
 * Shields must not multiply across devices: the recurring bucket takes the
 * lower count within a grant period (or the newer period's count), and the
 * purchased bucket is rebuilt from the grow-only purchase/consumption counters.
 */
export function mergeShieldInventory(
  local: ShieldInventory,
  remote: ShieldInventory
): MergeOutcome<ShieldInventory> {
  const localPeriod = local.lastRecurringRefillPeriod ?? '';
  const remotePeriod = remote.lastRecurringRefillPeriod ?? '';

  let recurringAvailable: number;
  let usedThisPeriod: number;
  if (localPeriod === remotePeriod) {
    recurringAvailable = Math.min(local.recurringAvailable, remote.recurringAvailable);
    usedThisPeriod = Math.max(local.usedThisPeriod, remote.usedThisPeriod);
  } else if (remotePeriod > localPeriod) {
    recurringAvailable = remote.recurringAvailable;
    usedThisPeriod = remote.usedThisPeriod;
  } else {
    recurringAvailable = local.recurringAvailable;
    usedThisPeriod = local.usedThisPeriod;
  }

  const purchasedLifetime = Math.max(local.purchasedLifetime, remote.purchasedLifetime);
  const purchasedConsumedLifetime = Math.max(
    local.purchasedConsumedLifetime,
    remote.purchasedConsumedLifetime
  );
  const totalUsedLifetime = Math.max(local.totalUsedLifetime, remote.totalUsedLifetime);

  const merged: ShieldInventory = {
    recurringAvailable,
    purchasedAvailable: Math.max(0, purchasedLifetime - purchasedConsumedLifetime),
    lastRecurringRefillPeriod:
      remotePeriod > localPeriod ? remote.lastRecurringRefillPeriod : local.lastRecurringRefillPeriod,
    usedThisPeriod: Math.min(usedThisPeriod, totalUsedLifetime),
    totalUsedLifetime,
    purchasedLifetime,
    purchasedConsumedLifetime
  };
  const changed = !sameJson(merged, local);
  return { merged: changed ? merged : local, changed };
}
