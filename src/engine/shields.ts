import { err, ok, type Result } from '../errors';
import type {
  ConsumptionOrder,
  DayKey,
  PeriodKey,
  ShieldInventory,
  Tier,
  TierPolicy
} from '../types';
import { daysBetween } from '../utils';

/** Repair window: today plus the six days before it. */
export const REPAIR_LOOKBACK_DAYS = 7;

export const TIER_POLICIES: Record<Tier, TierPolicy> = {
  free: { tier: 'free', bankMax: 2, recurringAmount: 2, reconcileWindowDays: 30 },
  pro: { tier: 'pro', bankMax: 8, recurringAmount: 4, reconcileWindowDays: 365 }
};

export function emptyShieldInventory(): ShieldInventory {
  return {
    recurringAvailable: 0,
    purchasedAvailable: 0,
    lastRecurringRefillPeriod: null,
    usedThisPeriod: 0,
    totalUsedLifetime: 0,
    purchasedLifetime: 0,
    purchasedConsumedLifetime: 0
  };
}

export function totalAvailable(inventory: ShieldInventory): number {
  return inventory.recurringAvailable + inventory.purchasedAvailable;
}

export function validateShieldInventory(inventory: ShieldInventory): string[] {
  const problems: string[] = [];
  const counters: Array<[keyof ShieldInventory, unknown]> = [
    ['recurringAvailable', inventory.recurringAvailable],
    ['purchasedAvailable', inventory.purchasedAvailable],
    ['usedThisPeriod', inventory.usedThisPeriod],
    ['totalUsedLifetime', inventory.totalUsedLifetime],
    ['purchasedLifetime', inventory.purchasedLifetime],
    ['purchasedConsumedLifetime', inventory.purchasedConsumedLifetime]
  ];
  counters.forEach(([name, value]) => {
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      problems.push(`${name} must be a non-negative integer, got ${String(value)}`);
    }
  });
  if (inventory.usedThisPeriod > inventory.totalUsedLifetime) {
    problems.push('usedThisPeriod exceeds totalUsedLifetime');
  }
  return problems;
}

export interface GrantOutcome {
  inventory: ShieldInventory;
  granted: number;
}

/**
 * Monthly grant. Unused recurring shields carry over but the bucket is capped
 * at the tier's bank size, which also trims a bank left over from a higher
 * tier. Purchased shields are never touched.
 */
export function grantRecurring(
  inventory: ShieldInventory,
  period: PeriodKey,
  policy: TierPolicy
): GrantOutcome {
  if (inventory.lastRecurringRefillPeriod === period) {
    return { inventory, granted: 0 };
  }
  const recurringAvailable = Math.min(
    policy.bankMax,
    inventory.recurringAvailable + policy.recurringAmount
  );
  return {
    inventory: {
      ...inventory,
      recurringAvailable,
      usedThisPeriod: 0,
      lastRecurringRefillPeriod: period
    },
    granted: Math.max(0, recurringAvailable - inventory.recurringAvailable)
  };
}

export function purchase(inventory: ShieldInventory, count: number): ShieldInventory {
  if (!Number.isInteger(count) || count < 1) {
    throw new RangeError(`purchase count must be a positive integer, got ${count}`);
  }
  return {
    ...inventory,
    purchasedAvailable: inventory.purchasedAvailable + count,
    purchasedLifetime: inventory.purchasedLifetime + count
  };
}

export function consume(
  inventory: ShieldInventory,
  order: ConsumptionOrder
): Result<ShieldInventory, { kind: 'insufficient_shields' }> {
  if (totalAvailable(inventory) <= 0) {
    return err({ kind: 'insufficient_shields' });
  }
  const fromPurchased =
    order === 'purchased-first'
      ? inventory.purchasedAvailable > 0
      : inventory.recurringAvailable === 0;

  return ok({
    ...inventory,
    purchasedAvailable: inventory.purchasedAvailable - (fromPurchased ? 1 : 0),
    recurringAvailable: inventory.recurringAvailable - (fromPurchased ? 0 : 1),
    purchasedConsumedLifetime: inventory.purchasedConsumedLifetime + (fromPurchased ? 1 : 0),
    usedThisPeriod: inventory.usedThisPeriod + 1,
    totalUsedLifetime: inventory.totalUsedLifetime + 1
  });
}

export function isWithinRepairWindow(day: DayKey, today: DayKey): boolean {
  const age = daysBetween(day, today);
  return age >= 0 && age < REPAIR_LOOKBACK_DAYS;
}
