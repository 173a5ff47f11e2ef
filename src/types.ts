/** Local calendar date, `YYYY-MM-DD`, in the configured time zone. */
export type DayKey = string;

/** Grant period for recurring shields, `YYYY-MM`. */
export type PeriodKey = string;

export type DayState = 'open' | 'finalized';
export type Tier = 'free' | 'pro';
export type ConsumptionOrder = 'purchased-first' | 'recurring-first';

export interface DayBounds {
  day: DayKey;
  startMs: number;
  endMs: number;
}

export interface StepObservation {
  provider: string;
  startMs: number;
  endMs: number;
  steps: number;
  sessionId?: string;
}

export interface DailyLog {
  date: DayKey;
  steps: number;
  goalTarget: number;
  goalMet: boolean;
  shieldUsed: boolean;
  contributingSessionIds: string[];
  state: DayState;
  updatedAt: string;
}

export interface LegacyBadge {
  streakLength: number;
  achievedStreak: number;
  earnedAt: string;
}

export interface StreakState {
  currentStreak: number;
  longestStreak: number;
  streakStartDate: DayKey | null;
  lastGoalMetDate: DayKey | null;
  /** Goal-met days at the end of the run; a shielded day resets it. */
  consecutiveGoalDays: number;
  lastReachedMilestone: number | null;
  lastCelebratedMilestone: number | null;
  /** Start of the run `lastCelebratedMilestone` was fired for. */
  celebratedRunStart: DayKey | null;
  breakBoundary: DayKey | null;
  legacyBadges: LegacyBadge[];
}

export interface ShieldInventory {
  recurringAvailable: number;
  purchasedAvailable: number;
  lastRecurringRefillPeriod: PeriodKey | null;
  usedThisPeriod: number;
  totalUsedLifetime: number;
  purchasedLifetime: number;
  purchasedConsumedLifetime: number;
}

export interface GoalChange {
  effectiveFrom: DayKey;
  steps: number;
}

export interface Entitlement {
  tier: Tier;
  expiresAt?: string;
}

export interface TierPolicy {
  tier: Tier;
  bankMax: number;
  recurringAmount: number;
  reconcileWindowDays: number;
}

export interface TodaySummary {
  date: DayKey;
  steps: number;
  goal: number;
  goalMet: boolean;
}
