import type { DailyLog, DayKey, LegacyBadge, StreakState } from '../types';
import { addDays } from '../utils';

export const STREAK_MILESTONES = [7, 14, 21, 30, 60, 90, 180, 365];
export const WEEKLY_JACKPOT_DAYS = 7;
export const AT_RISK_HOUR = 18;
const LEGACY_BADGE_MINIMUM = 30;

export function isMilestone(streak: number): boolean {
  if (STREAK_MILESTONES.includes(streak)) {
    return true;
  }
  return streak > 365 && streak % 100 === 0;
}

export function nextMilestone(streak: number): number {
  const listed = STREAK_MILESTONES.find((milestone) => milestone > streak);
  if (listed !== undefined) {
    return listed;
  }
  return (Math.floor(Math.max(streak, 365) / 100) + 1) * 100;
}

/** Largest milestone at or below `streak` that earns a legacy badge, if any. */
export function legacyBadgeTier(streak: number): number | null {
  if (streak < LEGACY_BADGE_MINIMUM) {
    return null;
  }
  if (streak >= 400) {
    return Math.floor(streak / 100) * 100;
  }
  const tiers = STREAK_MILESTONES.filter((m) => m >= LEGACY_BADGE_MINIMUM && m <= streak);
  return tiers[tiers.length - 1] ?? null;
}

export function emptyStreakState(): StreakState {
  return {
    currentStreak: 0,
    longestStreak: 0,
    streakStartDate: null,
    lastGoalMetDate: null,
    consecutiveGoalDays: 0,
    lastReachedMilestone: null,
    lastCelebratedMilestone: null,
    celebratedRunStart: null,
    breakBoundary: null,
    legacyBadges: []
  };
}

export function countsForStreak(log: DailyLog | undefined): boolean {
  return Boolean(log && (log.goalMet || log.shieldUsed));
}

export interface StreakRun {
  currentStreak: number;
  streakStartDate: DayKey | null;
  lastGoalMetDate: DayKey | null;
  consecutiveGoalDays: number;
}

/**
 * Counts back from `asOf`. A day with no row breaks the run just like a
 * measured miss. An open `asOf` that does not count yet is skipped, so the run
 * stays alive without being extended.
 */
export function walkStreak(
  logsByDate: Map<DayKey, DailyLog>,
  asOf: DayKey,
  options: { asOfOpen: boolean; boundary: DayKey | null }
): StreakRun {
  let cursor = asOf;
  if (options.asOfOpen && !countsForStreak(logsByDate.get(asOf))) {
    cursor = addDays(asOf, -1);
  }

  let count = 0;
  let goalDays = 0;
  let goalDaysOpen = true;
  let start: DayKey | null = null;
  let last: DayKey | null = null;
  for (;;) {
    const log = logsByDate.get(cursor);
    if ((options.boundary !== null && cursor <= options.boundary) || !log || !countsForStreak(log)) {
      break;
    }
    count += 1;
    if (goalDaysOpen && log.goalMet) {
      goalDays += 1;
    } else {
      goalDaysOpen = false;
    }
    start = cursor;
    last = last ?? cursor;
    cursor = addDays(cursor, -1);
  }

  return { currentStreak: count, streakStartDate: start, lastGoalMetDate: last, consecutiveGoalDays: goalDays };
}

/** Length of the run that a miss on `day` ends. */
export function runEndingBefore(logs: DailyLog[], day: DayKey, boundary: DayKey | null): number {
  const byDate = new Map(logs.map((log) => [log.date, log]));
  return walkStreak(byDate, addDays(day, -1), { asOfOpen: false, boundary }).currentStreak;
}

/** Longest run of consecutive counted days up to `asOf`; runs never span `boundary`. */
export function longestRun(logs: DailyLog[], asOf: DayKey, boundary: DayKey | null): number {
  const counted = logs
    .filter((log) => log.date <= asOf && countsForStreak(log))
    .map((log) => log.date)
    .sort();

  let best = 0;
  let run = 0;
  let previous: DayKey | null = null;
  for (const date of counted) {
    const crossesBoundary = boundary !== null && previous !== null && previous <= boundary && date > boundary;
    run = previous !== null && addDays(previous, 1) === date && !crossesBoundary ? run + 1 : 1;
    best = Math.max(best, run);
    previous = date;
  }
  return best;
}

export interface RecomputeOutcome {
  state: StreakState;
  firedMilestone: number | null;
}

/**
 * A milestone fires at most once per run. The run is identified by its start
 * date, so a run that dips and recovers keeps its celebrated record.
 */
export function recomputeStreak(
  previous: StreakState,
  logs: DailyLog[],
  asOf: DayKey,
  asOfOpen: boolean
): RecomputeOutcome {
  const byDate = new Map(logs.map((log) => [log.date, log]));
  const run = walkStreak(byDate, asOf, { asOfOpen, boundary: previous.breakBoundary });
  const longestStreak = Math.max(
    previous.longestStreak,
    run.currentStreak,
    longestRun(logs, asOf, previous.breakBoundary)
  );

  const sameRun = run.streakStartDate === null || run.streakStartDate === previous.celebratedRunStart;
  let celebrated = sameRun ? previous.lastCelebratedMilestone : null;

  let firedMilestone: number | null = null;
  if (isMilestone(run.currentStreak) && (celebrated === null || run.currentStreak > celebrated)) {
    firedMilestone = run.currentStreak;
    celebrated = run.currentStreak;
  }

  return {
    state: {
      ...previous,
      currentStreak: run.currentStreak,
      streakStartDate: run.streakStartDate,
      lastGoalMetDate: run.lastGoalMetDate,
      consecutiveGoalDays: run.consecutiveGoalDays,
      longestStreak,
      lastCelebratedMilestone: celebrated,
      celebratedRunStart: sameRun ? previous.celebratedRunStart : run.streakStartDate,
      lastReachedMilestone: firedMilestone ?? previous.lastReachedMilestone
    },
    firedMilestone
  };
}

export interface BreakOutcome {
  state: StreakState;
  badge: LegacyBadge | null;
}

/**
 * Moves the break boundary forward. `endedRun` is the length of the run the
 * break ends; when it is 0 nothing ends and only the boundary moves.
 */
export function breakStreak(
  previous: StreakState,
  boundary: DayKey | null,
  earnedAt: string,
  endedRun: number = previous.currentStreak
): BreakOutcome {
  const nextBoundary =
    boundary !== null && (previous.breakBoundary === null || boundary > previous.breakBoundary)
      ? boundary
      : previous.breakBoundary;
  if (endedRun === 0) {
    return { state: { ...previous, breakBoundary: nextBoundary }, badge: null };
  }

  const tier = legacyBadgeTier(endedRun);
  const alreadyHeld = previous.legacyBadges.some((badge) => badge.streakLength === tier);
  const badge: LegacyBadge | null =
    tier !== null && !alreadyHeld ? { streakLength: tier, achievedStreak: endedRun, earnedAt } : null;

  return {
    state: {
      ...previous,
      currentStreak: 0,
      streakStartDate: null,
      lastGoalMetDate: null,
      consecutiveGoalDays: 0,
      breakBoundary: nextBoundary,
      legacyBadges: badge ? [...previous.legacyBadges, badge] : previous.legacyBadges
    },
    badge
  };
}

/** Alive while the last counted day is today or yesterday. */
export function isStreakAlive(state: StreakState, today: DayKey): boolean {
  if (state.currentStreak === 0 || state.lastGoalMetDate === null) {
    return false;
  }
  return state.lastGoalMetDate === today || state.lastGoalMetDate === addDays(today, -1);
}

/** Evening of a day that has not counted yet, with a run to lose. */
export function isStreakAtRisk(state: StreakState, today: DayKey, localHour: number): boolean {
  if (localHour < AT_RISK_HOUR || state.currentStreak === 0) {
    return false;
  }
  return state.lastGoalMetDate !== today;
}

export function weeklyJackpotProgress(consecutiveGoalDays: number): number {
  return consecutiveGoalDays % WEEKLY_JACKPOT_DAYS;
}

export function weeklyJackpotEarned(consecutiveGoalDays: number): boolean {
  return consecutiveGoalDays > 0 && consecutiveGoalDays % WEEKLY_JACKPOT_DAYS === 0;
}

export function validateStreakState(state: StreakState): string[] {
  const problems: string[] = [];
  const counters: Array<[string, number]> = [
    ['currentStreak', state.currentStreak],
    ['longestStreak', state.longestStreak],
    ['consecutiveGoalDays', state.consecutiveGoalDays]
  ];
  counters.forEach(([name, value]) => {
    if (!Number.isInteger(value) || value < 0) {
      problems.push(`${name} must be a non-negative integer, got ${value}`);
    }
  });
  if (state.currentStreak > state.longestStreak) {
    problems.push(
      `currentStreak ${state.currentStreak} exceeds longestStreak ${state.longestStreak}`
    );
  }
  if (state.consecutiveGoalDays > state.currentStreak) {
    problems.push(
      `consecutiveGoalDays ${state.consecutiveGoalDays} exceeds currentStreak ${state.currentStreak}`
    );
  }
  return problems;
}
