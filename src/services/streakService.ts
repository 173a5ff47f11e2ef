import { CorruptedAggregateError } from '../errors';
import {
  breakStreak,
  emptyStreakState,
  isStreakAlive,
  isStreakAtRisk,
  nextMilestone,
  recomputeStreak,
  runEndingBefore,
  validateStreakState,
  weeklyJackpotEarned,
  weeklyJackpotProgress
} from '../engine/streak';
import type { Logger } from '../logger';
import type { DayKey, LegacyBadge, StreakState } from '../types';
import { addDays } from '../utils';
import { STREAK_LOCK, type ServiceContext } from './context';

const EARLIEST_DAY = '0000-01-01';

export interface StreakSnapshot extends StreakState {
  alive: boolean;
  atRisk: boolean;
  nextMilestone: number;
  daysUntilNextMilestone: number;
  weeklyJackpotProgress: number;
  weeklyJackpotEarned: boolean;
}

export class StreakService {
  private readonly logger: Logger;

  constructor(private readonly ctx: ServiceContext) {
    this.logger = ctx.logger.child({ module: 'streak' });
  }

  async getStreak(): Promise<StreakSnapshot> {
    const state = await this.load();
    const { calendar } = this.ctx;
    const today = calendar.today();
    const next = nextMilestone(state.currentStreak);
    return {
      ...state,
      alive: isStreakAlive(state, today),
      atRisk: isStreakAtRisk(state, today, calendar.hourAt(calendar.nowMs())),
      nextMilestone: next,
      daysUntilNextMilestone: next - state.currentStreak,
      weeklyJackpotProgress: weeklyJackpotProgress(state.consecutiveGoalDays),
      weeklyJackpotEarned: weeklyJackpotEarned(state.consecutiveGoalDays)
    };
  }

  async recompute(asOf?: DayKey): Promise<StreakState> {
    return this.ctx.mutex.runExclusive(STREAK_LOCK, async () => {
      const today = this.ctx.calendar.today();
      const anchor = asOf ?? today;
      const previous = await this.load();
      const logs = await this.ctx.store.listDailyLogs(EARLIEST_DAY, anchor);
      const { state, firedMilestone } = recomputeStreak(previous, logs, anchor, anchor === today);

      await this.save(previous, state);
      if (firedMilestone !== null) {
        this.logger.info({ milestone: firedMilestone }, 'streak milestone reached');
        this.ctx.events.emit('milestoneReached', { milestone: firedMilestone, streak: state });
      }
      return state;
    });
  }

  /**
   * Records a miss on `boundary` that will never be covered. Later recomputes
   * never count it or anything before it. Only the run that the miss ends is
   * reset and considered for a legacy badge.
   */
  async breakStreak(boundary: DayKey): Promise<{ state: StreakState; badge: LegacyBadge | null }> {
    return this.ctx.mutex.runExclusive(STREAK_LOCK, async () => {
      const previous = await this.load();
      const logs = await this.ctx.store.listDailyLogs(EARLIEST_DAY, addDays(boundary, -1));
      const endedRun = runEndingBefore(logs, boundary, previous.breakBoundary);
      const outcome = breakStreak(previous, boundary, new Date(this.ctx.calendar.nowMs()).toISOString(), endedRun);
      await this.save(previous, outcome.state);
      this.logger.info({ endedRun, boundary, badge: outcome.badge?.streakLength ?? null }, 'streak broken');
      return outcome;
    });
  }

  /** Clears the pending milestone; returns it, or null when nothing was pending. */
  async consumeMilestone(): Promise<number | null> {
    return this.ctx.mutex.runExclusive(STREAK_LOCK, async () => {
      const previous = await this.load();
      if (previous.lastReachedMilestone === null) {
        return null;
      }
      await this.save(previous, { ...previous, lastReachedMilestone: null });
      return previous.lastReachedMilestone;
    });
  }

  private async load(): Promise<StreakState> {
    const state = (await this.ctx.store.getStreakState()) ?? emptyStreakState();
    this.assertValid(state);
    return state;
  }

  private async save(previous: StreakState, next: StreakState): Promise<void> {
    this.assertValid(next);
    if (JSON.stringify(previous) === JSON.stringify(next)) {
      return;
    }
    await this.ctx.store.saveStreakState(next);
    this.ctx.events.emit('streakChanged', next);
  }

  private assertValid(state: StreakState): void {
    const problems = validateStreakState(state);
    if (problems.length > 0) {
      this.logger.error({ aggregate: 'streak', problems }, 'streak state violates invariants');
      throw new CorruptedAggregateError('streak', problems);
    }
  }
}
