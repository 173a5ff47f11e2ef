import { AppError } from '../errors';
import { checkObservation, mergeObservations, type DroppedObservation } from '../engine/intervalMerge';
import { ratchet } from '../engine/ratchet';
import { TIER_POLICIES } from '../engine/shields';
import type { Logger } from '../logger';
import type { DailyLog, DayKey, StepObservation, TodaySummary } from '../types';
import { addDays, daysBetween, isDayKey } from '../utils';
import { dayLock, type ServiceContext } from './context';
import type { StreakService } from './streakService';

const MAX_RANGE_DAYS = 366;

const maxDay = (a: DayKey, b: DayKey): DayKey => (a > b ? a : b);
const minDay = (a: DayKey, b: DayKey): DayKey => (a < b ? a : b);

export interface DayCommit {
  log: DailyLog | undefined;
  changed: boolean;
}

export interface IngestReport {
  received: number;
  stored: number;
  dropped: Array<{ reason: DroppedObservation['reason']; observation: StepObservation }>;
  /** Closed days inside the reconciliation window that the batch touched. */
  deferredDates: DayKey[];
  today: TodaySummary;
}

export class StepService {
  private readonly logger: Logger;

  constructor(
    private readonly ctx: ServiceContext,
    private readonly streaks: StreakService
  ) {
    this.logger = ctx.logger.child({ module: 'steps' });
  }

  /** Goal in force on `day`: the latest change effective on or before it. */
  async goalFor(day: DayKey): Promise<number> {
    const changes = await this.ctx.store.listGoalChanges();
    let goal = this.ctx.config.defaultDailyGoal;
    for (const change of changes) {
      if (change.effectiveFrom <= day) {
        goal = change.steps;
      }
    }
    return goal;
  }

  /** Changes the goal from today on. Closed days keep the goal frozen on them. */
  async setGoal(steps: number): Promise<TodaySummary> {
    if (!Number.isInteger(steps) || steps < 1) {
      throw new AppError(400, 40020, 'goal must be a positive integer');
    }
    await this.rollover();
    const today = this.ctx.calendar.today();
    await this.ctx.mutex.runExclusive(dayLock(today), async () => {
      await this.ctx.store.upsertGoalChange({ effectiveFrom: today, steps });
      const log = await this.ctx.store.getDailyLog(today);
      if (log && log.state === 'open') {
        const next: DailyLog = {
          ...log,
          goalTarget: steps,
          goalMet: log.steps >= steps,
          updatedAt: this.nowIso()
        };
        await this.ctx.store.upsertDailyLog(next);
        this.ctx.events.emit('dailyLogChanged', next);
      }
    });
    this.logger.info({ goal: steps, effectiveFrom: today }, 'daily goal changed');
    await this.streaks.recompute();
    return this.getToday();
  }

  async getToday(): Promise<TodaySummary> {
    await this.rollover();
    const today = this.ctx.calendar.today();
    const log = await this.ctx.store.getDailyLog(today);
    const goal = log?.goalTarget ?? (await this.goalFor(today));
    const steps = log?.steps ?? 0;
    return { date: today, steps, goal, goalMet: steps >= goal };
  }

  async loadDailyLog(date: DayKey): Promise<DailyLog | undefined> {
    return this.ctx.store.getDailyLog(date);
  }

  async loadDailyLogs(start: DayKey, end: DayKey): Promise<DailyLog[]> {
    if (!isDayKey(start) || !isDayKey(end)) {
      throw new AppError(400, 40000, 'start and end must be YYYY-MM-DD dates');
    }
    if (end < start) {
      throw new AppError(400, 40000, 'end must not be before start');
    }
    if (daysBetween(start, end) >= MAX_RANGE_DAYS) {
      throw new AppError(400, 40000, `range must not exceed ${MAX_RANGE_DAYS} days`);
    }
    return this.ctx.store.listDailyLogs(start, end);
  }

  async rollover(): Promise<DayKey[]> {
    const today = this.ctx.calendar.today();
    const finalized = await this.ctx.store.finalizeDailyLogsBefore(today, this.nowIso());
    if (finalized.length > 0) {
      this.logger.info({ days: finalized }, 'days finalized');
    }
    return finalized;
  }

  /**
   * Live path: store the batch in the observation ledger, then re-merge and
   * commit today. Closed days are left to reconciliation.
   */
  async recordObservations(observations: StepObservation[]): Promise<IngestReport> {
    await this.rollover();
    const today = this.ctx.calendar.today();
    const dropped: IngestReport['dropped'] = [];
    const valid: StepObservation[] = [];
    observations.forEach((observation) => {
      const reason = checkObservation(observation);
      if (reason) {
        dropped.push({ reason, observation });
      } else {
        valid.push(observation);
      }
    });
    if (dropped.length > 0) {
      this.logger.warn({ dropped }, 'malformed observations dropped');
    }

    const stored = await this.ctx.store.appendObservations(valid);
    const touched = new Set<DayKey>();
    const earliest = addDays(today, -(TIER_POLICIES.pro.reconcileWindowDays - 1));
    valid.forEach((observation) => {
      const first = maxDay(this.ctx.calendar.dayKey(observation.startMs), earliest);
      const last = minDay(this.ctx.calendar.dayKey(observation.endMs - 1), today);
      for (let day = first; day <= last; day = addDays(day, 1)) {
        touched.add(day);
      }
    });

    if (touched.has(today)) {
      const bounds = this.ctx.calendar.bounds(today);
      const ledger = await this.ctx.store.listObservations(bounds.startMs, bounds.endMs);
      const { changed } = await this.commitDay(today, ledger);
      if (changed) {
        await this.streaks.recompute();
      }
    }

    return {
      received: observations.length,
      stored,
      dropped,
      deferredDates: [...touched].filter((day) => day < today).sort(),
      today: await this.getToday()
    };
  }

  /**
   * merge → ratchet → commit for one day under its lock. Open days take the
   * current goal; finalized days keep theirs and only ever gain steps.
   */
  async commitDay(day: DayKey, observations: StepObservation[]): Promise<DayCommit> {
    return this.ctx.mutex.runExclusive(dayLock(day), async () => {
      const bounds = this.ctx.calendar.bounds(day);
      const result = mergeObservations(observations, bounds, this.ctx.config.providerPrecedence);
      if (result.dropped.length > 0) {
        this.logger.warn({ day, dropped: result.dropped }, 'observations dropped during merge');
      }

      const existing = await this.ctx.store.getDailyLog(day);
      const mark = await this.ctx.store.getHighWaterMark(day);
      const floor = Math.max(mark ?? 0, existing?.steps ?? 0);
      const steps = ratchet(floor, result.steps);
      const isOpen = day >= this.ctx.calendar.today();

      if (!existing && steps === 0) {
        return { log: undefined, changed: false };
      }
      if (existing && !isOpen && steps <= existing.steps) {
        return { log: existing, changed: false };
      }

      const goalTarget = isOpen ? await this.goalFor(day) : (existing?.goalTarget ?? (await this.goalFor(day)));
      const next: DailyLog = {
        date: day,
        steps,
        goalTarget,
        goalMet: isOpen ? steps >= goalTarget : Boolean(existing?.goalMet) || steps >= goalTarget,
        shieldUsed: existing?.shieldUsed ?? false,
        contributingSessionIds: [
          ...new Set([...(existing?.contributingSessionIds ?? []), ...result.contributingSessionIds])
        ].sort(),
        state: isOpen ? 'open' : 'finalized',
        updatedAt: this.nowIso()
      };

      const changed =
        !existing ||
        existing.steps !== next.steps ||
        existing.goalTarget !== next.goalTarget ||
        existing.goalMet !== next.goalMet ||
        existing.state !== next.state ||
        existing.contributingSessionIds.join(',') !== next.contributingSessionIds.join(',');
      if (!changed) {
        return { log: existing, changed: false };
      }

      await this.ctx.store.transaction(async (tx) => {
        await tx.upsertHighWaterMark(day, steps);
        await tx.upsertDailyLog(next);
      });
      this.logger.debug({ day, steps, previous: existing?.steps ?? null }, 'daily log committed');
      this.ctx.events.emit('dailyLogChanged', next);
      return { log: next, changed: true };
    });
  }

  private nowIso(): string {
    return new Date(this.ctx.calendar.nowMs()).toISOString();
  }
}
