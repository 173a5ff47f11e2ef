import { CorruptedAggregateError, err, ok, type Result, type ShieldError } from '../errors';
import {
  consume,
  emptyShieldInventory,
  grantRecurring,
  isWithinRepairWindow,
  purchase,
  REPAIR_LOOKBACK_DAYS,
  totalAvailable,
  validateShieldInventory
} from '../engine/shields';
import { countsForStreak } from '../engine/streak';
import type { Logger } from '../logger';
import type { DailyLog, DayKey, ShieldInventory, StreakState } from '../types';
import { addDays, listDays, periodOf } from '../utils';
import { dayLock, SHIELDS_LOCK, STREAK_LOCK, type ServiceContext } from './context';
import type { EntitlementService } from './entitlementService';
import type { StepService } from './stepService';
import type { StreakService } from './streakService';

export interface ShieldSnapshot extends ShieldInventory {
  totalAvailable: number;
  bankMax: number;
}

export interface RepairOutcome {
  log: DailyLog;
  shields: ShieldInventory;
  streak: StreakState;
}

export interface AutoProtectReport {
  protectedDates: DayKey[];
  brokenAt: DayKey | null;
  streak: StreakState;
}

export class ShieldService {
  private readonly logger: Logger;

  constructor(
    private readonly ctx: ServiceContext,
    private readonly entitlements: EntitlementService,
    private readonly steps: StepService,
    private readonly streaks: StreakService
  ) {
    this.logger = ctx.logger.child({ module: 'shields' });
  }

  async getShields(): Promise<ShieldSnapshot> {
    const inventory = await this.refillCheck();
    const policy = await this.entitlements.getPolicy();
    return { ...inventory, totalAvailable: totalAvailable(inventory), bankMax: policy.bankMax };
  }

  /** Applies this month's recurring grant if it has not been applied yet. */
  async refillCheck(): Promise<ShieldInventory> {
    return this.ctx.mutex.runExclusive(SHIELDS_LOCK, async () => {
      const current = await this.load();
      const policy = await this.entitlements.getPolicy();
      const period = periodOf(this.ctx.calendar.today());
      const { inventory, granted } = grantRecurring(current, period, policy);
      if (inventory !== current) {
        await this.save(inventory);
        this.logger.info({ period, granted, tier: policy.tier }, 'recurring shields granted');
      }
      return inventory;
    });
  }

  async purchase(count: number): Promise<ShieldInventory> {
    await this.refillCheck();
    return this.ctx.mutex.runExclusive(SHIELDS_LOCK, async () => {
      const next = purchase(await this.load(), count);
      await this.save(next);
      this.logger.info({ count, purchasedAvailable: next.purchasedAvailable }, 'shields purchased');
      return next;
    });
  }

  /**
   * Spends one shield on a missed closed day. The token and the day's
   * `shieldUsed` flag commit in one transaction; the streak is recounted after.
   */
  async requestRepair(date: DayKey): Promise<Result<RepairOutcome, ShieldError>> {
    await this.steps.rollover();
    await this.refillCheck();
    const today = this.ctx.calendar.today();
    if (!isWithinRepairWindow(date, today)) {
      return err({ kind: 'repair_ineligible', reason: 'outside_window' });
    }
    if (date === today) {
      return err({ kind: 'repair_ineligible', reason: 'day_open' });
    }

    const goal = await this.steps.goalFor(date);
    const attempt = await this.ctx.mutex.runExclusive(
      [dayLock(date), SHIELDS_LOCK, STREAK_LOCK],
      async (): Promise<Result<{ log: DailyLog; shields: ShieldInventory }, ShieldError>> => {
        const streak = await this.ctx.store.getStreakState();
        if (streak?.breakBoundary && date <= streak.breakBoundary) {
          return err({ kind: 'repair_ineligible', reason: 'declined' });
        }
        const existing = await this.ctx.store.getDailyLog(date);
        if (existing?.state === 'open') {
          return err({ kind: 'repair_ineligible', reason: 'day_open' });
        }
        if (existing?.goalMet) {
          return err({ kind: 'repair_ineligible', reason: 'already_met' });
        }
        if (existing?.shieldUsed) {
          return err({ kind: 'repair_ineligible', reason: 'already_shielded' });
        }

        const consumed = consume(await this.load(), this.ctx.config.consumptionOrder);
        if (!consumed.ok) {
          return consumed;
        }
        const base: DailyLog = existing ?? {
          date,
          steps: (await this.ctx.store.getHighWaterMark(date)) ?? 0,
          goalTarget: goal,
          goalMet: false,
          shieldUsed: false,
          contributingSessionIds: [],
          state: 'finalized',
          updatedAt: ''
        };
        const log: DailyLog = {
          ...base,
          shieldUsed: true,
          state: 'finalized',
          updatedAt: new Date(this.ctx.calendar.nowMs()).toISOString()
        };
        this.assertValid(consumed.value);
        await this.ctx.store.transaction(async (tx) => {
          await tx.saveShieldInventory(consumed.value);
          await tx.upsertDailyLog(log);
        });
        return ok({ log, shields: consumed.value });
      }
    );

    if (!attempt.ok) {
      this.logger.info({ date, outcome: attempt.error }, 'repair not applied');
      return attempt;
    }
    this.ctx.events.emit('shieldsChanged', attempt.value.shields);
    this.ctx.events.emit('dailyLogChanged', attempt.value.log);
    this.logger.info({ date }, 'day repaired with shield');
    const streak = await this.streaks.recompute();
    return ok({ ...attempt.value, streak });
  }

  /** The user chose not to protect `date`: the run ends there for good. */
  async declineRepair(date: DayKey): Promise<Result<StreakState, ShieldError>> {
    await this.steps.rollover();
    const today = this.ctx.calendar.today();
    if (date >= today) {
      return err({ kind: 'repair_ineligible', reason: 'day_open' });
    }
    const log = await this.ctx.store.getDailyLog(date);
    if (countsForStreak(log)) {
      return err({
        kind: 'repair_ineligible',
        reason: log?.goalMet ? 'already_met' : 'already_shielded'
      });
    }
    await this.streaks.breakStreak(date);
    return ok(await this.streaks.recompute());
  }

  /**
   * Covers missed closed days since the last counted day inside the repair
   * window. When shields run out the streak is broken at the first day left
   * uncovered.
   */
  async autoProtectMissedDays(): Promise<AutoProtectReport> {
    await this.steps.rollover();
    const today = this.ctx.calendar.today();
    const yesterday = addDays(today, -1);
    const windowStart = addDays(today, -REPAIR_LOOKBACK_DAYS);
    const logs = await this.ctx.store.listDailyLogs(windowStart, yesterday);
    const byDate = new Map(logs.map((log) => [log.date, log]));

    const lastCounted = listDays(windowStart, yesterday)
      .filter((day) => countsForStreak(byDate.get(day)))
      .pop();
    const protectedDates: DayKey[] = [];
    if (!lastCounted) {
      return { protectedDates, brokenAt: null, streak: await this.streaks.recompute() };
    }

    for (const day of listDays(addDays(lastCounted, 1), yesterday)) {
      const result = await this.requestRepair(day);
      if (result.ok) {
        protectedDates.push(day);
        continue;
      }
      if (result.error.kind === 'insufficient_shields') {
        await this.streaks.breakStreak(day);
        this.logger.info({ day, protectedDates }, 'shields exhausted, streak broken');
        return { protectedDates, brokenAt: day, streak: await this.streaks.recompute() };
      }
      this.logger.debug({ day, reason: result.error.reason }, 'missed day skipped by auto-protect');
    }
    return { protectedDates, brokenAt: null, streak: await this.streaks.recompute() };
  }

  private async load(): Promise<ShieldInventory> {
    const inventory = (await this.ctx.store.getShieldInventory()) ?? emptyShieldInventory();
    this.assertValid(inventory);
    return inventory;
  }

  private async save(inventory: ShieldInventory): Promise<void> {
    this.assertValid(inventory);
    await this.ctx.store.saveShieldInventory(inventory);
    this.ctx.events.emit('shieldsChanged', inventory);
  }

  private assertValid(inventory: ShieldInventory): void {
    const problems = validateShieldInventory(inventory);
    if (problems.length > 0) {
      this.logger.error({ aggregate: 'shields', problems }, 'shield inventory violates invariants');
      throw new CorruptedAggregateError('shields', problems);
    }
  }
}
