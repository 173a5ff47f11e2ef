import { CorruptedAggregateError } from '../errors';
import { emptyShieldInventory, validateShieldInventory } from '../engine/shields';
import { emptyStreakState, validateStreakState } from '../engine/streak';
import { mergeDailyLog, mergeShieldInventory, mergeStreakState } from '../engine/syncMerge';
import type { Logger } from '../logger';
import type { DailyLog, DayKey, ShieldInventory, StreakState } from '../types';
import { dayLock, SHIELDS_LOCK, STREAK_LOCK, type ServiceContext } from './context';
import type { StreakService } from './streakService';

export interface SyncLogsReport {
  changedDates: DayKey[];
  skippedDates: DayKey[];
}

export interface SyncStateInput {
  streak?: StreakState;
  shields?: ShieldInventory;
}

export interface SyncExport {
  dailyLogs: DailyLog[];
  streak: StreakState;
  shields: ShieldInventory;
}

/**
 * Folds in copies of this engine's records from another device. The
 * transport that delivers them lives outside the service.
 */
export class SyncService {
  private readonly logger: Logger;

  constructor(
    private readonly ctx: ServiceContext,
    private readonly streaks: StreakService
  ) {
    this.logger = ctx.logger.child({ module: 'sync' });
  }

  async mergeDailyLogs(remote: DailyLog[]): Promise<SyncLogsReport> {
    const today = this.ctx.calendar.today();
    const report: SyncLogsReport = { changedDates: [], skippedDates: [] };

    for (const incoming of remote) {
      if (incoming.date > today) {
        report.skippedDates.push(incoming.date);
        continue;
      }
      const changed = await this.ctx.mutex.runExclusive(dayLock(incoming.date), async () => {
        const local = await this.ctx.store.getDailyLog(incoming.date);
        const { merged, changed } = mergeDailyLog(local, incoming);
        if (!changed) {
          return false;
        }
        const next: DailyLog = {
          ...merged,
          state: incoming.date < today ? 'finalized' : 'open',
          updatedAt: new Date(this.ctx.calendar.nowMs()).toISOString()
        };
        await this.ctx.store.transaction(async (tx) => {
          await tx.upsertHighWaterMark(next.date, next.steps);
          await tx.upsertDailyLog(next);
        });
        this.ctx.events.emit('dailyLogChanged', next);
        return true;
      });
      if (changed) {
        report.changedDates.push(incoming.date);
      }
    }

    if (report.skippedDates.length > 0) {
      this.logger.warn({ dates: report.skippedDates }, 'remote logs dated in the future skipped');
    }
    if (report.changedDates.length > 0) {
      this.logger.info({ dates: report.changedDates }, 'remote daily logs merged');
      await this.streaks.recompute();
    }
    return report;
  }

  async mergeState(input: SyncStateInput): Promise<{ streak: StreakState; shields: ShieldInventory }> {
    return this.ctx.mutex.runExclusive([STREAK_LOCK, SHIELDS_LOCK], async () => {
      const localStreak = (await this.ctx.store.getStreakState()) ?? emptyStreakState();
      const localShields = (await this.ctx.store.getShieldInventory()) ?? emptyShieldInventory();
      this.assertValid('streak', validateStreakState(localStreak));
      this.assertValid('shields', validateShieldInventory(localShields));

      const streak = input.streak ? mergeStreakState(localStreak, input.streak) : { merged: localStreak, changed: false };
      const shields = input.shields
        ? mergeShieldInventory(localShields, input.shields)
        : { merged: localShields, changed: false };
      this.assertValid('streak', validateStreakState(streak.merged));
      this.assertValid('shields', validateShieldInventory(shields.merged));

      await this.ctx.store.transaction(async (tx) => {
        if (streak.changed) {
          await tx.saveStreakState(streak.merged);
        }
        if (shields.changed) {
          await tx.saveShieldInventory(shields.merged);
        }
      });
      if (streak.changed) {
        this.ctx.events.emit('streakChanged', streak.merged);
      }
      if (shields.changed) {
        this.ctx.events.emit('shieldsChanged', shields.merged);
      }
      this.logger.info({ streakChanged: streak.changed, shieldsChanged: shields.changed }, 'remote state merged');
      return { streak: streak.merged, shields: shields.merged };
    });
  }

  async exportState(): Promise<SyncExport> {
    return {
      dailyLogs: await this.ctx.store.listDailyLogs('0000-01-01', this.ctx.calendar.today()),
      streak: (await this.ctx.store.getStreakState()) ?? emptyStreakState(),
      shields: (await this.ctx.store.getShieldInventory()) ?? emptyShieldInventory()
    };
  }

  private assertValid(aggregate: string, problems: string[]): void {
    if (problems.length > 0) {
      this.logger.error({ aggregate, problems }, 'merged state violates invariants');
      throw new CorruptedAggregateError(aggregate, problems);
    }
  }
}
