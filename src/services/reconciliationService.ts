import { ObservationFetchFailure } from '../errors';
import type { Logger } from '../logger';
import type { ObservationProvider } from '../providers/observationProvider';
import type { DayKey, StepObservation } from '../types';
import { addDays, chunk, listDays } from '../utils';
import type { ServiceContext } from './context';
import type { EntitlementService } from './entitlementService';
import type { ShieldService } from './shieldService';
import type { StepService } from './stepService';
import type { StreakService } from './streakService';

const FETCH_CHUNK_DAYS = 7;
const LAST_RUN_META_KEY = 'reconcile.lastRunAt';

export type ReconcileTrigger = 'scheduled' | 'foreground' | 'manual';

export interface ReconcileWindow {
  start: DayKey;
  end: DayKey;
}

export interface ReconcileReport {
  window: ReconcileWindow;
  changedDates: DayKey[];
  failedDates: DayKey[];
  cancelled: boolean;
}

export interface RunIfDueResult {
  ran: boolean;
  trigger: ReconcileTrigger;
  report?: ReconcileReport;
  nextDueAt?: string;
}

export class ReconciliationService {
  private readonly logger: Logger;
  private inFlight: Promise<ReconcileReport> | null = null;
  private controller: AbortController | null = null;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly ctx: ServiceContext,
    private readonly provider: ObservationProvider,
    private readonly entitlements: EntitlementService,
    private readonly steps: StepService,
    private readonly streaks: StreakService,
    private readonly shields: ShieldService
  ) {
    this.logger = ctx.logger.child({ module: 'reconcile' });
  }

  async defaultWindow(): Promise<ReconcileWindow> {
    const policy = await this.entitlements.getPolicy();
    const end = this.ctx.calendar.today();
    return { start: addDays(end, -(policy.reconcileWindowDays - 1)), end };
  }

  /**
   * Re-derives every day in the window from the provider. Days commit one by
   * one, so a cancelled or partly failed run keeps what it already applied.
   */
  async reconcile(window?: ReconcileWindow, signal?: AbortSignal): Promise<ReconcileReport> {
    const range = window ?? (await this.defaultWindow());
    const today = this.ctx.calendar.today();
    const end = range.end > today ? today : range.end;
    const report: ReconcileReport = {
      window: { start: range.start, end },
      changedDates: [],
      failedDates: [],
      cancelled: false
    };

    await this.steps.rollover();

    for (const days of chunk(listDays(range.start, end), FETCH_CHUNK_DAYS)) {
      if (signal?.aborted) {
        report.cancelled = true;
        break;
      }
      const fetched = await this.fetchChunk(days, report);
      for (const day of days) {
        if (signal?.aborted) {
          report.cancelled = true;
          break;
        }
        const observations = fetched.get(day);
        if (!observations) {
          continue;
        }
        const { changed } = await this.steps.commitDay(day, observations);
        if (changed) {
          report.changedDates.push(day);
        }
      }
      if (report.cancelled) {
        break;
      }
    }

    if (report.changedDates.length > 0) {
      await this.streaks.recompute();
    }
    if (this.ctx.config.autoProtectMissedDays && !report.cancelled) {
      await this.shields.autoProtectMissedDays();
    }
    if (!report.cancelled) {
      await this.ctx.store.setMeta(LAST_RUN_META_KEY, new Date(this.ctx.calendar.nowMs()).toISOString());
    }

    this.logger.info(
      {
        window: report.window,
        changed: report.changedDates.length,
        failed: report.failedDates.length,
        cancelled: report.cancelled
      },
      'reconciliation finished'
    );
    return report;
  }

  /**
   * Throttled entry point: `scheduled` and `foreground` respect their minimum
   * intervals, `manual` always runs. Callers arriving during a run share it.
   */
  async runIfDue(trigger: ReconcileTrigger): Promise<RunIfDueResult> {
    if (this.inFlight) {
      return { ran: true, trigger, report: await this.inFlight };
    }
    if (trigger !== 'manual') {
      const lastRunAt = await this.lastRunAt();
      const interval =
        trigger === 'scheduled'
          ? this.ctx.config.reconcileIntervalMs
          : this.ctx.config.reconcileForegroundIntervalMs;
      if (lastRunAt !== null && this.ctx.calendar.nowMs() - lastRunAt < interval) {
        return { ran: false, trigger, nextDueAt: new Date(lastRunAt + interval).toISOString() };
      }
    }
    // A run may have started while the throttle check awaited the store.
    if (this.inFlight) {
      return { ran: true, trigger, report: await this.inFlight };
    }

    const controller = new AbortController();
    const promise = this.reconcile(undefined, controller.signal);
    this.controller = controller;
    this.inFlight = promise;
    try {
      return { ran: true, trigger, report: await promise };
    } finally {
      this.inFlight = null;
      this.controller = null;
    }
  }

  start(): void {
    if (this.timer) {
      return;
    }
    const tick = () => {
      this.runIfDue('scheduled').catch((error: unknown) => {
        this.logger.error({ err: error }, 'scheduled reconciliation failed');
      });
    };
    this.timer = setInterval(tick, this.ctx.config.reconcileIntervalMs);
    this.timer.unref();
    tick();
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.controller?.abort();
    if (this.inFlight) {
      await this.inFlight.catch((error: unknown) => {
        this.logger.warn({ err: error }, 'reconciliation failed while stopping');
      });
    }
  }

  private async lastRunAt(): Promise<number | null> {
    const value = await this.ctx.store.getMeta(LAST_RUN_META_KEY);
    const parsed = value ? Date.parse(value) : Number.NaN;
    return Number.isFinite(parsed) ? parsed : null;
  }

  /** One range request per chunk, falling back to single days when it fails. */
  private async fetchChunk(days: DayKey[], report: ReconcileReport): Promise<Map<DayKey, StepObservation[]>> {
    const first = days[0];
    const last = days[days.length - 1];
    try {
      return await this.provider.fetchRange(first, last);
    } catch (error) {
      this.logger.warn({ err: error, start: first, end: last }, 'range fetch failed, retrying per day');
    }

    const fetched = new Map<DayKey, StepObservation[]>();
    for (const day of days) {
      try {
        fetched.set(day, await this.provider.fetchDay(day, this.ctx.calendar.bounds(day)));
      } catch (error) {
        const failure = error instanceof ObservationFetchFailure ? error : new ObservationFetchFailure([day], error);
        this.logger.warn({ err: failure, day }, 'observation fetch failed, day skipped');
        report.failedDates.push(day);
      }
    }
    return fetched;
  }
}
