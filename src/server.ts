import Fastify from 'fastify';
import { z } from 'zod';
import { SystemClock, type Clock } from './calendar';
import { loadConfig, type AppConfig } from './config';
import { MAX_TIMESTAMP_MS } from './engine/intervalMerge';
import { AppError, type ShieldError } from './errors';
import { createLogger, type Logger } from './logger';
import type { ObservationProvider } from './providers/observationProvider';
import { createServices } from './services';
import { createStore, type StoreKind } from './store';
import { isDayKey } from './utils';

export interface BuildServerOptions {
  storage?: StoreKind;
  databaseUrl?: string;
  clock?: Clock;
  provider?: ObservationProvider;
  config?: Partial<AppConfig>;
  logger?: Logger;
  /** Start the reconciliation timer once the server is ready. */
  startScheduler?: boolean;
}

const dayKeySchema = z.string().refine(isDayKey, 'expected a YYYY-MM-DD date');
const countSchema = z.number().int().nonnegative();

const dailyLogSchema = z.object({
  date: dayKeySchema,
  steps: countSchema,
  goalTarget: z.number().int().positive(),
  goalMet: z.boolean(),
  shieldUsed: z.boolean(),
  contributingSessionIds: z.array(z.string()),
  state: z.enum(['open', 'finalized']),
  updatedAt: z.string()
});

const streakStateSchema = z.object({
  currentStreak: countSchema,
  longestStreak: countSchema,
  streakStartDate: dayKeySchema.nullable(),
  lastGoalMetDate: dayKeySchema.nullable(),
  consecutiveGoalDays: countSchema.default(0),
  lastReachedMilestone: countSchema.nullable(),
  lastCelebratedMilestone: countSchema.nullable(),
  celebratedRunStart: dayKeySchema.nullable().default(null),
  breakBoundary: dayKeySchema.nullable(),
  legacyBadges: z.array(
    z.object({
      streakLength: countSchema,
      achievedStreak: countSchema,
      earnedAt: z.string()
    })
  )
});

const shieldInventorySchema = z.object({
  recurringAvailable: countSchema,
  purchasedAvailable: countSchema,
  lastRecurringRefillPeriod: z
    .string()
    .regex(/^\d{4}-\d{2}$/)
    .nullable(),
  usedThisPeriod: countSchema,
  totalUsedLifetime: countSchema,
  purchasedLifetime: countSchema,
  purchasedConsumedLifetime: countSchema
});

function shieldErrorToAppError(error: ShieldError): AppError {
  if (error.kind === 'insufficient_shields') {
    return new AppError(409, 40901, 'no shields available');
  }
  return new AppError(409, 40902, 'day is not eligible for repair', { reason: error.reason });
}

export function buildServer(options: BuildServerOptions = {}) {
  const config: AppConfig = { ...loadConfig(process.env), ...options.config };
  const storage = options.storage ?? config.storage;
  const databaseUrl = options.databaseUrl ?? config.databaseUrl;
  const logger = options.logger ?? createLogger();
  const startedAt = Date.now();

  const app = Fastify({ logger });
  const store = createStore({ kind: storage, databaseUrl });
  const services = createServices({
    store,
    clock: options.clock ?? new SystemClock(),
    config,
    logger,
    provider: options.provider
  });
  const { steps, streaks, shields, reconciliation, sync, entitlements } = services;

  app.addHook('onReady', async () => {
    await store.init();
    if (options.startScheduler) {
      reconciliation.start();
    }
  });

  app.addHook('onClose', async () => {
    await reconciliation.stop();
    services.ctx.events.removeAllListeners();
    await store.close();
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      if (error.status >= 500) {
        request.log.error({ err: error }, error.message);
      }
      reply.status(error.status).send({
        code: error.code,
        message: error.message,
        details: error.details ?? null
      });
      return;
    }

    if (error instanceof z.ZodError) {
      reply.status(400).send({
        code: 40000,
        message: 'invalid request',
        details: { issues: error.issues }
      });
      return;
    }

    request.log.error({ err: error }, 'unhandled error');
    reply.status(500).send({
      code: 50000,
      message: 'internal server error'
    });
  });

  app.get('/healthz', async () => {
    return {
      code: 0,
      message: 'ok',
      data: { status: 'ok', uptime_sec: Math.floor((Date.now() - startedAt) / 1000) }
    };
  });

  app.get('/readyz', async (_request, reply) => {
    try {
      await store.getMeta('readyz');
    } catch (error) {
      app.log.warn({ err: error }, 'store not reachable');
      reply.status(503);
      return { code: 50300, message: 'store unavailable', data: { status: 'unavailable' } };
    }
    return { code: 0, message: 'ok', data: { status: 'ready' } };
  });

  app.get('/v1/today', async () => {
    const today = await steps.getToday();
    return { code: 0, message: 'ok', data: today };
  });

  app.put('/v1/goal', async (request) => {
    const body = z.object({ steps: z.number().int().positive() }).parse(request.body);
    const today = await steps.setGoal(body.steps);
    return { code: 0, message: 'ok', data: today };
  });

  app.post('/v1/observations', async (request) => {
    const body = z
      .object({
        observations: z
          .array(
            z.object({
              provider: z.string().min(1),
              start_ms: z.number().int().nonnegative().max(MAX_TIMESTAMP_MS),
              end_ms: z.number().int().nonnegative().max(MAX_TIMESTAMP_MS),
              steps: z.number(),
              session_id: z.string().min(1).optional()
            })
          )
          .max(5000)
      })
      .parse(request.body);
    const report = await steps.recordObservations(
      body.observations.map((item) => ({
        provider: item.provider,
        startMs: item.start_ms,
        endMs: item.end_ms,
        steps: item.steps,
        sessionId: item.session_id
      }))
    );
    return {
      code: 0,
      message: 'ok',
      data: {
        received: report.received,
        stored: report.stored,
        dropped: report.dropped.length,
        deferred_dates: report.deferredDates,
        today: report.today
      }
    };
  });

  app.get('/v1/daily-logs/:date', async (request) => {
    const params = z.object({ date: dayKeySchema }).parse(request.params);
    const log = await steps.loadDailyLog(params.date);
    return { code: 0, message: 'ok', data: log ?? null };
  });

  app.get('/v1/daily-logs', async (request) => {
    const query = z.object({ start: dayKeySchema, end: dayKeySchema }).parse(request.query);
    const logs = await steps.loadDailyLogs(query.start, query.end);
    return { code: 0, message: 'ok', data: { items: logs } };
  });

  app.get('/v1/streak', async () => {
    const streak = await streaks.getStreak();
    return { code: 0, message: 'ok', data: streak };
  });

  app.post('/v1/streak/milestone/consume', async () => {
    const milestone = await streaks.consumeMilestone();
    return { code: 0, message: 'ok', data: { milestone } };
  });

  app.get('/v1/shields', async () => {
    const inventory = await shields.getShields();
    return { code: 0, message: 'ok', data: inventory };
  });

  app.post('/v1/shields/purchase', async (request) => {
    const body = z.object({ count: z.number().int().positive().max(100) }).parse(request.body);
    const inventory = await shields.purchase(body.count);
    return { code: 0, message: 'ok', data: inventory };
  });

  app.post('/v1/shields/repair', async (request) => {
    const body = z.object({ date: dayKeySchema }).parse(request.body);
    const result = await shields.requestRepair(body.date);
    if (!result.ok) {
      throw shieldErrorToAppError(result.error);
    }
    return { code: 0, message: 'ok', data: result.value };
  });

  app.post('/v1/shields/decline', async (request) => {
    const body = z.object({ date: dayKeySchema }).parse(request.body);
    const result = await shields.declineRepair(body.date);
    if (!result.ok) {
      throw shieldErrorToAppError(result.error);
    }
    return { code: 0, message: 'ok', data: { streak: result.value } };
  });

  app.post('/v1/shields/auto-protect', async () => {
    const report = await shields.autoProtectMissedDays();
    return { code: 0, message: 'ok', data: report };
  });

  app.post('/v1/reconcile', async (request) => {
    const body = z
      .object({ trigger: z.enum(['scheduled', 'foreground', 'manual']).default('manual') })
      .parse(request.body ?? {});
    const result = await reconciliation.runIfDue(body.trigger);
    return { code: 0, message: 'ok', data: result };
  });

  app.post('/v1/sync/daily-logs', async (request) => {
    const body = z.object({ logs: z.array(dailyLogSchema).max(1000) }).parse(request.body);
    const report = await sync.mergeDailyLogs(body.logs);
    return { code: 0, message: 'ok', data: report };
  });

  app.post('/v1/sync/state', async (request) => {
    const body = z
      .object({
        streak: streakStateSchema.optional(),
        shields: shieldInventorySchema.optional()
      })
      .parse(request.body);
    const merged = await sync.mergeState(body);
    return { code: 0, message: 'ok', data: merged };
  });

  app.get('/v1/sync/export', async () => {
    const snapshot = await sync.exportState();
    return { code: 0, message: 'ok', data: snapshot };
  });

  app.get('/v1/entitlement', async () => {
    const entitlement = await entitlements.getEntitlement();
    const policy = await entitlements.getPolicy();
    return { code: 0, message: 'ok', data: { ...entitlement, effective_tier: policy.tier, policy } };
  });

  app.put('/v1/entitlement', async (request) => {
    const body = z
      .object({
        tier: z.enum(['free', 'pro']),
        expires_at: z.string().datetime().optional()
      })
      .parse(request.body);
    const entitlement = await entitlements.setEntitlement({ tier: body.tier, expiresAt: body.expires_at });
    await shields.refillCheck();
    return { code: 0, message: 'ok', data: entitlement };
  });

  return app;
}
