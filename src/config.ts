import { z } from 'zod';
import { isValidTimeZone } from './calendar';
import type { StoreKind } from './store';
import type { ConsumptionOrder } from './types';

export const DEFAULT_PROVIDER_PRECEDENCE = ['health_store', 'motion_sensor', 'cloud_sync'];

const intFrom = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((s) => (s && s.trim() ? Number(s) : fallback))
    .pipe(z.number().int().positive());

const EnvSchema = z.object({
  STORAGE_DRIVER: z.enum(['memory', 'postgres']).optional(),
  DATABASE_URL: z.string().optional(),
  PORT: intFrom(3000),
  TIME_ZONE: z
    .string()
    .optional()
    .transform((s) => (s && s.trim() ? s.trim() : 'UTC'))
    .refine(isValidTimeZone, 'TIME_ZONE must be an IANA time zone'),
  DEFAULT_DAILY_GOAL: intFrom(10_000),
  RECONCILE_INTERVAL_MINUTES: intFrom(240),
  RECONCILE_FOREGROUND_MINUTES: intFrom(15),
  SHIELD_CONSUMPTION_ORDER: z.enum(['purchased-first', 'recurring-first']).default('purchased-first'),
  PROVIDER_PRECEDENCE: z
    .string()
    .optional()
    .transform((s) =>
      s && s.trim()
        ? s
            .split(',')
            .map((item) => item.trim())
            .filter((item) => item.length > 0)
        : DEFAULT_PROVIDER_PRECEDENCE
    ),
  AUTO_PROTECT_MISSED_DAYS: z
    .string()
    .optional()
    .transform((s) => s === '1' || s === 'true')
});

export interface AppConfig {
  storage: StoreKind;
  databaseUrl?: string;
  port: number;
  timeZone: string;
  defaultDailyGoal: number;
  reconcileIntervalMs: number;
  reconcileForegroundIntervalMs: number;
  consumptionOrder: ConsumptionOrder;
  providerPrecedence: string[];
  autoProtectMissedDays: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);
  return {
    storage: parsed.STORAGE_DRIVER ?? 'postgres',
    databaseUrl: parsed.DATABASE_URL,
    port: parsed.PORT,
    timeZone: parsed.TIME_ZONE,
    defaultDailyGoal: parsed.DEFAULT_DAILY_GOAL,
    reconcileIntervalMs: parsed.RECONCILE_INTERVAL_MINUTES * 60_000,
    reconcileForegroundIntervalMs: parsed.RECONCILE_FOREGROUND_MINUTES * 60_000,
    consumptionOrder: parsed.SHIELD_CONSUMPTION_ORDER,
    providerPrecedence: parsed.PROVIDER_PRECEDENCE,
    autoProtectMissedDays: parsed.AUTO_PROTECT_MISSED_DAYS
  };
}
