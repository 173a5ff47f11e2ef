import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from 'pg';
import { z } from 'zod';
import type {
  DailyLog,
  DayKey,
  Entitlement,
  GoalChange,
  ShieldInventory,
  StepObservation,
  StreakState
} from './types';

export type StoreKind = 'memory' | 'postgres';

export interface DataStore {
  init(): Promise<void>;
  close(): Promise<void>;

  /** Runs `work` so that all of its writes commit together or not at all. */
  transaction<T>(work: (tx: DataStore) => Promise<T>): Promise<T>;

  getDailyLog(date: DayKey): Promise<DailyLog | undefined>;
  listDailyLogs(startDate: DayKey, endDate: DayKey): Promise<DailyLog[]>;
  upsertDailyLog(log: DailyLog): Promise<void>;
  finalizeDailyLogsBefore(date: DayKey, updatedAt: string): Promise<DayKey[]>;

  getHighWaterMark(date: DayKey): Promise<number | undefined>;
  upsertHighWaterMark(date: DayKey, steps: number): Promise<void>;

  appendObservations(observations: StepObservation[]): Promise<number>;
  listObservations(startMs: number, endMs: number): Promise<StepObservation[]>;

  listGoalChanges(): Promise<GoalChange[]>;
  upsertGoalChange(change: GoalChange): Promise<void>;

  getStreakState(): Promise<StreakState | undefined>;
  saveStreakState(state: StreakState): Promise<void>;

  getShieldInventory(): Promise<ShieldInventory | undefined>;
  saveShieldInventory(inventory: ShieldInventory): Promise<void>;

  getEntitlement(): Promise<Entitlement | undefined>;
  upsertEntitlement(entitlement: Entitlement): Promise<void>;

  getMeta(key: string): Promise<string | undefined>;
  setMeta(key: string, value: string): Promise<void>;
}

function observationKey(observation: StepObservation): string {
  return [
    observation.provider,
    observation.startMs,
    observation.endMs,
    observation.steps,
    observation.sessionId ?? ''
  ].join('|');
}

export interface MemoryState {
  dailyLogs: Map<DayKey, DailyLog>;
  highWaterMarks: Map<DayKey, number>;
  observations: Map<string, StepObservation>;
  goalChanges: Map<DayKey, GoalChange>;
  streak?: StreakState;
  shields?: ShieldInventory;
  entitlement?: Entitlement;
  meta: Map<string, string>;
}

type UndoStep = () => void;

function emptyMemoryState(): MemoryState {
  return {
    dailyLogs: new Map(),
    highWaterMarks: new Map(),
    observations: new Map(),
    goalChanges: new Map(),
    meta: new Map()
  };
}

/**
 * Each transaction writes through a handle with its own undo journal, so a
 * rollback reverts that transaction's writes and nothing else.
 */
export class InMemoryStore implements DataStore {
  constructor(
    private readonly state: MemoryState = emptyMemoryState(),
    private readonly journal?: UndoStep[]
  ) {}

  async init(): Promise<void> {}

  async close(): Promise<void> {}

  async transaction<T>(work: (tx: DataStore) => Promise<T>): Promise<T> {
    if (this.journal) {
      return work(this);
    }
    const journal: UndoStep[] = [];
    try {
      return await work(new InMemoryStore(this.state, journal));
    } catch (error) {
      journal.reverse().forEach((undo) => undo());
      throw error;
    }
  }

  private rememberEntry<K, V>(map: Map<K, V>, key: K): void {
    if (!this.journal) {
      return;
    }
    const previous = map.get(key);
    this.journal.push(() => {
      if (previous !== undefined) {
        map.set(key, previous);
      } else {
        map.delete(key);
      }
    });
  }

  private rememberField<K extends 'streak' | 'shields' | 'entitlement'>(field: K): void {
    if (!this.journal) {
      return;
    }
    const previous = this.state[field];
    this.journal.push(() => {
      this.state[field] = previous;
    });
  }

  async getDailyLog(date: DayKey): Promise<DailyLog | undefined> {
    const log = this.state.dailyLogs.get(date);
    return log ? structuredClone(log) : undefined;
  }

  async listDailyLogs(startDate: DayKey, endDate: DayKey): Promise<DailyLog[]> {
    return [...this.state.dailyLogs.values()]
      .filter((log) => log.date >= startDate && log.date <= endDate)
      .sort((a, b) => (a.date < b.date ? -1 : 1))
      .map((log) => structuredClone(log));
  }

  async upsertDailyLog(log: DailyLog): Promise<void> {
    this.rememberEntry(this.state.dailyLogs, log.date);
    this.state.dailyLogs.set(log.date, structuredClone(log));
  }

  async finalizeDailyLogsBefore(date: DayKey, updatedAt: string): Promise<DayKey[]> {
    const open = [...this.state.dailyLogs.values()].filter((log) => log.state === 'open' && log.date < date);
    open.forEach((log) => {
      this.rememberEntry(this.state.dailyLogs, log.date);
      this.state.dailyLogs.set(log.date, { ...log, state: 'finalized', updatedAt });
    });
    return open.map((log) => log.date).sort();
  }

  async getHighWaterMark(date: DayKey): Promise<number | undefined> {
    return this.state.highWaterMarks.get(date);
  }

  async upsertHighWaterMark(date: DayKey, steps: number): Promise<void> {
    this.rememberEntry(this.state.highWaterMarks, date);
    this.state.highWaterMarks.set(date, steps);
  }

  async appendObservations(observations: StepObservation[]): Promise<number> {
    let inserted = 0;
    observations.forEach((observation) => {
      const key = observationKey(observation);
      if (!this.state.observations.has(key)) {
        this.rememberEntry(this.state.observations, key);
        this.state.observations.set(key, { ...observation });
        inserted += 1;
      }
    });
    return inserted;
  }

  async listObservations(startMs: number, endMs: number): Promise<StepObservation[]> {
    return [...this.state.observations.values()]
      .filter((item) => item.startMs < endMs && item.endMs > startMs)
      .map((item) => ({ ...item }));
  }

  async listGoalChanges(): Promise<GoalChange[]> {
    return [...this.state.goalChanges.values()]
      .sort((a, b) => (a.effectiveFrom < b.effectiveFrom ? -1 : 1))
      .map((change) => ({ ...change }));
  }

  async upsertGoalChange(change: GoalChange): Promise<void> {
    this.rememberEntry(this.state.goalChanges, change.effectiveFrom);
    this.state.goalChanges.set(change.effectiveFrom, { ...change });
  }

  async getStreakState(): Promise<StreakState | undefined> {
    return this.state.streak ? structuredClone(this.state.streak) : undefined;
  }

  async saveStreakState(state: StreakState): Promise<void> {
    this.rememberField('streak');
    this.state.streak = structuredClone(state);
  }

  async getShieldInventory(): Promise<ShieldInventory | undefined> {
    return this.state.shields ? { ...this.state.shields } : undefined;
  }

  async saveShieldInventory(inventory: ShieldInventory): Promise<void> {
    this.rememberField('shields');
    this.state.shields = { ...inventory };
  }

  async getEntitlement(): Promise<Entitlement | undefined> {
    return this.state.entitlement ? { ...this.state.entitlement } : undefined;
  }

  async upsertEntitlement(entitlement: Entitlement): Promise<void> {
    this.rememberField('entitlement');
    this.state.entitlement = { ...entitlement };
  }

  async getMeta(key: string): Promise<string | undefined> {
    return this.state.meta.get(key);
  }

  async setMeta(key: string, value: string): Promise<void> {
    this.rememberEntry(this.state.meta, key);
    this.state.meta.set(key, value);
  }
}

const SessionIdsSchema = z.array(z.string());
const LegacyBadgesSchema = z.array(
  z.object({
    streakLength: z.number().int(),
    achievedStreak: z.number().int(),
    earnedAt: z.string()
  })
);

/** JSONB comes back parsed from pg, but older rows may hold a JSON string. */
function parseJsonColumn<T>(schema: z.ZodType<T>, value: unknown): T | undefined {
  let input = value;
  if (typeof value === 'string') {
    try {
      input = JSON.parse(value);
    } catch {
      return undefined;
    }
  }
  const parsed = schema.safeParse(input);
  return parsed.success ? parsed.data : undefined;
}

interface DailyLogRow extends QueryResultRow {
  date: string;
  steps: number;
  goal_target: number;
  goal_met: boolean;
  shield_used: boolean;
  session_ids: unknown;
  state: DailyLog['state'];
  updated_at: Date;
}

interface ObservationRow extends QueryResultRow {
  provider: string;
  start_ms: string;
  end_ms: string;
  steps: number;
  session_id: string;
}

interface StreakRow extends QueryResultRow {
  current_streak: number;
  longest_streak: number;
  streak_start_date: string | null;
  last_goal_met_date: string | null;
  consecutive_goal_days: number;
  last_reached_milestone: number | null;
  last_celebrated_milestone: number | null;
  celebrated_run_start: string | null;
  break_boundary: string | null;
  legacy_badges: unknown;
}

interface ShieldRow extends QueryResultRow {
  recurring_available: number;
  purchased_available: number;
  last_recurring_refill_period: string | null;
  used_this_period: number;
  total_used_lifetime: number;
  purchased_lifetime: number;
  purchased_consumed_lifetime: number;
}

function toDailyLog(row: DailyLogRow): DailyLog {
  return {
    date: row.date,
    steps: Number(row.steps),
    goalTarget: Number(row.goal_target),
    goalMet: row.goal_met,
    shieldUsed: row.shield_used,
    contributingSessionIds: parseJsonColumn(SessionIdsSchema, row.session_ids) ?? [],
    state: row.state,
    updatedAt: row.updated_at.toISOString()
  };
}

export class PostgresStore implements DataStore {
  constructor(
    private readonly pool: Pool,
    private readonly client?: PoolClient
  ) {}

  private query<R extends QueryResultRow>(
    text: string,
    values: unknown[] = []
  ): Promise<QueryResult<R>> {
    if (this.client) {
      return this.client.query<R>(text, values);
    }
    return this.pool.query<R>(text, values);
  }

  async init(): Promise<void> {
    await this.query(`
      CREATE TABLE IF NOT EXISTS daily_logs (
        date TEXT PRIMARY KEY,
        steps INT NOT NULL CHECK (steps >= 0),
        goal_target INT NOT NULL,
        goal_met BOOLEAN NOT NULL,
        shield_used BOOLEAN NOT NULL,
        session_ids JSONB NOT NULL,
        state TEXT NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL
      );

      CREATE TABLE IF NOT EXISTS high_water_marks (
        date TEXT PRIMARY KEY,
        steps INT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS step_observations (
        id BIGSERIAL PRIMARY KEY,
        provider TEXT NOT NULL,
        start_ms BIGINT NOT NULL,
        end_ms BIGINT NOT NULL,
        steps INT NOT NULL,
        session_id TEXT NOT NULL DEFAULT '',
        UNIQUE(provider, start_ms, end_ms, steps, session_id)
      );
      CREATE INDEX IF NOT EXISTS idx_step_observations_span ON step_observations(start_ms, end_ms);

      CREATE TABLE IF NOT EXISTS goal_changes (
        effective_from TEXT PRIMARY KEY,
        steps INT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS streak_state (
        id INT PRIMARY KEY CHECK (id = 1),
        current_streak INT NOT NULL,
        longest_streak INT NOT NULL,
        streak_start_date TEXT,
        last_goal_met_date TEXT,
        consecutive_goal_days INT NOT NULL DEFAULT 0,
        last_reached_milestone INT,
        last_celebrated_milestone INT,
        celebrated_run_start TEXT,
        break_boundary TEXT,
        legacy_badges JSONB NOT NULL
      );
      ALTER TABLE streak_state ADD COLUMN IF NOT EXISTS consecutive_goal_days INT NOT NULL DEFAULT 0;
      ALTER TABLE streak_state ADD COLUMN IF NOT EXISTS celebrated_run_start TEXT;

      CREATE TABLE IF NOT EXISTS shield_inventory (
        id INT PRIMARY KEY CHECK (id = 1),
        recurring_available INT NOT NULL,
        purchased_available INT NOT NULL,
        last_recurring_refill_period TEXT,
        used_this_period INT NOT NULL,
        total_used_lifetime INT NOT NULL,
        purchased_lifetime INT NOT NULL,
        purchased_consumed_lifetime INT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS entitlement (
        id INT PRIMARY KEY CHECK (id = 1),
        tier TEXT NOT NULL,
        expires_at TIMESTAMPTZ
      );

      CREATE TABLE IF NOT EXISTS app_meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );
    `);
  }

  async close(): Promise<void> {
    if (!this.client) {
      await this.pool.end();
    }
  }

  async transaction<T>(work: (tx: DataStore) => Promise<T>): Promise<T> {
    if (this.client) {
      return work(this);
    }
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work(new PostgresStore(this.pool, client));
      await client.query('COMMIT');
      return result;
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    } finally {
      client.release();
    }
  }

  async getDailyLog(date: DayKey): Promise<DailyLog | undefined> {
    const { rows } = await this.query<DailyLogRow>('SELECT * FROM daily_logs WHERE date = $1', [
      date
    ]);
    const row = rows[0];
    return row ? toDailyLog(row) : undefined;
  }

  async listDailyLogs(startDate: DayKey, endDate: DayKey): Promise<DailyLog[]> {
    const { rows } = await this.query<DailyLogRow>(
      'SELECT * FROM daily_logs WHERE date >= $1 AND date <= $2 ORDER BY date ASC',
      [startDate, endDate]
    );
    return rows.map(toDailyLog);
  }

  async upsertDailyLog(log: DailyLog): Promise<void> {
    await this.query(
      `INSERT INTO daily_logs(date, steps, goal_target, goal_met, shield_used, session_ids, state, updated_at)
       VALUES ($1,$2,$3,$4,$5,$6::jsonb,$7,$8)
       ON CONFLICT (date)
       DO UPDATE SET steps = EXCLUDED.steps,
                     goal_target = EXCLUDED.goal_target,
                     goal_met = EXCLUDED.goal_met,
                     shield_used = EXCLUDED.shield_used,
                     session_ids = EXCLUDED.session_ids,
                     state = EXCLUDED.state,
                     updated_at = EXCLUDED.updated_at`,
      [
        log.date,
        log.steps,
        log.goalTarget,
        log.goalMet,
        log.shieldUsed,
        JSON.stringify(log.contributingSessionIds),
        log.state,
        log.updatedAt
      ]
    );
  }

  async finalizeDailyLogsBefore(date: DayKey, updatedAt: string): Promise<DayKey[]> {
    const { rows } = await this.query<{ date: string }>(
      `UPDATE daily_logs SET state = 'finalized', updated_at = $2
       WHERE state = 'open' AND date < $1
       RETURNING date`,
      [date, updatedAt]
    );
    return rows.map((row) => row.date).sort();
  }

  async getHighWaterMark(date: DayKey): Promise<number | undefined> {
    const { rows } = await this.query<{ steps: number }>(
      'SELECT steps FROM high_water_marks WHERE date = $1',
      [date]
    );
    const row = rows[0];
    return row ? Number(row.steps) : undefined;
  }

  async upsertHighWaterMark(date: DayKey, steps: number): Promise<void> {
    await this.query(
      `INSERT INTO high_water_marks(date, steps)
       VALUES ($1,$2)
       ON CONFLICT (date)
       DO UPDATE SET steps = GREATEST(high_water_marks.steps, EXCLUDED.steps)`,
      [date, steps]
    );
  }

  async appendObservations(observations: StepObservation[]): Promise<number> {
    let inserted = 0;
    for (const observation of observations) {
      const result = await this.query(
        `INSERT INTO step_observations(provider, start_ms, end_ms, steps, session_id)
         VALUES ($1,$2,$3,$4,$5)
         ON CONFLICT DO NOTHING`,
        [
          observation.provider,
          observation.startMs,
          observation.endMs,
          observation.steps,
          observation.sessionId ?? ''
        ]
      );
      inserted += result.rowCount ?? 0;
    }
    return inserted;
  }

  async listObservations(startMs: number, endMs: number): Promise<StepObservation[]> {
    const { rows } = await this.query<ObservationRow>(
      `SELECT provider, start_ms, end_ms, steps, session_id FROM step_observations
       WHERE start_ms < $2 AND end_ms > $1
       ORDER BY start_ms ASC, id ASC`,
      [startMs, endMs]
    );
    return rows.map((row) => ({
      provider: row.provider,
      startMs: Number(row.start_ms),
      endMs: Number(row.end_ms),
      steps: Number(row.steps),
      sessionId: row.session_id || undefined
    }));
  }

  async listGoalChanges(): Promise<GoalChange[]> {
    const { rows } = await this.query<{ effective_from: string; steps: number }>(
      'SELECT effective_from, steps FROM goal_changes ORDER BY effective_from ASC'
    );
    return rows.map((row) => ({ effectiveFrom: row.effective_from, steps: Number(row.steps) }));
  }

  async upsertGoalChange(change: GoalChange): Promise<void> {
    await this.query(
      `INSERT INTO goal_changes(effective_from, steps)
       VALUES ($1,$2)
       ON CONFLICT (effective_from)
       DO UPDATE SET steps = EXCLUDED.steps`,
      [change.effectiveFrom, change.steps]
    );
  }

  async getStreakState(): Promise<StreakState | undefined> {
    const { rows } = await this.query<StreakRow>('SELECT * FROM streak_state WHERE id = 1');
    const row = rows[0];
    if (!row) {
      return undefined;
    }
    return {
      currentStreak: Number(row.current_streak),
      longestStreak: Number(row.longest_streak),
      streakStartDate: row.streak_start_date,
      lastGoalMetDate: row.last_goal_met_date,
      consecutiveGoalDays: Number(row.consecutive_goal_days),
      lastReachedMilestone: row.last_reached_milestone,
      lastCelebratedMilestone: row.last_celebrated_milestone,
      celebratedRunStart: row.celebrated_run_start,
      breakBoundary: row.break_boundary,
      legacyBadges: parseJsonColumn(LegacyBadgesSchema, row.legacy_badges) ?? []
    };
  }

  async saveStreakState(state: StreakState): Promise<void> {
    await this.query(
      `INSERT INTO streak_state(id, current_streak, longest_streak, streak_start_date, last_goal_met_date,
                                consecutive_goal_days, last_reached_milestone, last_celebrated_milestone,
                                celebrated_run_start, break_boundary, legacy_badges)
       VALUES (1,$1,$2,$3,$4,$5,$6,$7,$8,$9,$10::jsonb)
       ON CONFLICT (id)
       DO UPDATE SET current_streak = EXCLUDED.current_streak,
                     longest_streak = EXCLUDED.longest_streak,
                     streak_start_date = EXCLUDED.streak_start_date,
                     last_goal_met_date = EXCLUDED.last_goal_met_date,
                     consecutive_goal_days = EXCLUDED.consecutive_goal_days,
                     last_reached_milestone = EXCLUDED.last_reached_milestone,
                     last_celebrated_milestone = EXCLUDED.last_celebrated_milestone,
                     celebrated_run_start = EXCLUDED.celebrated_run_start,
                     break_boundary = EXCLUDED.break_boundary,
                     legacy_badges = EXCLUDED.legacy_badges`,
      [
        state.currentStreak,
        state.longestStreak,
        state.streakStartDate,
        state.lastGoalMetDate,
        state.consecutiveGoalDays,
        state.lastReachedMilestone,
        state.lastCelebratedMilestone,
        state.celebratedRunStart,
        state.breakBoundary,
        JSON.stringify(state.legacyBadges)
      ]
    );
  }

  async getShieldInventory(): Promise<ShieldInventory | undefined> {
    const { rows } = await this.query<ShieldRow>('SELECT * FROM shield_inventory WHERE id = 1');
    const row = rows[0];
    if (!row) {
      return undefined;
    }
    return {
      recurringAvailable: Number(row.recurring_available),
      purchasedAvailable: Number(row.purchased_available),
      lastRecurringRefillPeriod: row.last_recurring_refill_period,
      usedThisPeriod: Number(row.used_this_period),
      totalUsedLifetime: Number(row.total_used_lifetime),
      purchasedLifetime: Number(row.purchased_lifetime),
      purchasedConsumedLifetime: Number(row.purchased_consumed_lifetime)
    };
  }

  async saveShieldInventory(inventory: ShieldInventory): Promise<void> {
    await this.query(
      `INSERT INTO shield_inventory(id, recurring_available, purchased_available, last_recurring_refill_period,
                                    used_this_period, total_used_lifetime, purchased_lifetime, purchased_consumed_lifetime)
       VALUES (1,$1,$2,$3,$4,$5,$6,$7)
       ON CONFLICT (id)
       DO UPDATE SET recurring_available = EXCLUDED.recurring_available,
                     purchased_available = EXCLUDED.purchased_available,
                     last_recurring_refill_period = EXCLUDED.last_recurring_refill_period,
                     used_this_period = EXCLUDED.used_this_period,
                     total_used_lifetime = EXCLUDED.total_used_lifetime,
                     purchased_lifetime = EXCLUDED.purchased_lifetime,
                     purchased_consumed_lifetime = EXCLUDED.purchased_consumed_lifetime`,
      [
        inventory.recurringAvailable,
        inventory.purchasedAvailable,
        inventory.lastRecurringRefillPeriod,
        inventory.usedThisPeriod,
        inventory.totalUsedLifetime,
        inventory.purchasedLifetime,
        inventory.purchasedConsumedLifetime
      ]
    );
  }

  async getEntitlement(): Promise<Entitlement | undefined> {
    const { rows } = await this.query<{ tier: Entitlement['tier']; expires_at: Date | null }>(
      'SELECT tier, expires_at FROM entitlement WHERE id = 1'
    );
    const row = rows[0];
    if (!row) {
      return undefined;
    }
    return {
      tier: row.tier,
      expiresAt: row.expires_at ? row.expires_at.toISOString() : undefined
    };
  }

  async upsertEntitlement(entitlement: Entitlement): Promise<void> {
    await this.query(
      `INSERT INTO entitlement(id, tier, expires_at)
       VALUES (1,$1,$2)
       ON CONFLICT (id)
       DO UPDATE SET tier = EXCLUDED.tier,
                     expires_at = EXCLUDED.expires_at`,
      [entitlement.tier, entitlement.expiresAt ?? null]
    );
  }

  async getMeta(key: string): Promise<string | undefined> {
    const { rows } = await this.query<{ value: string }>(
      'SELECT value FROM app_meta WHERE key = $1',
      [key]
    );
    return rows[0]?.value;
  }

  async setMeta(key: string, value: string): Promise<void> {
    await this.query(
      `INSERT INTO app_meta(key, value)
       VALUES ($1,$2)
       ON CONFLICT (key)
       DO UPDATE SET value = EXCLUDED.value`,
      [key, value]
    );
  }
}

export function createStore(params: { kind: StoreKind; databaseUrl?: string }): DataStore {
  if (params.kind === 'memory') {
    return new InMemoryStore();
  }
  if (!params.databaseUrl) {
    throw new Error('DATABASE_URL is required when using postgres store');
  }
  return new PostgresStore(new Pool({ connectionString: params.databaseUrl }));
}
