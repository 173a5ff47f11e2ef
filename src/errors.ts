export class AppError extends Error {
  status: number;
  code: number;
  details?: Record<string, unknown>;

  constructor(status: number, code: number, message: string, details?: Record<string, unknown>) {
    super(message);
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

/**
 * Persistence handed back a value that breaks an aggregate invariant.
 * The operation that read it is rejected; the stored value is left alone.
 */
export class CorruptedAggregateError extends AppError {
  readonly aggregate: string;

  constructor(aggregate: string, problems: string[]) {
    super(500, 50010, `corrupted ${aggregate} aggregate`, { aggregate, problems });
    this.name = 'CorruptedAggregateError';
    this.aggregate = aggregate;
  }
}

export class ObservationFetchFailure extends Error {
  readonly days: string[];

  constructor(days: string[], cause?: unknown) {
    super(`failed to fetch observations for ${days.join(', ')}`, { cause });
    this.name = 'ObservationFetchFailure';
    this.days = days;
  }
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export type RepairIneligibleReason =
  | 'outside_window'
  | 'day_open'
  | 'already_met'
  | 'already_shielded'
  | 'declined';

export type ShieldError =
  | { kind: 'insufficient_shields' }
  | { kind: 'repair_ineligible'; reason: RepairIneligibleReason };
