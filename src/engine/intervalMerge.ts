import type { DayBounds, StepObservation } from '../types';

export type DropReason = 'malformed_interval' | 'out_of_range' | 'invalid_steps' | 'outside_day';

/** Keeps day keys at four-digit years. */
export const MAX_TIMESTAMP_MS = Date.UTC(9999, 11, 31);
export const MAX_OBSERVATION_SPAN_MS = 7 * 24 * 60 * 60 * 1000;

export interface DroppedObservation {
  observation: StepObservation;
  reason: DropReason;
}

export interface MergeResult {
  steps: number;
  byProvider: Record<string, number>;
  contributingSessionIds: string[];
  dropped: DroppedObservation[];
}

interface Piece {
  startMs: number;
  endMs: number;
  steps: number;
  sessionId?: string;
}

type Span = [number, number];

/**
 * Providers listed in `precedence` come first, in list order. Anything else
 * follows alphabetically so unknown sources still resolve deterministically.
 */
export function orderProviders(providers: Iterable<string>, precedence: string[]): string[] {
  const rank = (name: string) => {
    const index = precedence.indexOf(name);
    return index === -1 ? Number.POSITIVE_INFINITY : index;
  };
  return [...new Set(providers)].sort((a, b) => {
    const ra = rank(a);
    const rb = rank(b);
    if (ra !== rb) {
      return ra < rb ? -1 : 1;
    }
    return a < b ? -1 : a > b ? 1 : 0;
  });
}

function comparePieces(a: Piece, b: Piece): number {
  return (
    a.endMs - b.endMs ||
    a.startMs - b.startMs ||
    a.steps - b.steps ||
    (a.sessionId ?? '').localeCompare(b.sessionId ?? '')
  );
}

function prorate(piece: Piece, startMs: number, endMs: number): Piece {
  const share = (endMs - startMs) / (piece.endMs - piece.startMs);
  return { startMs, endMs, steps: piece.steps * share, sessionId: piece.sessionId };
}

export function checkObservation(observation: StepObservation): DropReason | null {
  const { startMs, endMs, steps } = observation;
  if (!Number.isFinite(startMs) || !Number.isFinite(endMs) || endMs <= startMs) {
    return 'malformed_interval';
  }
  if (startMs < 0 || endMs > MAX_TIMESTAMP_MS || endMs - startMs > MAX_OBSERVATION_SPAN_MS) {
    return 'out_of_range';
  }
  if (!Number.isFinite(steps) || steps < 0) {
    return 'invalid_steps';
  }
  return null;
}

/** Parts of `piece` not inside `covered` (sorted, disjoint), steps prorated by time. */
function uncoveredParts(piece: Piece, covered: Span[]): Piece[] {
  const parts: Piece[] = [];
  let cursor = piece.startMs;
  for (const [start, end] of covered) {
    if (end <= cursor) {
      continue;
    }
    if (start >= piece.endMs) {
      break;
    }
    if (start > cursor) {
      parts.push(prorate(piece, cursor, start));
    }
    cursor = Math.max(cursor, end);
    if (cursor >= piece.endMs) {
      break;
    }
  }
  if (cursor < piece.endMs) {
    parts.push(cursor === piece.startMs ? piece : prorate(piece, cursor, piece.endMs));
  }
  return parts;
}

function addCoverage(covered: Span[], pieces: Piece[]): Span[] {
  const spans: Span[] = [...covered, ...pieces.map((p): Span => [p.startMs, p.endMs])].sort(
    (a, b) => a[0] - b[0] || a[1] - b[1]
  );
  const merged: Span[] = [];
  for (const span of spans) {
    const last = merged[merged.length - 1];
    if (last && span[0] <= last[1]) {
      last[1] = Math.max(last[1], span[1]);
    } else {
      merged.push([span[0], span[1]]);
    }
  }
  return merged;
}

/**
 * Heaviest set of pairwise non-overlapping pieces. Half-open intervals that
 * merely touch are compatible, so back-to-back samples add up while re-issued
 * or overlapping reports of the same stretch of time count once.
 */
export function selectNonOverlapping<T extends Piece>(input: T[]): T[] {
  const pieces = input.slice().sort(comparePieces);
  const ends = pieces.map((piece) => piece.endMs);
  const best: number[] = [0];
  const previous: number[] = [0];

  for (let i = 1; i <= pieces.length; i += 1) {
    const piece = pieces[i - 1];
    let lo = 0;
    let hi = i - 1;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      if (ends[mid] <= piece.startMs) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    previous.push(lo);
    best.push(Math.max(best[i - 1], piece.steps + best[lo]));
  }

  const selected: T[] = [];
  let i = pieces.length;
  while (i > 0) {
    const piece = pieces[i - 1];
    if (piece.steps + best[previous[i]] > best[i - 1]) {
      selected.push(piece);
      i = previous[i];
    } else {
      i -= 1;
    }
  }
  return selected.reverse();
}

export function mergeObservations(
  observations: StepObservation[],
  bounds: DayBounds,
  precedence: string[]
): MergeResult {
  const dropped: DroppedObservation[] = [];
  const byProviderPieces = new Map<string, Piece[]>();

  for (const observation of observations) {
    const reason = checkObservation(observation);
    if (reason) {
      dropped.push({ observation, reason });
      continue;
    }
    const startMs = Math.max(observation.startMs, bounds.startMs);
    const endMs = Math.min(observation.endMs, bounds.endMs);
    if (endMs <= startMs) {
      dropped.push({ observation, reason: 'outside_day' });
      continue;
    }
    const piece = prorate(observation, startMs, endMs);
    const list = byProviderPieces.get(observation.provider) ?? [];
    list.push(piece);
    byProviderPieces.set(observation.provider, list);
  }

  let covered: Span[] = [];
  let total = 0;
  const byProvider: Record<string, number> = {};
  const sessionIds = new Set<string>();

  for (const provider of orderProviders(byProviderPieces.keys(), precedence)) {
    const candidates = (byProviderPieces.get(provider) ?? [])
      .slice()
      .sort(comparePieces)
      .flatMap((piece) => uncoveredParts(piece, covered));
    const selected = selectNonOverlapping(candidates).sort(
      (a, b) => a.startMs - b.startMs || comparePieces(a, b)
    );
    const providerSteps = selected.reduce((sum, piece) => sum + piece.steps, 0);
    byProvider[provider] = Math.round(providerSteps);
    total += providerSteps;
    selected.forEach((piece) => {
      if (piece.sessionId && piece.steps > 0) {
        sessionIds.add(piece.sessionId);
      }
    });
    covered = addCoverage(covered, selected);
  }

  return {
    steps: Math.round(total),
    byProvider,
    contributingSessionIds: [...sessionIds].sort(),
    dropped
  };
}

export function merge(
  observations: StepObservation[],
  bounds: DayBounds,
  precedence: string[]
): number {
  return mergeObservations(observations, bounds, precedence).steps;
}
