import type { DayBounds, DayKey } from './types';
import { addDays } from './utils';

const TRANSITION_SEARCH_MS = 6 * 60 * 60 * 1000;

export interface Clock {
  now(): Date;
}

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }
}

/** Manually advanced clock for tests and replay tooling. */
export class FixedClock implements Clock {
  private current: number;

  constructor(start: Date | string | number) {
    this.current = new Date(start).getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  set(next: Date | string | number): void {
    this.current = new Date(next).getTime();
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Maps instants onto local calendar days for one IANA time zone.
 * All day arithmetic elsewhere works on `DayKey` strings.
 */
export class LocalCalendar {
  private readonly formatter: Intl.DateTimeFormat;

  constructor(
    readonly timeZone: string,
    private readonly clock: Clock
  ) {
    this.formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit'
    });
  }

  nowMs(): number {
    return this.clock.now().getTime();
  }

  today(): DayKey {
    return this.dayKey(this.nowMs());
  }

  yesterday(): DayKey {
    return addDays(this.today(), -1);
  }

  dayKey(instant: number): DayKey {
    return new Date(instant + this.offsetMs(instant)).toISOString().slice(0, 10);
  }

  /** Local hour (0-23) at `instant`. */
  hourAt(instant: number): number {
    return new Date(instant + this.offsetMs(instant)).getUTCHours();
  }

  /**
   * First instant whose local date is `day`. Where a DST jump skips local
   * midnight the day starts at the transition instead.
   */
  startOfDay(day: DayKey): number {
    const utcMidnight = Date.parse(`${day}T00:00:00.000Z`);
    const guess = utcMidnight - this.offsetMs(utcMidnight);
    const candidate = utcMidnight - this.offsetMs(guess);
    if (this.dayKey(candidate) === day && this.dayKey(candidate - 1) < day) {
      return candidate;
    }
    let before = candidate - TRANSITION_SEARCH_MS;
    let after = candidate + TRANSITION_SEARCH_MS;
    while (after - before > 1) {
      const mid = Math.floor((before + after) / 2);
      if (this.dayKey(mid) >= day) {
        after = mid;
      } else {
        before = mid;
      }
    }
    return after;
  }

  bounds(day: DayKey): DayBounds {
    return {
      day,
      startMs: this.startOfDay(day),
      endMs: this.startOfDay(addDays(day, 1))
    };
  }

  /** Local wall-clock minus UTC at `instant`, in milliseconds. */
  private offsetMs(instant: number): number {
    const whole = Math.floor(instant / 1000) * 1000;
    const parts = this.formatter.formatToParts(new Date(whole));
    const field = (type: Intl.DateTimeFormatPartTypes): number =>
      Number(parts.find((part) => part.type === type)?.value ?? 0);
    const asUtc = Date.UTC(
      field('year'),
      field('month') - 1,
      field('day'),
      field('hour'),
      field('minute'),
      field('second')
    );
    return asUtc - whole;
  }
}
