import { describe, expect, it } from 'vitest';
import { FixedClock, isValidTimeZone, LocalCalendar } from '../src/calendar';
import { daysBetween, listDays, periodOf } from '../src/utils';

const HOUR = 60 * 60 * 1000;

describe('local calendar', () => {
  it('derives today and yesterday from the injected clock', () => {
    const clock = new FixedClock('2026-03-10T12:00:00.000Z');
    const calendar = new LocalCalendar('UTC', clock);
    expect(calendar.today()).toBe('2026-03-10');
    expect(calendar.yesterday()).toBe('2026-03-09');

    clock.advance(12 * HOUR);
    expect(calendar.today()).toBe('2026-03-11');
  });

  it('maps instants onto the local date of the zone', () => {
    const clock = new FixedClock(0);
    expect(new LocalCalendar('America/New_York', clock).dayKey(Date.parse('2026-03-10T03:00:00.000Z'))).toBe(
      '2026-03-09'
    );
    expect(new LocalCalendar('Asia/Tokyo', clock).dayKey(Date.parse('2026-03-10T15:30:00.000Z'))).toBe('2026-03-11');
  });

  it('gives a 23 hour day when clocks spring forward', () => {
    const calendar = new LocalCalendar('America/New_York', new FixedClock(0));
    const bounds = calendar.bounds('2026-03-08');
    expect(new Date(bounds.startMs).toISOString()).toBe('2026-03-08T05:00:00.000Z');
    expect(new Date(bounds.endMs).toISOString()).toBe('2026-03-09T04:00:00.000Z');
    expect(bounds.endMs - bounds.startMs).toBe(23 * HOUR);
  });

  it('starts the day at the transition when local midnight is skipped', () => {
    const calendar = new LocalCalendar('America/Havana', new FixedClock(0));
    const bounds = calendar.bounds('2026-03-08');
    expect(new Date(bounds.startMs).toISOString()).toBe('2026-03-08T05:00:00.000Z');
    expect(calendar.dayKey(bounds.startMs)).toBe('2026-03-08');
    expect(calendar.dayKey(bounds.startMs - 1)).toBe('2026-03-07');
    expect(calendar.bounds('2026-03-07').endMs).toBe(bounds.startMs);
    expect(bounds.endMs - bounds.startMs).toBe(23 * HOUR);
  });

  it('reads the local hour', () => {
    const calendar = new LocalCalendar('America/New_York', new FixedClock(0));
    expect(calendar.hourAt(Date.parse('2026-03-10T23:30:00.000Z'))).toBe(19);
    expect(calendar.hourAt(Date.parse('2026-03-11T04:00:00.000Z'))).toBe(0);
  });

  it('validates time zone names', () => {
    expect(isValidTimeZone('Europe/Berlin')).toBe(true);
    expect(isValidTimeZone('Not/AZone')).toBe(false);
  });
});

describe('day helpers', () => {
  it('counts and lists calendar days', () => {
    expect(daysBetween('2026-02-27', '2026-03-02')).toBe(3);
    expect(daysBetween('2026-03-02', '2026-02-27')).toBe(-3);
    expect(listDays('2026-02-27', '2026-03-01')).toEqual(['2026-02-27', '2026-02-28', '2026-03-01']);
    expect(listDays('2026-03-02', '2026-03-01')).toEqual([]);
    expect(periodOf('2026-03-09')).toBe('2026-03');
  });
});
