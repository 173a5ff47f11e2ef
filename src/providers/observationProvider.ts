import type { LocalCalendar } from '../calendar';
import type { DataStore } from '../store';
import type { DayBounds, DayKey, StepObservation } from '../types';
import { listDays } from '../utils';

/** Callers treat a failed fetch as "skip these days", never as zero steps. */
export interface ObservationProvider {
  fetchDay(day: DayKey, bounds: DayBounds): Promise<StepObservation[]>;
  fetchRange(start: DayKey, end: DayKey): Promise<Map<DayKey, StepObservation[]>>;
}

export function overlaps(observation: StepObservation, bounds: DayBounds): boolean {
  return observation.startMs < bounds.endMs && observation.endMs > bounds.startMs;
}

/** Reads back the observation ledger that the live ingestion path writes. */
export class StoredObservationProvider implements ObservationProvider {
  constructor(
    private readonly store: DataStore,
    private readonly calendar: LocalCalendar
  ) {}

  async fetchDay(_day: DayKey, bounds: DayBounds): Promise<StepObservation[]> {
    return this.store.listObservations(bounds.startMs, bounds.endMs);
  }

  async fetchRange(start: DayKey, end: DayKey): Promise<Map<DayKey, StepObservation[]>> {
    const days = listDays(start, end).map((day) => this.calendar.bounds(day));
    const result = new Map<DayKey, StepObservation[]>();
    if (days.length === 0) {
      return result;
    }
    const all = await this.store.listObservations(days[0].startMs, days[days.length - 1].endMs);
    days.forEach((bounds) => {
      result.set(
        bounds.day,
        all.filter((observation) => overlaps(observation, bounds))
      );
    });
    return result;
  }
}
