import type { LocalCalendar } from '../calendar';
import type { AppConfig } from '../config';
import type { CoreEvents } from '../events';
import type { KeyedMutex } from '../lock';
import type { Logger } from '../logger';
import type { DataStore } from '../store';

export interface ServiceContext {
  store: DataStore;
  calendar: LocalCalendar;
  mutex: KeyedMutex;
  events: CoreEvents;
  logger: Logger;
  config: AppConfig;
}

export const dayLock = (date: string): string => `day:${date}`;
export const STREAK_LOCK = 'streak';
export const SHIELDS_LOCK = 'shields';
