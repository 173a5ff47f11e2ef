import { EventEmitter } from 'node:events';
import type { DailyLog, ShieldInventory, StreakState } from './types';

export interface CoreEventMap {
  dailyLogChanged: DailyLog;
  streakChanged: StreakState;
  shieldsChanged: ShieldInventory;
  milestoneReached: { milestone: number; streak: StreakState };
}

export type CoreEventName = keyof CoreEventMap;

export class CoreEvents {
  private readonly emitter = new EventEmitter();

  on<K extends CoreEventName>(event: K, listener: (payload: CoreEventMap[K]) => void): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  emit<K extends CoreEventName>(event: K, payload: CoreEventMap[K]): void {
    this.emitter.emit(event, structuredClone(payload));
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
