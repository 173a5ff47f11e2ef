import { LocalCalendar, type Clock } from '../calendar';
import type { AppConfig } from '../config';
import { CoreEvents } from '../events';
import { KeyedMutex } from '../lock';
import type { Logger } from '../logger';
import { StoredObservationProvider, type ObservationProvider } from '../providers/observationProvider';
import type { DataStore } from '../store';
import type { ServiceContext } from './context';
import { EntitlementService } from './entitlementService';
import { ReconciliationService } from './reconciliationService';
import { ShieldService } from './shieldService';
import { StepService } from './stepService';
import { StreakService } from './streakService';
import { SyncService } from './syncService';

export interface Services {
  ctx: ServiceContext;
  entitlements: EntitlementService;
  streaks: StreakService;
  steps: StepService;
  shields: ShieldService;
  reconciliation: ReconciliationService;
  sync: SyncService;
}

export function createServices(params: {
  store: DataStore;
  clock: Clock;
  config: AppConfig;
  logger: Logger;
  provider?: ObservationProvider;
}): Services {
  const calendar = new LocalCalendar(params.config.timeZone, params.clock);
  const ctx: ServiceContext = {
    store: params.store,
    calendar,
    mutex: new KeyedMutex(),
    events: new CoreEvents(),
    logger: params.logger,
    config: params.config
  };
  const provider = params.provider ?? new StoredObservationProvider(params.store, calendar);

  const entitlements = new EntitlementService(params.store, params.clock);
  const streaks = new StreakService(ctx);
  const steps = new StepService(ctx, streaks);
  const shields = new ShieldService(ctx, entitlements, steps, streaks);
  const reconciliation = new ReconciliationService(ctx, provider, entitlements, steps, streaks, shields);
  const sync = new SyncService(ctx, streaks);

  return { ctx, entitlements, streaks, steps, shields, reconciliation, sync };
}
