import type { Clock } from '../calendar';
import { TIER_POLICIES } from '../engine/shields';
import type { DataStore } from '../store';
import type { Entitlement, Tier, TierPolicy } from '../types';

export class EntitlementService {
  constructor(
    private readonly store: DataStore,
    private readonly clock: Clock
  ) {}

  async getEntitlement(): Promise<Entitlement> {
    const current = await this.store.getEntitlement();
    if (current) {
      return current;
    }
    const fallback: Entitlement = { tier: 'free' };
    await this.store.upsertEntitlement(fallback);
    return fallback;
  }

  async setEntitlement(next: Entitlement): Promise<Entitlement> {
    await this.store.upsertEntitlement(next);
    return next;
  }

  /** Tier in force right now; a lapsed pro entitlement reads as free. */
  async effectiveTier(): Promise<Tier> {
    const entitlement = await this.getEntitlement();
    if (entitlement.tier === 'pro' && entitlement.expiresAt) {
      const expiresAt = Date.parse(entitlement.expiresAt);
      if (Number.isFinite(expiresAt) && expiresAt <= this.clock.now().getTime()) {
        return 'free';
      }
    }
    return entitlement.tier;
  }

  /** Re-read on every grant and reconciliation; never cached. */
  async getPolicy(): Promise<TierPolicy> {
    return TIER_POLICIES[await this.effectiveTier()];
  }
}
