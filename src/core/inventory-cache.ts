// Inventory Cache
// Time-boxed memoization in front of the remote inventory reads

import { createHash } from 'crypto';
import { CampaignFilter, SmartleadCampaign, SmartleadEmailAccount } from '../channels/smartlead-types';

export const CACHE_TTL_MS = {
  campaigns: 5 * 60 * 1000,
  accounts: 10 * 60 * 1000,
  campaignAccounts: 30 * 60 * 1000,
};

export interface InventorySource {
  fetchCampaigns(filter?: CampaignFilter): Promise<SmartleadCampaign[]>;
  fetchAllAccounts(pageSize?: number): Promise<SmartleadEmailAccount[]>;
  fetchCampaignAccounts(campaignId: number): Promise<SmartleadEmailAccount[]>;
}

export type Clock = () => number;

export class TtlCache<T> {
  private entries: Map<string, { value: T; expiresAt: number }> = new Map();

  constructor(private ttlMs: number, private now: Clock = Date.now) {}

  async getOrLoad(key: string, loader: () => Promise<T>): Promise<T> {
    const cached = this.entries.get(key);
    if (cached && cached.expiresAt > this.now()) {
      return cached.value;
    }

    const value = await loader();
    this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });
    return value;
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  deleteWhere(predicate: (key: string) => boolean): void {
    for (const key of [...this.entries.keys()]) {
      if (predicate(key)) this.entries.delete(key);
    }
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

export class InventoryCacheStore {
  readonly campaigns: TtlCache<SmartleadCampaign[]>;
  readonly accounts: TtlCache<SmartleadEmailAccount[]>;
  readonly campaignAccounts: TtlCache<SmartleadEmailAccount[]>;

  constructor(now: Clock = Date.now, ttl: typeof CACHE_TTL_MS = CACHE_TTL_MS) {
    this.campaigns = new TtlCache(ttl.campaigns, now);
    this.accounts = new TtlCache(ttl.accounts, now);
    this.campaignAccounts = new TtlCache(ttl.campaignAccounts, now);
  }

  clear(): void {
    this.campaigns.clear();
    this.accounts.clear();
    this.campaignAccounts.clear();
    console.log('[Cache] Inventory cache cleared');
  }
}

// Keys are scoped per credential without keeping the key itself around
export function credentialScope(apiKey: string): string {
  return createHash('sha256').update(apiKey.trim()).digest('hex').slice(0, 16);
}

export class CachedInventory implements InventorySource {
  constructor(
    private source: InventorySource,
    private store: InventoryCacheStore,
    private scope: string
  ) {}

  fetchCampaigns(filter: CampaignFilter = {}): Promise<SmartleadCampaign[]> {
    const key = `${this.scope}:${filter.clientId ?? '*'}:${filter.includeTags ? 'tags' : 'plain'}`;
    return this.store.campaigns.getOrLoad(key, () => this.source.fetchCampaigns(filter));
  }

  fetchAllAccounts(pageSize?: number): Promise<SmartleadEmailAccount[]> {
    return this.store.accounts.getOrLoad(this.scope, () => this.source.fetchAllAccounts(pageSize));
  }

  fetchCampaignAccounts(campaignId: number): Promise<SmartleadEmailAccount[]> {
    return this.store.campaignAccounts.getOrLoad(
      `${this.scope}:${campaignId}`,
      () => this.source.fetchCampaignAccounts(campaignId)
    );
  }

  // Membership changed after an apply run
  invalidateCampaign(campaignId: number): void {
    this.store.campaignAccounts.delete(`${this.scope}:${campaignId}`);
  }

  invalidate(): void {
    const prefix = `${this.scope}`;
    this.store.campaigns.deleteWhere(k => k.startsWith(`${prefix}:`));
    this.store.accounts.delete(prefix);
    this.store.campaignAccounts.deleteWhere(k => k.startsWith(`${prefix}:`));
  }
}
