import { describe, it, expect, vi } from 'vitest';
import {
  CACHE_TTL_MS,
  CachedInventory,
  InventoryCacheStore,
  InventorySource,
  TtlCache,
  credentialScope,
} from './inventory-cache';

function fakeClock(start: number = 0) {
  let t = start;
  return {
    now: () => t,
    advance: (ms: number) => {
      t += ms;
    },
  };
}

function fakeSource() {
  return {
    fetchCampaigns: vi.fn<InventorySource['fetchCampaigns']>(async () => [{ id: 1, name: 'Launch', status: 'ACTIVE' }]),
    fetchAllAccounts: vi.fn<InventorySource['fetchAllAccounts']>(async () => [{ id: 5, username: 'a@example.com' }]),
    fetchCampaignAccounts: vi.fn<InventorySource['fetchCampaignAccounts']>(async () => []),
  };
}

describe('TtlCache', () => {
  it('serves a loaded value until it expires', async () => {
    const clock = fakeClock();
    const cache = new TtlCache<number>(1000, clock.now);
    const loader = vi.fn(async () => 7);

    expect(await cache.getOrLoad('k', loader)).toBe(7);
    clock.advance(999);
    expect(await cache.getOrLoad('k', loader)).toBe(7);
    expect(loader).toHaveBeenCalledTimes(1);

    clock.advance(1);
    await cache.getOrLoad('k', loader);
    expect(loader).toHaveBeenCalledTimes(2);
  });

  it('does not cache a failed load', async () => {
    const cache = new TtlCache<number>(1000);
    const loader = vi.fn<() => Promise<number>>()
      .mockRejectedValueOnce(new Error('down'))
      .mockResolvedValueOnce(3);

    await expect(cache.getOrLoad('k', loader)).rejects.toThrow('down');
    expect(cache.size).toBe(0);
    expect(await cache.getOrLoad('k', loader)).toBe(3);
  });

  it('deletes matching keys', async () => {
    const cache = new TtlCache<string>(1000);
    await cache.getOrLoad('a:1', async () => 'x');
    await cache.getOrLoad('a:2', async () => 'y');
    await cache.getOrLoad('b:1', async () => 'z');

    cache.deleteWhere(k => k.startsWith('a:'));
    expect(cache.size).toBe(1);
  });
});

describe('credentialScope', () => {
  it('is stable, short and does not contain the key', () => {
    const scope = credentialScope('test-key');
    expect(scope).toHaveLength(16);
    expect(scope).toBe(credentialScope('  test-key '));
    expect(scope).not.toBe(credentialScope('other-key'));
    expect(scope).not.toContain('test-key');
  });
});

describe('CachedInventory', () => {
  it('caches each read per credential', async () => {
    const store = new InventoryCacheStore();
    const source = fakeSource();
    const first = new CachedInventory(source, store, credentialScope('key-one'));
    const second = new CachedInventory(source, store, credentialScope('key-two'));

    await first.fetchAllAccounts();
    await first.fetchAllAccounts();
    await second.fetchAllAccounts();

    expect(source.fetchAllAccounts).toHaveBeenCalledTimes(2);
  });

  it('keys campaign lists by filter', async () => {
    const source = fakeSource();
    const inventory = new CachedInventory(source, new InventoryCacheStore(), 'scope');

    await inventory.fetchCampaigns({ includeTags: true });
    await inventory.fetchCampaigns({ includeTags: true });
    await inventory.fetchCampaigns({ clientId: 3, includeTags: true });
    await inventory.fetchCampaigns();

    expect(source.fetchCampaigns).toHaveBeenCalledTimes(3);
  });

  it('expires each kind on its own schedule', async () => {
    const clock = fakeClock();
    const source = fakeSource();
    const inventory = new CachedInventory(source, new InventoryCacheStore(clock.now), 'scope');

    await inventory.fetchCampaigns();
    await inventory.fetchAllAccounts();
    await inventory.fetchCampaignAccounts(9);

    clock.advance(CACHE_TTL_MS.campaigns);
    await inventory.fetchCampaigns();
    await inventory.fetchAllAccounts();
    await inventory.fetchCampaignAccounts(9);

    expect(source.fetchCampaigns).toHaveBeenCalledTimes(2);
    expect(source.fetchAllAccounts).toHaveBeenCalledTimes(1);
    expect(source.fetchCampaignAccounts).toHaveBeenCalledTimes(1);

    clock.advance(CACHE_TTL_MS.accounts);
    await inventory.fetchAllAccounts();
    await inventory.fetchCampaignAccounts(9);

    expect(source.fetchAllAccounts).toHaveBeenCalledTimes(2);
    expect(source.fetchCampaignAccounts).toHaveBeenCalledTimes(1);
  });

  it('drops one campaign membership on invalidateCampaign', async () => {
    const source = fakeSource();
    const inventory = new CachedInventory(source, new InventoryCacheStore(), 'scope');

    await inventory.fetchCampaignAccounts(1);
    await inventory.fetchCampaignAccounts(2);
    inventory.invalidateCampaign(1);
    await inventory.fetchCampaignAccounts(1);
    await inventory.fetchCampaignAccounts(2);

    expect(source.fetchCampaignAccounts.mock.calls.map(c => c[0])).toEqual([1, 2, 1]);
  });

  it('clears only its own scope on invalidate', async () => {
    const store = new InventoryCacheStore();
    const source = fakeSource();
    const mine = new CachedInventory(source, store, 'mine');
    const theirs = new CachedInventory(source, store, 'theirs');

    await mine.fetchAllAccounts();
    await theirs.fetchAllAccounts();
    mine.invalidate();
    await mine.fetchAllAccounts();
    await theirs.fetchAllAccounts();

    expect(source.fetchAllAccounts).toHaveBeenCalledTimes(3);
  });
});
