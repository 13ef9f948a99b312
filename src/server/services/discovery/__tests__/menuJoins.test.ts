import { describe, it, expect } from 'vitest';
import { attachMenus, attachStores, uniqueStoreKeys, type MenuRow, type StoreRow } from '../menuJoins.js';
import { buildStoreUrl, resolveStoreUrl } from '../storeUrl.js';

function store(storeId: string, platform = 'ubereats'): StoreRow {
  return { store_id: storeId, platform, name: `Store ${storeId}`, distance_in_meter: 100, distance_in_km: 0.1 };
}

function item(itemId: string, storeId: string, textScore?: number): MenuRow {
  return { item_id: itemId, store_id: storeId, platform: 'ubereats', name: itemId, price: 30, text_score: textScore };
}

describe('storeUrl', () => {
  it('builds platform urls', () => {
    expect(buildStoreUrl('abc', 'ubereats')).toBe('https://www.ubereats.com/tw/store/abc');
    expect(buildStoreUrl('abc', 'foodpanda')).toBe('https://www.foodpanda.com.tw/restaurant/abc');
    expect(buildStoreUrl('abc', 'lalamove')).toBe('');
  });

  it('does not treat object prototype keys as platforms', () => {
    expect(buildStoreUrl('abc', 'constructor')).toBe('');
  });

  it('prefers the stored source url', () => {
    expect(resolveStoreUrl({ store_id: 'abc', platform: 'ubereats', source_url: 'https://example.test/abc' })).toBe(
      'https://example.test/abc'
    );
    expect(resolveStoreUrl({ store_id: 'abc', platform: 'ubereats', source_url: null })).toBe(
      'https://www.ubereats.com/tw/store/abc'
    );
  });
});

describe('menuJoins', () => {
  it('deduplicates store keys in first-seen order', () => {
    expect(
      uniqueStoreKeys([
        { store_id: 'b', platform: 'ubereats' },
        { store_id: 'a', platform: 'ubereats' },
        { store_id: 'b', platform: 'ubereats' },
        { store_id: 'b', platform: 'foodpanda' },
      ])
    ).toEqual([
      { store_id: 'b', platform: 'ubereats' },
      { store_id: 'a', platform: 'ubereats' },
      { store_id: 'b', platform: 'foodpanda' },
    ]);
  });

  it('keeps query order for stores with equal hit counts', () => {
    const stores = [store('first'), store('second'), store('third')];
    const items = [item('t1', 'third'), item('f1', 'first'), item('s1', 'second')];

    const result = attachMenus(stores, items, true);

    expect(result.map((s) => s.store_id)).toEqual(['first', 'second', 'third']);
  });

  it('ranks a store with more hits ahead and never exposes the count', () => {
    const result = attachMenus([store('a'), store('b')], [item('b1', 'b'), item('b2', 'b'), item('a1', 'a')], true);

    expect(result.map((s) => s.store_id)).toEqual(['b', 'a']);
    expect(Object.keys(result[0]).sort()).toEqual(
      ['distance_in_km', 'distance_in_meter', 'menu', 'name', 'platform', 'store_id', 'store_url'].sort()
    );
  });

  it('keeps item order for equal text scores', () => {
    const result = attachStores([item('x', 'a', 2), item('y', 'a', 2), item('z', 'a', 3)], [store('a')], true);

    expect(result.map((d) => d.item_id)).toEqual(['z', 'x', 'y']);
    expect(result[0]).not.toHaveProperty('text_score');
  });

  it('matches stores on platform as well as store_id', () => {
    const result = attachStores([item('x', 'a')], [store('a', 'foodpanda')], false);

    expect(result).toEqual([]);
  });
});
