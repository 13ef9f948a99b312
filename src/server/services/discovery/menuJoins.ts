/**
 * In-memory joins between store and menu_item query results.
 * Pure functions; the engine feeds them the rows of each phase.
 */

import type { Drink, MenuItemSummary, StoreSummary, StoreWithMenu } from '../../types/catalog.js';
import type { StoreKey } from './pipelineBuilders.js';
import { resolveStoreUrl } from './storeUrl.js';

/**
 * Store row as produced by the store projection stage
 */
export interface StoreRow extends Omit<StoreSummary, 'store_url'> {
  source_url?: string | null;
}

/**
 * Menu row as produced by the menu projection stage
 */
export interface MenuRow extends MenuItemSummary {
  text_score?: number;
}

export function storeKey(row: StoreKey): string {
  return JSON.stringify([row.store_id, row.platform]);
}

export function toStoreSummary(row: StoreRow): StoreSummary {
  const { source_url: _sourceUrl, ...store } = row;
  return { ...store, store_url: resolveStoreUrl(row) };
}

export function toMenuItemSummary(row: MenuRow): MenuItemSummary {
  const { text_score: _textScore, ...item } = row;
  return item;
}

/**
 * Distinct store keys, first occurrence order
 */
export function uniqueStoreKeys(rows: readonly StoreKey[]): StoreKey[] {
  const seen = new Map<string, StoreKey>();
  for (const row of rows) {
    const key = storeKey(row);
    if (!seen.has(key)) {
      seen.set(key, { store_id: row.store_id, platform: row.platform });
    }
  }
  return Array.from(seen.values());
}

/**
 * Attach each store's menu items. Stores keep their query order unless
 * rankByHits is set, in which case they are stably sorted by the number of
 * matched items, highest first.
 */
export function attachMenus(
  stores: readonly StoreRow[],
  menuItems: readonly MenuRow[],
  rankByHits: boolean
): StoreWithMenu[] {
  const menuIndex = new Map<string, MenuItemSummary[]>();
  for (const item of menuItems) {
    const key = storeKey(item);
    const menu = menuIndex.get(key);
    if (menu) {
      menu.push(toMenuItemSummary(item));
    } else {
      menuIndex.set(key, [toMenuItemSummary(item)]);
    }
  }

  const joined = stores.map((store) => {
    const menu = menuIndex.get(storeKey(store)) ?? [];
    return { hits: menu.length, store: { ...toStoreSummary(store), menu } };
  });

  if (rankByHits) {
    joined.sort((a, b) => b.hits - a.hits);
  }
  return joined.map(({ store }) => store);
}

/**
 * Merge each menu item with the display fields of its store. Items whose
 * store is not among `stores` are dropped. With rankByScore the result is
 * stably sorted by text score, highest first; otherwise item order is kept.
 */
export function attachStores(
  menuItems: readonly MenuRow[],
  stores: readonly StoreRow[],
  rankByScore: boolean
): Drink[] {
  const storeIndex = new Map<string, StoreRow>();
  for (const store of stores) {
    storeIndex.set(storeKey(store), store);
  }

  const joined: Array<{ score: number; drink: Drink }> = [];
  for (const item of menuItems) {
    const store = storeIndex.get(storeKey(item));
    if (!store) {
      continue;
    }
    joined.push({
      score: item.text_score ?? 0,
      drink: {
        ...toMenuItemSummary(item),
        store_name: store.name,
        store_url: resolveStoreUrl(store),
        brand_name: store.brand ?? null,
        distance_in_km: store.distance_in_km,
      },
    });
  }

  if (rankByScore) {
    joined.sort((a, b) => b.score - a.score);
  }
  return joined.map(({ drink }) => drink);
}
