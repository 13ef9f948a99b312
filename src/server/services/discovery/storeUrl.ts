import type { Platform } from '../../types/catalog.js';

const STORE_URL_TEMPLATES: ReadonlyMap<string, (storeId: string) => string> = new Map([
  ['ubereats', (storeId: string) => `https://www.ubereats.com/tw/store/${storeId}`],
  ['foodpanda', (storeId: string) => `https://www.foodpanda.com.tw/restaurant/${storeId}`],
]);

/**
 * Public page of a store on its delivery platform; empty for unknown platforms
 */
export function buildStoreUrl(storeId: string, platform: Platform): string {
  const template = STORE_URL_TEMPLATES.get(platform);
  return template ? template(storeId) : '';
}

/**
 * The scraped source URL when the store has one, otherwise the platform template
 */
export function resolveStoreUrl(store: { store_id: string; platform: Platform; source_url?: string | null }): string {
  return store.source_url || buildStoreUrl(store.store_id, store.platform);
}
