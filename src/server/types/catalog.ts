/**
 * Catalog document shapes as stored in MongoDB, and the shapes the
 * discovery queries hand back.
 */

export const COLLECTIONS = {
  store: 'store',
  menuItem: 'menu_item',
  company: 'company',
  brand: 'brand',
  drinkTag: 'drink_tag',
} as const;

export type Platform = 'ubereats' | 'foodpanda' | (string & {});

/**
 * GeoJSON point; coordinates are [longitude, latitude]
 */
export interface GeoPoint {
  type: 'Point';
  coordinates: [number, number];
}

export interface StoreRating {
  value?: number;
  review_count?: number;
}

/**
 * Store document. (store_id, platform) is unique.
 */
export interface StoreDocument {
  store_id: string;
  platform: Platform;
  name: string;
  brand?: string;
  location: GeoPoint;
  rating?: StoreRating;
  address?: string;
  cuisines?: string[];
  source_url?: string;
}

/**
 * Menu item document. store_id may point at a store that no longer exists.
 */
export interface MenuItemDocument {
  item_id: string;
  store_id: string;
  platform: Platform;
  name: string;
  category?: string;
  description?: string;
  price: number;
  image_url?: string | null;
  keywords?: string[];
  is_popular?: boolean;
  options?: unknown[];
}

export interface CompanyDocument {
  alias: string;
  name: string;
  location?: GeoPoint;
  address?: string;
}

export interface BrandDocument {
  name: string;
  has_chain: boolean;
  chain_count: number;
  platforms: string[];
}

export interface DrinkTagDocument {
  name: string;
  count: number;
}

/**
 * Store as returned by the discovery queries
 */
export interface StoreSummary {
  store_id: string;
  platform: Platform;
  name: string;
  brand?: string;
  rating?: StoreRating;
  address?: string;
  cuisines?: string[];
  location?: GeoPoint;
  store_url: string;
  distance_in_meter: number;
  distance_in_km: number;
}

export interface MenuItemSummary {
  item_id: string;
  store_id: string;
  platform: Platform;
  name: string;
  category?: string;
  description?: string;
  price: number;
  image_url?: string | null;
  is_popular?: boolean;
  options?: unknown[];
}

export interface StoreWithMenu extends StoreSummary {
  menu: MenuItemSummary[];
}

/**
 * Menu item merged with the display fields of its store
 */
export interface Drink extends MenuItemSummary {
  store_name: string;
  store_url: string;
  brand_name: string | null;
  distance_in_km: number;
}

export type NumericRange = readonly [number, number];

/**
 * Filters shared by every discovery query
 */
export interface DiscoveryFilters {
  longitude: number;
  latitude: number;
  drinkTags: string[];
  brands: string[];
  reviewCountRange?: NumericRange;
  ratingRange?: NumericRange;
  /** Meters; only the upper bound is used, as the search radius */
  distanceRange?: NumericRange;
  platform?: Platform;
  limit?: number;
}
