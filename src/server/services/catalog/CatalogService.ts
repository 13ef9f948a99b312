/**
 * CatalogService
 *
 * Read side of the drink catalog: discovery queries through the
 * GeoTextQueryEngine plus the plain listings (companies, brands, drink tags)
 * the client uses to build its filters.
 */

import { logger } from '../../utils/logger.js';
import { NotFoundError } from '../../types/errors.js';
import type { DocumentReader } from '../../drivers/MongoDriver.js';
import {
  COLLECTIONS,
  type BrandDocument,
  type CompanyDocument,
  type DiscoveryFilters,
  type Drink,
  type DrinkTagDocument,
  type MenuItemSummary,
  type Platform,
  type StoreSummary,
  type StoreWithMenu,
} from '../../types/catalog.js';
import type { ListStorePayload } from '../../validation/catalogSchemas.js';
import type { GeoTextQueryEngine, MenuItemSearch, StoreDetail } from '../discovery/GeoTextQueryEngine.js';
import { buildStoreUrl } from '../discovery/storeUrl.js';

export const DEFAULT_DRINK_LIMIT = 100;
export const DEFAULT_MENU_SEARCH_LIMIT = 50;
const LISTING_LIMIT = 1000;

export interface ListResponse<T> {
  data: T[];
}

/**
 * Drink reduced to what a recommendation prompt needs
 */
export interface SimplifiedDrink {
  name: string;
  description: string | null;
  image_url: null;
  store_name: string;
  store_id: string;
  store_url: string;
}

export interface NearbyStoreQuery {
  longitude: number;
  latitude: number;
  radiusKm?: number;
  limit?: number;
}

/**
 * Map the snake_case request payload onto engine filters
 */
export function toDiscoveryFilters(payload: ListStorePayload, limit?: number): DiscoveryFilters {
  const [longitude, latitude] = payload.location;
  return {
    longitude,
    latitude,
    drinkTags: payload.drink_tags,
    brands: payload.brands,
    reviewCountRange: payload.review_count_range ?? undefined,
    ratingRange: payload.rating_range ?? undefined,
    distanceRange: payload.distance_range ?? undefined,
    platform: payload.platform ?? undefined,
    limit,
  };
}

export function toSimplifiedDrink(drink: Drink): SimplifiedDrink {
  return {
    name: drink.name,
    description: drink.description ?? null,
    image_url: null,
    store_name: drink.store_name,
    store_id: drink.store_id,
    store_url: buildStoreUrl(drink.store_id, drink.platform),
  };
}

/**
 * Shortest tag names first; ties keep their count order
 */
export function orderDrinkTags(tags: DrinkTagDocument[]): DrinkTagDocument[] {
  return [...tags].sort((a, b) => a.name.length - b.name.length);
}

export class CatalogService {
  constructor(
    private readonly engine: GeoTextQueryEngine,
    private readonly reader: DocumentReader
  ) {}

  async listStores(payload: ListStorePayload): Promise<ListResponse<StoreWithMenu>> {
    const stores = await this.engine.findDrinkStoresWithMenu(toDiscoveryFilters(payload));
    logger.debug({ count: stores.length, drinkTags: payload.drink_tags }, 'Listed stores with menu');
    return { data: stores };
  }

  async listDrinks(payload: ListStorePayload, limit: number | undefined = DEFAULT_DRINK_LIMIT): Promise<ListResponse<Drink>> {
    const drinks = await this.engine.findDrinks(toDiscoveryFilters(payload, limit));
    logger.debug({ count: drinks.length, drinkTags: payload.drink_tags, limit }, 'Listed drinks');
    return { data: drinks };
  }

  async listSimplifiedDrinks(payload: ListStorePayload, limit?: number): Promise<ListResponse<SimplifiedDrink>> {
    const drinks = await this.engine.findDrinks(toDiscoveryFilters(payload, limit));
    return { data: drinks.map(toSimplifiedDrink) };
  }

  async listNearbyStores(query: NearbyStoreQuery): Promise<ListResponse<StoreSummary>> {
    const stores = await this.engine.findNearbyStores(query.longitude, query.latitude, query.radiusKm, query.limit);
    return { data: stores };
  }

  async searchMenuItems(search: MenuItemSearch): Promise<ListResponse<MenuItemSummary>> {
    const items = await this.engine.searchMenuItems({ ...search, limit: search.limit ?? DEFAULT_MENU_SEARCH_LIMIT });
    return { data: items };
  }

  async getStore(platform: Platform, storeId: string): Promise<StoreDetail> {
    const store = await this.engine.findStore(storeId, platform);
    if (!store) {
      throw new NotFoundError('Store', storeId, { platform });
    }
    return store;
  }

  async listCompanies(): Promise<ListResponse<CompanyDocument>> {
    const companies = await this.reader.find<CompanyDocument>(COLLECTIONS.company, {}, { projection: { _id: 0 } });
    return { data: companies };
  }

  async listBrands(): Promise<ListResponse<BrandDocument>> {
    const brands = await this.reader.find<BrandDocument>(
      COLLECTIONS.brand,
      { has_chain: true, chain_count: { $gt: 1 }, platforms: 'ubereats' },
      { sort: { chain_count: -1 }, limit: LISTING_LIMIT, projection: { _id: 0 } }
    );
    return { data: brands };
  }

  async listDrinkTags(): Promise<ListResponse<DrinkTagDocument>> {
    const tags = await this.reader.find<DrinkTagDocument>(
      COLLECTIONS.drinkTag,
      { count: { $gt: 5 } },
      { sort: { count: -1 }, limit: LISTING_LIMIT, projection: { _id: 0 } }
    );
    return { data: orderDrinkTags(tags) };
  }
}
