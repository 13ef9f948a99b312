/**
 * GeoTextQueryEngine
 *
 * Drink and store discovery over the `store` and `menu_item` collections.
 * Geo filtering runs on stores, tag text search runs on menu items, and the
 * two are joined in memory because one aggregation pipeline cannot hold both
 * a `$geoNear` and a `$text` stage.
 *
 * Phases run one after another and any failed round trip fails the whole
 * operation; nothing is retried here and no partial result is returned.
 */

import type { Document } from 'mongodb';
import { createChildLogger } from '../../utils/logger.js';
import type { AggregationExecutor, DocumentReader } from '../../drivers/MongoDriver.js';
import {
  COLLECTIONS,
  type DiscoveryFilters,
  type Drink,
  type MenuItemSummary,
  type Platform,
  type StoreDocument,
  type StoreSummary,
  type StoreWithMenu,
} from '../../types/catalog.js';
import {
  DEFAULT_RADIUS_KM,
  assertPipelineShape,
  attributeFilterStage,
  brandFilterStage,
  distinctStoreKeyStages,
  escapeRegex,
  geoNearStage,
  limitStage,
  menuProjectionStage,
  platformStage,
  priceFloorStage,
  resolveRadiusKm,
  storeProjectionStage,
  storeRestrictionStage,
  textScoreSortStage,
  textScoreStage,
  textSearchStage,
  type StoreKey,
} from './pipelineBuilders.js';
import {
  attachMenus,
  attachStores,
  toMenuItemSummary,
  toStoreSummary,
  uniqueStoreKeys,
  type MenuRow,
  type StoreRow,
} from './menuJoins.js';
import { resolveStoreUrl } from './storeUrl.js';

const log = createChildLogger({ component: 'GeoTextQueryEngine' });

export type StoreDetail = Omit<StoreDocument, 'source_url'> & { store_url: string };

export interface MenuItemSearch {
  term: string;
  storeIds?: string[];
  platform?: Platform;
  limit?: number;
}

export class GeoTextQueryEngine {
  constructor(
    private readonly executor: AggregationExecutor,
    private readonly reader: DocumentReader
  ) {}

  /**
   * Stores in range with their menus.
   *
   * With drink tags: stores that sell at least one matching item, each with
   * only its matching items, ranked by how many items matched. Without tags:
   * every store in range with its full menu, in distance order.
   */
  async findDrinkStoresWithMenu(filters: DiscoveryFilters): Promise<StoreWithMenu[]> {
    if (filters.drinkTags.length === 0) {
      const stores = await this.queryStores(filters);
      if (stores.length === 0) {
        return [];
      }
      const menuItems = await this.run<MenuRow>(COLLECTIONS.menuItem, [
        storeRestrictionStage(uniqueStoreKeys(stores)),
        menuProjectionStage(false),
      ]);
      return attachMenus(stores, menuItems, false);
    }

    const candidates = await this.run<StoreKey>(COLLECTIONS.menuItem, [
      textSearchStage(filters.drinkTags),
      ...(filters.platform ? [platformStage(filters.platform)] : []),
      ...distinctStoreKeyStages(),
    ]);
    const candidateKeys = uniqueStoreKeys(candidates);
    if (candidateKeys.length === 0) {
      log.debug({ drinkTags: filters.drinkTags }, 'No menu items match the drink tags');
      return [];
    }

    const stores = await this.queryStores(filters, candidateKeys);
    if (stores.length === 0) {
      return [];
    }

    const menuItems = await this.run<MenuRow>(COLLECTIONS.menuItem, [
      textSearchStage(filters.drinkTags),
      storeRestrictionStage(uniqueStoreKeys(stores)),
      textScoreStage(),
      menuProjectionStage(true),
      textScoreSortStage(),
    ]);
    return attachMenus(stores, menuItems, true);
  }

  /**
   * Menu items (price 20 and up) of the stores in range, each merged with its
   * store's display fields. With drink tags the items are text-matched and
   * ranked by relevance.
   */
  async findDrinks(filters: DiscoveryFilters): Promise<Drink[]> {
    const stores = await this.queryStores(filters);
    if (stores.length === 0) {
      return [];
    }

    const hasTags = filters.drinkTags.length > 0;
    const pipeline: Document[] = [];
    if (hasTags) {
      pipeline.push(textSearchStage(filters.drinkTags));
    }
    pipeline.push(priceFloorStage(), storeRestrictionStage(uniqueStoreKeys(stores)));
    if (hasTags) {
      pipeline.push(textScoreStage());
    }
    pipeline.push(menuProjectionStage(hasTags));
    if (hasTags) {
      pipeline.push(textScoreSortStage());
    }
    if (filters.limit) {
      pipeline.push(limitStage(filters.limit));
    }

    const menuItems = await this.run<MenuRow>(COLLECTIONS.menuItem, pipeline);
    return attachStores(menuItems, stores, hasTags);
  }

  async findNearbyStores(
    longitude: number,
    latitude: number,
    radiusKm: number = DEFAULT_RADIUS_KM,
    limit?: number
  ): Promise<StoreSummary[]> {
    const pipeline: Document[] = [geoNearStage(longitude, latitude, radiusKm), storeProjectionStage()];
    if (limit) {
      pipeline.push(limitStage(limit));
    }
    const stores = await this.run<StoreRow>(COLLECTIONS.store, pipeline);
    return stores.map(toStoreSummary);
  }

  /**
   * Case-insensitive match of the term anywhere in the item name
   */
  async searchMenuItems(search: MenuItemSearch): Promise<MenuItemSummary[]> {
    const match: Document = { name: { $regex: escapeRegex(search.term), $options: 'i' } };
    if (search.storeIds && search.storeIds.length > 0) {
      match.store_id = { $in: search.storeIds };
    }
    if (search.platform) {
      match.platform = search.platform;
    }

    const pipeline: Document[] = [{ $match: match }, menuProjectionStage(false)];
    if (search.limit) {
      pipeline.push(limitStage(search.limit));
    }
    const items = await this.run<MenuRow>(COLLECTIONS.menuItem, pipeline);
    return items.map(toMenuItemSummary);
  }

  async findStore(storeId: string, platform: Platform): Promise<StoreDetail | null> {
    const store = await this.reader.findOne<StoreDocument>(
      COLLECTIONS.store,
      { store_id: storeId, platform },
      { _id: 0 }
    );
    if (!store) {
      return null;
    }
    const { source_url: _sourceUrl, ...detail } = store;
    return { ...detail, store_url: resolveStoreUrl(store) };
  }

  /**
   * Geo + attribute + brand query on stores, optionally restricted to a set
   * of store keys
   */
  private async queryStores(filters: DiscoveryFilters, restrictTo?: StoreKey[]): Promise<StoreRow[]> {
    const pipeline: Document[] = [
      geoNearStage(filters.longitude, filters.latitude, resolveRadiusKm(filters.distanceRange)),
      attributeFilterStage({
        platform: filters.platform,
        ratingRange: filters.ratingRange,
        reviewCountRange: filters.reviewCountRange,
      }),
    ];
    if (restrictTo) {
      pipeline.push(storeRestrictionStage(restrictTo));
    }
    const brandStage = brandFilterStage(filters.brands);
    if (brandStage) {
      pipeline.push(brandStage);
    }
    pipeline.push(storeProjectionStage());

    return this.run<StoreRow>(COLLECTIONS.store, pipeline);
  }

  private async run<T extends Document>(collection: string, pipeline: Document[]): Promise<T[]> {
    assertPipelineShape(collection, pipeline);
    const startTime = Date.now();
    const rows = await this.executor.aggregate<T>(collection, pipeline);
    log.debug({ collection, count: rows.length, duration: Date.now() - startTime }, 'Discovery phase completed');
    return rows;
  }
}
