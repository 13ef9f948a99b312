/**
 * Aggregation stage builders for the discovery queries.
 *
 * MongoDB requires both `$geoNear` and a `$text` match to be the first stage
 * of their pipeline, so the two can never share one. Queries that need both
 * split the work across the store and menu_item collections and join in
 * memory (see menuJoins.ts).
 */

import type { Document } from 'mongodb';
import { QueryError } from '../../types/errors.js';
import type { NumericRange, Platform } from '../../types/catalog.js';

export const DEFAULT_RADIUS_KM = 5;
export const MIN_DRINK_PRICE = 20;

/**
 * Composite store identity; menu items reference stores by both fields
 */
export interface StoreKey {
  store_id: string;
  platform: Platform;
}

export interface AttributeFilterOptions {
  platform?: Platform;
  ratingRange?: NumericRange;
  reviewCountRange?: NumericRange;
}

/**
 * Search radius in km. distanceRange is in meters and only its upper bound applies.
 */
export function resolveRadiusKm(distanceRange?: NumericRange): number {
  return distanceRange ? distanceRange[1] / 1000 : DEFAULT_RADIUS_KM;
}

export function geoNearStage(longitude: number, latitude: number, radiusKm: number): Document {
  return {
    $geoNear: {
      near: { type: 'Point', coordinates: [longitude, latitude] },
      distanceField: 'distance_in_meter',
      maxDistance: radiusKm * 1000,
      spherical: true,
    },
  };
}

/**
 * Full-text match over the menu_item text index; tags are OR-ed by the server
 */
export function textSearchStage(drinkTags: readonly string[]): Document {
  return { $match: { $text: { $search: drinkTags.join(' ') } } };
}

/**
 * Platform, rating and review-count predicates. With none set the stage is a
 * tautology so every pipeline keeps the same shape.
 */
export function attributeFilterStage(options: AttributeFilterOptions): Document {
  const filters: Document = {};

  if (options.platform) {
    filters.platform = options.platform;
  }
  if (options.ratingRange) {
    filters['rating.value'] = { $gte: options.ratingRange[0], $lte: options.ratingRange[1] };
  }
  if (options.reviewCountRange) {
    filters['rating.review_count'] = { $gte: options.reviewCountRange[0], $lte: options.reviewCountRange[1] };
  }

  return { $match: Object.keys(filters).length > 0 ? filters : { $expr: true } };
}

export function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Case-insensitive literal match of any brand against the store name
 */
export function brandFilterStage(brands: readonly string[]): Document | null {
  if (brands.length === 0) {
    return null;
  }
  return {
    $match: {
      $or: brands.map((brand) => ({ name: { $regex: escapeRegex(brand), $options: 'i' } })),
    },
  };
}

export function storeRestrictionStage(stores: readonly StoreKey[]): Document {
  return {
    $match: {
      $or: stores.map((store) => ({ store_id: store.store_id, platform: store.platform })),
    },
  };
}

export function platformStage(platform: Platform): Document {
  return { $match: { platform } };
}

export function priceFloorStage(minPrice: number = MIN_DRINK_PRICE): Document {
  return { $match: { price: { $gte: minPrice } } };
}

export function textScoreStage(): Document {
  return { $addFields: { text_score: { $meta: 'textScore' } } };
}

export function textScoreSortStage(): Document {
  return { $sort: { text_score: { $meta: 'textScore' } } };
}

export function limitStage(limit: number): Document {
  return { $limit: limit };
}

/**
 * Collapse menu items to the distinct stores they belong to
 */
export function distinctStoreKeyStages(): Document[] {
  return [
    { $group: { _id: { store_id: '$store_id', platform: '$platform' } } },
    { $project: { _id: 0, store_id: '$_id.store_id', platform: '$_id.platform' } },
  ];
}

export function storeProjectionStage(): Document {
  return {
    $project: {
      _id: 0,
      store_id: 1,
      platform: 1,
      name: 1,
      brand: 1,
      address: 1,
      rating: 1,
      cuisines: 1,
      location: 1,
      source_url: 1,
      distance_in_meter: '$distance_in_meter',
      distance_in_km: { $round: [{ $divide: ['$distance_in_meter', 1000] }, 2] },
    },
  };
}

export function menuProjectionStage(includeTextScore: boolean): Document {
  return {
    $project: {
      _id: 0,
      item_id: 1,
      store_id: 1,
      platform: 1,
      name: 1,
      category: 1,
      description: 1,
      price: 1,
      image_url: 1,
      is_popular: 1,
      options: 1,
      ...(includeTextScore ? { text_score: 1 } : {}),
    },
  };
}

function isGeoNearStage(stage: Document): boolean {
  return '$geoNear' in stage;
}

function isTextSearchStage(stage: Document): boolean {
  const match: unknown = stage.$match;
  return typeof match === 'object' && match !== null && '$text' in match;
}

/**
 * Reject pipelines MongoDB would refuse: a geo or text stage anywhere but
 * first, more than one of either, or both in the same pipeline.
 * @throws QueryError
 */
export function assertPipelineShape(collection: string, pipeline: readonly Document[]): void {
  const geoPositions: number[] = [];
  const textPositions: number[] = [];
  pipeline.forEach((stage, index) => {
    if (isGeoNearStage(stage)) geoPositions.push(index);
    if (isTextSearchStage(stage)) textPositions.push(index);
  });

  const context = { collection, geoPositions, textPositions };
  if (geoPositions.length > 0 && textPositions.length > 0) {
    throw new QueryError('A pipeline cannot combine $geoNear with a $text match', context);
  }
  if (geoPositions.length > 1 || textPositions.length > 1) {
    throw new QueryError('A pipeline may hold at most one $geoNear or $text stage', context);
  }
  const [first] = [...geoPositions, ...textPositions];
  if (first !== undefined && first !== 0) {
    throw new QueryError('$geoNear and $text stages must be the first stage of their pipeline', context);
  }
}
