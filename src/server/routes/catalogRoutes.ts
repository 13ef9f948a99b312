import express, { Router } from 'express';
import { asyncHandler } from '../utils/errorHandling.js';
import { parseOrBadRequest, validate } from '../middleware/validation.js';
import {
  limitQuerySchema,
  listStorePayloadSchema,
  menuSearchQuerySchema,
  nearbyStoreQuerySchema,
  storeParamsSchema,
  type ListStorePayload,
} from '../validation/catalogSchemas.js';
import { DEFAULT_DRINK_LIMIT, type CatalogService } from '../services/catalog/CatalogService.js';

export function createCatalogRouter(getCatalogService: () => Promise<CatalogService>): Router {
  const router = express.Router();

  // POST /catalog/list/store
  // Stores in range with their (tag-matched) menus
  router.post(
    '/list/store',
    validate({ body: listStorePayloadSchema }),
    asyncHandler(async (req, res) => {
      const payload: ListStorePayload = req.body;
      const catalog = await getCatalogService();
      res.json(await catalog.listStores(payload));
    })
  );

  // POST /catalog/list/drink?limit=
  router.post(
    '/list/drink',
    validate({ body: listStorePayloadSchema }),
    asyncHandler(async (req, res) => {
      const payload: ListStorePayload = req.body;
      const { limit } = parseOrBadRequest(limitQuerySchema, req.query);
      const catalog = await getCatalogService();
      res.json(await catalog.listDrinks(payload, limit ?? DEFAULT_DRINK_LIMIT));
    })
  );

  // POST /catalog/list/drink/simplified?limit=
  router.post(
    '/list/drink/simplified',
    validate({ body: listStorePayloadSchema }),
    asyncHandler(async (req, res) => {
      const payload: ListStorePayload = req.body;
      const { limit } = parseOrBadRequest(limitQuerySchema, req.query);
      const catalog = await getCatalogService();
      res.json(await catalog.listSimplifiedDrinks(payload, limit));
    })
  );

  router.get(
    '/list/company',
    asyncHandler(async (_req, res) => {
      const catalog = await getCatalogService();
      res.json(await catalog.listCompanies());
    })
  );

  router.get(
    '/list/brand',
    asyncHandler(async (_req, res) => {
      const catalog = await getCatalogService();
      res.json(await catalog.listBrands());
    })
  );

  router.get(
    '/list/drink_tag',
    asyncHandler(async (_req, res) => {
      const catalog = await getCatalogService();
      res.json(await catalog.listDrinkTags());
    })
  );

  // GET /catalog/store/nearby?longitude=&latitude=&radius_km=&limit=
  router.get(
    '/store/nearby',
    asyncHandler(async (req, res) => {
      const query = parseOrBadRequest(nearbyStoreQuerySchema, req.query);
      const catalog = await getCatalogService();
      res.json(
        await catalog.listNearbyStores({
          longitude: query.longitude,
          latitude: query.latitude,
          radiusKm: query.radius_km,
          limit: query.limit,
        })
      );
    })
  );

  // GET /catalog/menu/search?term=&platform=&store_ids=&limit=
  router.get(
    '/menu/search',
    asyncHandler(async (req, res) => {
      const query = parseOrBadRequest(menuSearchQuerySchema, req.query);
      const catalog = await getCatalogService();
      res.json(
        await catalog.searchMenuItems({
          term: query.term,
          platform: query.platform,
          storeIds: query.store_ids,
          limit: query.limit,
        })
      );
    })
  );

  // GET /catalog/store/:platform/:storeId
  router.get(
    '/store/:platform/:storeId',
    asyncHandler(async (req, res) => {
      const { platform, storeId } = parseOrBadRequest(storeParamsSchema, req.params);
      const catalog = await getCatalogService();
      res.json(await catalog.getStore(platform, storeId));
    })
  );

  return router;
}
