import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import { Readable } from 'stream';
import type { Express } from 'express';
import { createApp } from '../app.js';
import { CatalogService } from '../services/catalog/CatalogService.js';
import { AgentService } from '../services/agent/AgentService.js';
import { GeoTextQueryEngine } from '../services/discovery/GeoTextQueryEngine.js';
import { ResourceInitializationError } from '../types/errors.js';
import { FakeMongo } from './fakes/FakeMongo.js';
import { createFakeAxios, type FakeReply, type RecordedRequest } from './fakes/fakeAxios.js';

const chatBody = {
  app_name: 'drink_chat',
  user_id: 'u-1',
  session_id: 's-1',
  chat_type: 'drink_preference_chat',
  message: { role: 'user', content: '想喝果茶' },
};

describe('HTTP app', () => {
  let mongo: FakeMongo;
  let health: Record<string, boolean>;
  let agentReply: (request: RecordedRequest) => FakeReply;
  let app: Express;

  beforeEach(() => {
    mongo = new FakeMongo();
    health = { mongo: true, http: true };
    agentReply = () => ({ status: 200, data: {} });

    const catalog = new CatalogService(new GeoTextQueryEngine(mongo, mongo), mongo);
    const { client } = createFakeAxios((req) => agentReply(req));
    const agent = new AgentService(client, 'http://agent.test', catalog);

    app = createApp({
      getCatalogService: async () => catalog,
      getAgentService: async () => agent,
      health: { healthCheckAll: async () => health },
    });
  });

  describe('health', () => {
    it('GET /health reports healthy', async () => {
      const res = await request(app).get('/health');

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('healthy');
    });

    it('GET /health/resources returns the per-resource map', async () => {
      const res = await request(app).get('/health/resources');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: 'healthy', resources: { mongo: true, http: true } });
    });

    it('GET /health/resources answers 503 when a resource is unhealthy', async () => {
      health = { mongo: true, http: false };

      const res = await request(app).get('/health/resources');

      expect(res.status).toBe(503);
      expect(res.body).toEqual({ status: 'degraded', resources: { mongo: true, http: false } });
    });
  });

  describe('catalog', () => {
    it('rejects an out-of-range longitude with issue details', async () => {
      const res = await request(app).post('/catalog/list/store').send({ location: [200, 25] });

      expect(res.status).toBe(400);
      expect(res.body.code).toBe('BAD_REQUEST');
      expect(res.body.message).toBe('Validation failed');
      expect(res.body.context.details).toEqual([
        { path: 'location.0', message: 'Longitude must be between -180 and 180' },
      ]);
      expect(mongo.aggregateCalls).toHaveLength(0);
    });

    it('rejects a malformed JSON body', async () => {
      const res = await request(app)
        .post('/catalog/list/store')
        .set('Content-Type', 'application/json')
        .send('{"location": [121.5,');

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Malformed JSON body');
    });

    it('lists stores with their menus', async () => {
      mongo.replyToAggregate(
        [{ store_id: 'store-a', platform: 'ubereats', name: 'Leaf Tea', distance_in_meter: 100, distance_in_km: 0.1 }],
        [{ item_id: 'item-1', store_id: 'store-a', platform: 'ubereats', name: 'Green Tea', price: 40 }]
      );

      const res = await request(app).post('/catalog/list/store').send({ location: [121.56, 25.04] });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        data: [
          {
            store_id: 'store-a',
            platform: 'ubereats',
            name: 'Leaf Tea',
            distance_in_meter: 100,
            distance_in_km: 0.1,
            store_url: 'https://www.ubereats.com/tw/store/store-a',
            menu: [{ item_id: 'item-1', store_id: 'store-a', platform: 'ubereats', name: 'Green Tea', price: 40 }],
          },
        ],
      });
    });

    it('rejects a zero limit on drink listings', async () => {
      const res = await request(app).post('/catalog/list/drink?limit=0').send({ location: [121.56, 25.04] });

      expect(res.status).toBe(400);
      expect(res.body.context.details[0].path).toBe('limit');
    });

    it('passes the limit query through to the menu query', async () => {
      mongo.replyToAggregate(
        [{ store_id: 'store-a', platform: 'ubereats', name: 'Leaf Tea', distance_in_meter: 100, distance_in_km: 0.1 }],
        []
      );

      const res = await request(app).post('/catalog/list/drink?limit=7').send({ location: [121.56, 25.04] });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ data: [] });
      const menuPipeline = mongo.aggregateCalls[1].pipeline;
      expect(menuPipeline[menuPipeline.length - 1]).toEqual({ $limit: 7 });
    });

    it('finds nearby stores with the default 5 km radius', async () => {
      const res = await request(app).get('/catalog/store/nearby?longitude=121.5&latitude=25');

      expect(res.status).toBe(200);
      expect(mongo.aggregateCalls[0].pipeline[0].$geoNear.maxDistance).toBe(5000);
    });

    it('searches menu items by name within the listed stores', async () => {
      const res = await request(app).get('/catalog/menu/search?term=Oolong&platform=ubereats&store_ids=store-a,%20store-b');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ data: [] });
      expect(mongo.aggregateCalls[0].pipeline[0]).toEqual({
        $match: {
          name: { $regex: 'Oolong', $options: 'i' },
          store_id: { $in: ['store-a', 'store-b'] },
          platform: 'ubereats',
        },
      });
      expect(mongo.aggregateCalls[0].pipeline[2]).toEqual({ $limit: 50 });
    });

    it('requires a search term', async () => {
      const res = await request(app).get('/catalog/menu/search');

      expect(res.status).toBe(400);
      expect(res.body.context.details[0].path).toBe('term');
    });

    it('answers 404 for an unknown store', async () => {
      const res = await request(app).get('/catalog/store/ubereats/missing');

      expect(res.status).toBe(404);
      expect(res.body.message).toBe("Store with identifier 'missing' not found");
    });

    it('rejects an unsupported platform in the store path', async () => {
      const res = await request(app).get('/catalog/store/deliveroo/abc');

      expect(res.status).toBe(400);
      expect(res.body.context.details[0].path).toBe('platform');
    });

    it('reports a resource that cannot start as 503', async () => {
      const failing = createApp({
        getCatalogService: async () => {
          throw new ResourceInitializationError('mongo', new Error('connect ECONNREFUSED'));
        },
        getAgentService: async () => {
          throw new ResourceInitializationError('http', new Error('unused'));
        },
        health: { healthCheckAll: async () => ({}) },
      });

      const res = await request(failing).get('/catalog/list/company');

      expect(res.status).toBe(503);
      expect(res.body.code).toBe('RESOURCE_INITIALIZATION_ERROR');
    });
  });

  describe('agent', () => {
    it('rejects an unknown chat type', async () => {
      const res = await request(app).post('/agent/chat/small_talk').send(chatBody);

      expect(res.status).toBe(400);
      expect(res.body.context.details[0].path).toBe('chatType');
    });

    it('relays the runtime event stream', async () => {
      agentReply = (req) =>
        req.url.endsWith('/run')
          ? { status: 200, data: Readable.from(['data: {"partial":true}\n\n', 'data: {"partial":false}\n\n']) }
          : { status: 200, data: {} };

      const res = await request(app).post('/agent/chat/drink_preference_chat').send(chatBody);

      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toBe('text/event-stream');
      expect(res.text).toBe('data: {"partial":true}\n\ndata: {"partial":false}\n\n');
    });

    it('maps an unreachable runtime to 502', async () => {
      agentReply = () => {
        throw new Error('connect ECONNREFUSED');
      };

      const res = await request(app).post('/agent/chat/drink_preference_chat').send(chatBody);

      expect(res.status).toBe(502);
      expect(res.body.code).toBe('EXTERNAL_SERVICE_ERROR');
    });

    it('returns the recommendation and its candidate drinks', async () => {
      agentReply = (req) =>
        req.url.endsWith('/run')
          ? { status: 200, data: [{ content: { parts: [{ text: '{"state":{"final_recommendation":"試試綠茶"}}' }] } }] }
          : { status: 200, data: {} };

      const res = await request(app)
        .post('/agent/recommend')
        .send({ location: [121.56, 25.04], user_id: 'u-1', session_id: 's-1' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ message: '試試綠茶', drinks: [] });
    });
  });

  it('answers 404 for unknown routes and echoes the request id', async () => {
    const res = await request(app).get('/nope').set('X-Request-ID', 'req-123');

    expect(res.status).toBe(404);
    expect(res.headers['x-request-id']).toBe('req-123');
    expect(res.body.code).toBe('NOT_FOUND');
  });
});
