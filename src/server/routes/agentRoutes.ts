import express, { Router } from 'express';
import { asyncHandler } from '../utils/errorHandling.js';
import { logger } from '../utils/logger.js';
import { parseOrBadRequest, validate } from '../middleware/validation.js';
import {
  chatParamsSchema,
  chatPayloadSchema,
  recommendPayloadSchema,
  type ChatPayload,
  type RecommendPayload,
} from '../validation/agentSchemas.js';
import type { AgentService } from '../services/agent/AgentService.js';

export function createAgentRouter(getAgentService: () => Promise<AgentService>): Router {
  const router = express.Router();

  // POST /agent/chat/:chatType
  // Relays the agent runtime's event stream to the client as-is
  router.post(
    '/chat/:chatType',
    validate({ body: chatPayloadSchema }),
    asyncHandler(async (req, res) => {
      const { chatType } = parseOrBadRequest(chatParamsSchema, req.params);
      const payload: ChatPayload = req.body;
      const agent = await getAgentService();
      const stream = await agent.chat(payload);

      res.status(200);
      res.setHeader('Content-Type', 'text/event-stream');
      res.setHeader('Cache-Control', 'no-cache');
      res.setHeader('Connection', 'keep-alive');
      res.flushHeaders();

      // Stop reading from the runtime once the client side closes
      res.on('close', () => {
        stream.destroy();
      });
      stream.on('error', (error: Error) => {
        logger.warn({ chatType, sessionId: payload.session_id, error: error.message }, 'Agent stream failed');
        if (!res.writableEnded) {
          res.end();
        }
      });
      stream.pipe(res);
    })
  );

  // POST /agent/recommend
  router.post(
    '/recommend',
    validate({ body: recommendPayloadSchema }),
    asyncHandler(async (req, res) => {
      const payload: RecommendPayload = req.body;
      const agent = await getAgentService();
      res.json(await agent.recommend(payload));
    })
  );

  return router;
}
