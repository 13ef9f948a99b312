/**
 * AgentService
 *
 * Client of the agent runtime, the HTTP service that hosts the LLM chat apps.
 * Sessions are addressed as /apps/{app}/users/{user}/sessions/{session} and
 * every turn is a POST /run, either buffered or streamed back as SSE.
 */

import type { Readable } from 'stream';
import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { z } from 'zod';
import { createChildLogger } from '../../utils/logger.js';
import { ExternalServiceError } from '../../types/errors.js';
import type { Drink } from '../../types/catalog.js';
import type { ChatMessage, ChatPayload, RecommendPayload } from '../../validation/agentSchemas.js';
import type { CatalogService } from '../catalog/CatalogService.js';

const log = createChildLogger({ component: 'AgentService' });

const SERVICE_NAME = 'agent';
const RECOMMENDATION_CANDIDATES = 100;
const PROMPT_DRINK_COUNT = 3;

export const RECOMMENDATION_FALLBACK_MESSAGE =
  '抱歉，系統發生錯誤，可能是 LLM 服務呼叫過於頻繁，請稍後再試。若持續發生，請聯絡開發者。';

const runEventSchema = z.object({
  content: z
    .object({
      parts: z.array(z.object({ text: z.string().optional() })).default([]),
    })
    .nullish(),
});

const runEventsSchema = z.array(runEventSchema);

const finalRecommendationSchema = z.object({
  state: z.object({ final_recommendation: z.string() }),
});

export interface RecommendationDrink {
  name: string;
  store_name: string;
  description: string;
}

export interface RecommendationResult {
  message: string;
  drinks: Drink[];
}

/**
 * One "role: content" line per message
 */
export function chatsToTranscript(chats: ChatMessage[]): string {
  return chats.map((chat) => `${chat.role}: ${chat.content}`).join('\n');
}

export function buildRecommendationPrompt(responsePreference: string, drinks: RecommendationDrink[]): string {
  return [
    '# 使用者的回應風格偏好',
    responsePreference,
    '',
    '# 飲料清單',
    JSON.stringify(drinks),
    '',
    '請依據以上資料，推薦適合的飲料給使用者。',
  ].join('\n');
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/**
 * Pull the recommendation out of the agent's final reply: the
 * `state.final_recommendation` of a JSON reply, else the text inside the
 * first pair of triple quotes, else the whole reply trimmed.
 */
export function extractRecommendation(raw: string): string {
  const structured = finalRecommendationSchema.safeParse(parseJson(raw));
  if (structured.success) {
    return structured.data.state.final_recommendation;
  }

  for (const fence of ['"""', "'''"]) {
    const parts = raw.split(fence);
    if (parts.length > 1) {
      return parts[1].trim();
    }
  }
  return raw.trim();
}

/**
 * Text of the first part of the last event in a buffered /run reply
 */
export function lastEventText(data: unknown): string {
  const parsed = runEventsSchema.safeParse(data);
  const lastEvent = parsed.success ? parsed.data[parsed.data.length - 1] : undefined;
  const text = lastEvent?.content?.parts[0]?.text;
  if (text === undefined) {
    throw new ExternalServiceError(SERVICE_NAME, 'Run reply carried no text', {
      events: parsed.success ? parsed.data.length : undefined,
    });
  }
  return text;
}

export class AgentService {
  private readonly baseUrl: string;

  constructor(
    private readonly http: AxiosInstance,
    baseUrl: string,
    private readonly catalog: CatalogService
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  /**
   * Fetch the session, creating it when the runtime does not know it yet
   */
  async initSession(appName: string, userId: string, sessionId: string): Promise<unknown> {
    const url = this.sessionUrl(appName, userId, sessionId);
    try {
      let response = await this.http.get<unknown>(url, { validateStatus: () => true });
      if (response.status === 404) {
        log.debug({ appName, userId, sessionId }, 'Creating agent session');
        response = await this.http.post<unknown>(url, undefined, { validateStatus: () => true });
      }
      if (response.status >= 400) {
        throw new ExternalServiceError(SERVICE_NAME, `Session request failed with status ${response.status}`, {
          appName,
          sessionId,
          status: response.status,
        });
      }
      return response.data;
    } catch (error) {
      throw this.wrap(error, 'Session request failed');
    }
  }

  /**
   * Run one turn and buffer the whole reply. Non-2xx replies are returned,
   * not thrown, so callers can fall back.
   */
  async runApp(
    appName: string,
    userId: string,
    sessionId: string,
    message: ChatMessage
  ): Promise<AxiosResponse<unknown>> {
    try {
      return await this.http.post<unknown>(`${this.baseUrl}/run`, this.runBody(appName, userId, sessionId, message, false), {
        validateStatus: () => true,
      });
    } catch (error) {
      throw this.wrap(error, 'Run request failed');
    }
  }

  /**
   * Run one turn with streaming on; resolves once the runtime starts answering
   */
  async openStream(appName: string, userId: string, sessionId: string, message: ChatMessage): Promise<Readable> {
    try {
      const response = await this.http.post<Readable>(
        `${this.baseUrl}/run`,
        this.runBody(appName, userId, sessionId, message, true),
        { responseType: 'stream' }
      );
      return response.data;
    } catch (error) {
      throw this.wrap(error, 'Streaming run failed');
    }
  }

  async chat(payload: ChatPayload): Promise<Readable> {
    await this.initSession(payload.app_name, payload.user_id, payload.session_id);
    return this.openStream(payload.app_name, payload.user_id, payload.session_id, payload.message);
  }

  async recommend(payload: RecommendPayload): Promise<RecommendationResult> {
    const { data: drinks } = await this.catalog.listDrinks(
      {
        location: payload.location,
        drink_tags: payload.drink_tags,
        brands: payload.brands,
        review_count_range: null,
        rating_range: null,
        distance_range: null,
        platform: 'ubereats',
      },
      RECOMMENDATION_CANDIDATES
    );

    const prompt = buildRecommendationPrompt(
      chatsToTranscript(payload.response_preference_chats),
      drinks.slice(0, PROMPT_DRINK_COUNT).map((drink) => ({
        name: drink.name,
        store_name: drink.store_name,
        description: drink.description ?? '',
      }))
    );

    await this.initSession(payload.app_name, payload.user_id, payload.session_id);
    const response = await this.runApp(payload.app_name, payload.user_id, payload.session_id, {
      role: 'user',
      content: prompt,
    });

    if (response.status !== 200) {
      log.error(
        { status: response.status, appName: payload.app_name, sessionId: payload.session_id },
        'Agent run failed, returning fallback recommendation'
      );
      return { message: RECOMMENDATION_FALLBACK_MESSAGE, drinks };
    }

    return { message: extractRecommendation(lastEventText(response.data)), drinks };
  }

  private sessionUrl(appName: string, userId: string, sessionId: string): string {
    const segments = [appName, userId, sessionId].map(encodeURIComponent);
    return `${this.baseUrl}/apps/${segments[0]}/users/${segments[1]}/sessions/${segments[2]}`;
  }

  private runBody(appName: string, userId: string, sessionId: string, message: ChatMessage, streaming: boolean) {
    return {
      appName,
      userId,
      sessionId,
      newMessage: {
        parts: [{ text: message.content }],
        role: message.role,
      },
      streaming,
    };
  }

  private wrap(error: unknown, message: string): Error {
    if (error instanceof ExternalServiceError) {
      return error;
    }
    const context = axios.isAxiosError(error) ? { code: error.code, status: error.response?.status } : undefined;
    return new ExternalServiceError(SERVICE_NAME, message, context, error);
  }
}
