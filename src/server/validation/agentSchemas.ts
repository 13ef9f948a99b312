import { z } from 'zod';
import { locationSchema } from './catalogSchemas.js';

export const chatTypeSchema = z.enum(['drink_preference_chat', 'response_preference_chat', 'recommend']);

export const chatMessageSchema = z.object({
  role: z.string().min(1),
  content: z.string(),
});

export type ChatMessage = z.infer<typeof chatMessageSchema>;

export const chatPayloadSchema = z.object({
  app_name: z.string().min(1),
  user_id: z.string().min(1),
  session_id: z.string().min(1),
  chat_type: chatTypeSchema,
  message: chatMessageSchema,
});

export type ChatPayload = z.infer<typeof chatPayloadSchema>;

export const chatParamsSchema = z.object({
  chatType: chatTypeSchema,
});

export const recommendPayloadSchema = z.object({
  location: locationSchema,
  drink_tags: z.array(z.string().trim().min(1)).default([]),
  brands: z.array(z.string().trim().min(1)).default([]),
  response_preference_chats: z.array(chatMessageSchema).default([]),
  drink_preference_chats: z.array(chatMessageSchema).default([]),
  user_id: z.string().min(1),
  session_id: z.string().min(1),
  app_name: z.string().min(1).default('recommend'),
});

export type RecommendPayload = z.infer<typeof recommendPayloadSchema>;
