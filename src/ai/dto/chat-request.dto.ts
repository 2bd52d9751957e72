import { z } from 'zod';

/**
 * Represents a prior turn supplied by the client to rebuild conversation state.
 */
export const ChatHistoryItemSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});

/**
 * Request body for both chat endpoints. Blank messages are rejected before
 * the planning loop is entered.
 */
export const ChatRequestSchema = z.object({
  message: z
    .string({ required_error: 'message is required' })
    .refine((value) => value.trim().length > 0, 'message must not be empty'),
  history: z.array(ChatHistoryItemSchema).max(50).default([]),
});

export type ChatHistoryItemDto = z.infer<typeof ChatHistoryItemSchema>;
export type ChatRequestDto = z.infer<typeof ChatRequestSchema>;
