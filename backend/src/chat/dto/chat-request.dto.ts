import { z } from 'zod';

export const chatMessageRoleSchema = z.enum(['user', 'assistant']);

export const chatHistoryMessageSchema = z.object({
  role: chatMessageRoleSchema,
  content: z.string().max(8000),
});

export const chatRequestSchema = z.object({
  question: z.string().trim().min(1, 'question is required').max(4000),
  topK: z.number().int().min(1).max(50).optional(),
  history: z.array(chatHistoryMessageSchema).max(20).optional(),
  stream: z.boolean().default(true),
});

export type ChatMessageRole = z.infer<typeof chatMessageRoleSchema>;
export type ChatMessageDto = z.infer<typeof chatHistoryMessageSchema>;
export type ChatRequestDto = z.input<typeof chatRequestSchema>;
