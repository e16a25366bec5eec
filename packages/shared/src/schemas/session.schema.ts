import { z } from 'zod';

export const conversationTurnSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  timestamp: z.string(),
});

export const conversationStateSchema = z.object({
  id: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  typeTag: z.string().min(1),
  memory: z.string(),
  tokenRatio: z.number().gt(0).max(1),
  turns: z.array(conversationTurnSchema),
  dynamicContext: z.array(z.string()),
});
