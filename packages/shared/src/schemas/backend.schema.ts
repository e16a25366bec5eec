import { z } from 'zod';

export const vectorMetadataSchema = z.object({ text: z.string() }).passthrough();

export const vectorMatchSchema = z.object({
  score: z.number(),
  metadata: vectorMetadataSchema,
});

