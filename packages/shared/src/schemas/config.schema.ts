import { z } from 'zod';

export const reasoningConfigSchema = z.object({
  provider: z.enum(['openai', 'ollama', 'none']).default('openai'),
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  model: z.string().min(1).default('gpt-4o-mini'),
  maxTokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
});

export const embeddingConfigSchema = z.object({
  provider: z.enum(['openai', 'ollama', 'none']).default('openai'),
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  model: z.string().min(1).default('text-embedding-3-small'),
});

export const indexingConfigSchema = z.object({
  provider: z.enum(['memory', 'sqlite']).default('memory'),
  topK: z.number().int().positive().default(5),
});

export const memoryConfigSchema = z.object({
  tokenRatio: z.number().gt(0).max(1).default(0.6),
  windowSize: z.number().int().positive().default(10),
  maxSize: z.number().int().positive().default(1000),
});

export const loggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  traceOutput: z.enum(['memory', 'console']).default('memory'),
});

export const storeConfigSchema = z.object({
  dbPath: z.string().optional(),
  sessionsDir: z.string().optional(),
  dumpDir: z.string().optional(),
});

export const semantixConfigSchema = z.object({
  reasoning: reasoningConfigSchema.default({}),
  embedding: embeddingConfigSchema.default({}),
  indexing: indexingConfigSchema.default({}),
  memory: memoryConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
  store: storeConfigSchema.default({}),
});
