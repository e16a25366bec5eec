import { z } from 'zod';

/** Settings a remote backend accepts through `command`. */
export const remoteSettingsSchema = z.object({
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  model: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export type RemoteSettings = z.infer<typeof remoteSettingsSchema>;

/** Per-call overrides a remote backend understands. Unknown keys are ignored. */
export const remoteOverridesSchema = z.object({
  temperature: z.number().min(0).max(2).optional(),
  maxOutputTokens: z.number().int().positive().optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export type RemoteOverrides = z.infer<typeof remoteOverridesSchema>;
