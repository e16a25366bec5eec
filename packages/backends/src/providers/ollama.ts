import { z } from 'zod';
import {
  BackendError,
  Capability,
  type BackendInput,
  type BackendProperties,
  type BackendReply,
  type BackendSettings,
  type CapabilityName,
  type EmbedInput,
  type InvokeOptions,
  type PromptInput,
} from '@semantix/shared';
import { Backend } from '../backend.js';
import { resolveMaxTokens } from '../limits.js';
import { remoteOverridesSchema, remoteSettingsSchema } from '../settings.js';

const chatResponseSchema = z.object({
  model: z.string(),
  message: z.object({ role: z.string(), content: z.string() }).optional(),
  done: z.boolean(),
});

const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

export interface OllamaBackendConfig {
  baseUrl?: string;
  model?: string;
  capabilities?: CapabilityName[];
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

export class OllamaBackend extends Backend {
  readonly name = 'ollama';
  readonly capabilities: CapabilityName[];

  private baseUrl: string;
  private model: string;
  private temperature: number;
  private maxTokens?: number;
  private timeoutMs?: number;

  constructor(config: OllamaBackendConfig = {}) {
    super();
    this.capabilities = config.capabilities ?? [Capability.Reasoning, Capability.Embedding];
    this.baseUrl = config.baseUrl ?? 'http://localhost:11434';
    this.model = config.model ?? 'llama3.2:3b';
    this.temperature = config.temperature ?? 0;
    this.maxTokens = config.maxTokens;
    this.timeoutMs = config.timeoutMs;
  }

  async invoke(input: BackendInput, options: InvokeOptions): Promise<BackendReply> {
    switch (input.kind) {
      case 'prompt':
        return this.chat(input, options);
      case 'embed':
        return this.embed(input, options);
      default:
        throw new BackendError(this.name, `unsupported input kind '${input.kind}'`);
    }
  }

  properties(): BackendProperties {
    return {
      model: this.model,
      maxTokens: resolveMaxTokens(this.model, this.maxTokens),
    };
  }

  command(settings: BackendSettings): void {
    const parsed = remoteSettingsSchema.safeParse(settings);
    if (!parsed.success) {
      throw new BackendError(this.name, `invalid settings: ${parsed.error.issues.map(i => i.message).join('; ')}`);
    }
    const next = parsed.data;
    if (next.baseUrl !== undefined) this.baseUrl = next.baseUrl;
    if (next.model !== undefined) this.model = next.model;
    if (next.temperature !== undefined) this.temperature = next.temperature;
    if (next.maxTokens !== undefined) this.maxTokens = next.maxTokens;
    if (next.timeoutMs !== undefined) this.timeoutMs = next.timeoutMs;
  }

  private async chat(input: PromptInput, options: InvokeOptions): Promise<string> {
    const overrides = this.parseOverrides(options);

    const body = {
      model: this.model,
      messages: [{ role: 'user', content: input.text }],
      stream: false,
      options: {
        temperature: overrides.temperature ?? this.temperature,
        ...(overrides.maxOutputTokens !== undefined ? { num_predict: overrides.maxOutputTokens } : {}),
        ...(options.stop.length > 0 ? { stop: options.stop } : {}),
      },
    };

    const data = await this.post('/api/chat', body, overrides.timeoutMs);
    const parsed = chatResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new BackendError(this.name, 'malformed chat response');
    }
    return parsed.data.message?.content ?? '';
  }

  private async embed(input: EmbedInput, options: InvokeOptions): Promise<number[][]> {
    const overrides = this.parseOverrides(options);

    const data = await this.post('/api/embed', { model: this.model, input: input.texts }, overrides.timeoutMs);
    const parsed = embedResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new BackendError(this.name, 'malformed embed response');
    }
    return parsed.data.embeddings;
  }

  private async post(path: string, body: unknown, timeoutMs?: number): Promise<unknown> {
    const timeout = timeoutMs ?? this.timeoutMs;

    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}${path}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        ...(timeout !== undefined ? { signal: AbortSignal.timeout(timeout) } : {}),
      });
    } catch (err) {
      throw new BackendError(this.name, err instanceof Error ? err.message : String(err), err);
    }

    if (!res.ok) {
      const text = await this.readBody(() => res.text());
      throw new BackendError(this.name, `Ollama API error (${res.status}): ${text}`);
    }

    return this.readBody((): Promise<unknown> => res.json());
  }

  /** Body read or parse failures are transport failures too. */
  private async readBody<T>(read: () => Promise<T>): Promise<T> {
    try {
      return await read();
    } catch (err) {
      throw new BackendError(this.name, `unreadable response: ${err instanceof Error ? err.message : String(err)}`, err);
    }
  }

  private parseOverrides(options: InvokeOptions) {
    const parsed = remoteOverridesSchema.safeParse(options.overrides);
    if (!parsed.success) {
      throw new BackendError(this.name, `invalid overrides: ${parsed.error.issues.map(i => i.message).join('; ')}`);
    }
    return parsed.data;
  }
}
