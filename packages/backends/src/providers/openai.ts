import OpenAI from 'openai';
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

export interface OpenAIBackendConfig {
  apiKey: string;
  baseUrl?: string;
  model: string;
  capabilities?: CapabilityName[];
  temperature?: number;
  /** Context window override; otherwise taken from the model table */
  maxTokens?: number;
  timeoutMs?: number;
}

export class OpenAIBackend extends Backend {
  readonly name = 'openai';
  readonly capabilities: CapabilityName[];

  private client: OpenAI;
  private apiKey: string;
  private baseUrl?: string;
  private model: string;
  private temperature: number;
  private maxTokens?: number;
  private timeoutMs?: number;

  constructor(config: OpenAIBackendConfig) {
    super();
    this.capabilities = config.capabilities ?? [Capability.Reasoning, Capability.Embedding];
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl;
    this.model = config.model;
    this.temperature = config.temperature ?? 0;
    this.maxTokens = config.maxTokens;
    this.timeoutMs = config.timeoutMs;
    this.client = this.createClient();
  }

  async invoke(input: BackendInput, options: InvokeOptions): Promise<BackendReply> {
    switch (input.kind) {
      case 'prompt':
        return this.complete(input, options);
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
    if (next.model !== undefined) this.model = next.model;
    if (next.temperature !== undefined) this.temperature = next.temperature;
    if (next.maxTokens !== undefined) this.maxTokens = next.maxTokens;
    if (next.timeoutMs !== undefined) this.timeoutMs = next.timeoutMs;
    if (next.apiKey !== undefined || next.baseUrl !== undefined) {
      this.apiKey = next.apiKey ?? this.apiKey;
      this.baseUrl = next.baseUrl ?? this.baseUrl;
      this.client = this.createClient();
    }
  }

  private async complete(input: PromptInput, options: InvokeOptions): Promise<string> {
    const overrides = this.parseOverrides(options);

    const response = await this.call(() =>
      this.client.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: 'user', content: input.text }],
          temperature: overrides.temperature ?? this.temperature,
          ...(overrides.maxOutputTokens !== undefined ? { max_tokens: overrides.maxOutputTokens } : {}),
          ...(options.stop.length > 0 ? { stop: options.stop } : {}),
        },
        this.requestOptions(overrides.timeoutMs),
      ),
    );

    return response.choices[0]?.message?.content ?? '';
  }

  private async embed(input: EmbedInput, options: InvokeOptions): Promise<number[][]> {
    const overrides = this.parseOverrides(options);

    const response = await this.call(() =>
      this.client.embeddings.create(
        { model: this.model, input: input.texts },
        this.requestOptions(overrides.timeoutMs),
      ),
    );

    return [...response.data].sort((a, b) => a.index - b.index).map(d => d.embedding);
  }

  private parseOverrides(options: InvokeOptions) {
    const parsed = remoteOverridesSchema.safeParse(options.overrides);
    if (!parsed.success) {
      throw new BackendError(this.name, `invalid overrides: ${parsed.error.issues.map(i => i.message).join('; ')}`);
    }
    return parsed.data;
  }

  private requestOptions(timeoutMs?: number) {
    const timeout = timeoutMs ?? this.timeoutMs;
    return timeout !== undefined ? { timeout } : undefined;
  }

  private async call<T>(request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (err) {
      throw new BackendError(this.name, describe(err), err);
    }
  }

  private createClient(): OpenAI {
    return new OpenAI({
      apiKey: this.apiKey,
      ...(this.baseUrl ? { baseURL: this.baseUrl } : {}),
      // Retries belong to the caller
      maxRetries: 0,
    });
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
