import {
  Capability,
  ConfigurationError,
  type SemantixConfig,
} from '@semantix/shared';
import type { VectorRepository } from '@semantix/store';
import type { Backend } from './backend.js';
import { BackendRegistry } from './registry.js';
import { OpenAIBackend } from './providers/openai.js';
import { OllamaBackend } from './providers/ollama.js';
import { MemoryVectorIndex } from './providers/memory-index.js';
import { SqliteVectorIndex } from './providers/sqlite-index.js';

export interface BackendFactoryOptions {
  /** Required when `indexing.provider` is `sqlite` */
  vectors?: VectorRepository;
}

/**
 * Build the backends the configuration asks for. A remote provider without
 * credentials is left out, so its capability stays unresolved until
 * configured at runtime.
 */
export function createBackendsFromConfig(
  config: SemantixConfig,
  options: BackendFactoryOptions = {},
): Record<string, Backend> {
  const handles: Record<string, Backend> = {};

  const { reasoning, embedding, indexing } = config;

  if (reasoning.provider === 'openai' && reasoning.apiKey) {
    handles[Capability.Reasoning] = new OpenAIBackend({
      apiKey: reasoning.apiKey,
      baseUrl: reasoning.baseUrl,
      model: reasoning.model,
      capabilities: [Capability.Reasoning],
      temperature: reasoning.temperature,
      maxTokens: reasoning.maxTokens,
    });
  } else if (reasoning.provider === 'ollama') {
    handles[Capability.Reasoning] = new OllamaBackend({
      baseUrl: reasoning.baseUrl,
      model: reasoning.model,
      capabilities: [Capability.Reasoning],
      temperature: reasoning.temperature,
      maxTokens: reasoning.maxTokens,
    });
  }

  if (embedding.provider === 'openai' && embedding.apiKey) {
    handles[Capability.Embedding] = new OpenAIBackend({
      apiKey: embedding.apiKey,
      baseUrl: embedding.baseUrl,
      model: embedding.model,
      capabilities: [Capability.Embedding],
    });
  } else if (embedding.provider === 'ollama') {
    handles[Capability.Embedding] = new OllamaBackend({
      baseUrl: embedding.baseUrl,
      model: embedding.model,
      capabilities: [Capability.Embedding],
    });
  }

  if (indexing.provider === 'sqlite') {
    if (!options.vectors) {
      throw new ConfigurationError("indexing provider 'sqlite' needs a vector repository");
    }
    handles[Capability.Indexing] = new SqliteVectorIndex(options.vectors);
  } else {
    handles[Capability.Indexing] = new MemoryVectorIndex();
  }

  return handles;
}

export function createRegistryFromConfig(
  config: SemantixConfig,
  options: BackendFactoryOptions = {},
): BackendRegistry {
  const registry = new BackendRegistry();
  registry.setup(createBackendsFromConfig(config, options));
  return registry;
}
