import type { SemantixConfig } from './types/config.js';

/** Separates stored entries inside a token-budgeted memory buffer. */
export const MEMORY_MARKER = '[--++=|=++--]';

export const DEFAULT_INDEX_NAME = 'dataindex';

export const DEFAULT_TOP_K = 5;

export const DEFAULT_TOKEN_RATIO = 0.6;

/**
 * Keys that configure an operation or a backend. Callers may not pass them
 * as backend overrides.
 */
export const RESERVED_OVERRIDE_KEYS: readonly string[] = [
  'kind',
  'capability',
  'instruction',
  'examples',
  'preProcessors',
  'postProcessors',
  'stop',
  'returns',
  'encode',
  'apiKey',
  'baseUrl',
  'model',
  'provider',
];

/** Context windows in tokens. Unknown models fall back to DEFAULT_CONTEXT_WINDOW. */
export const MODEL_CONTEXT_WINDOWS: Record<string, number> = {
  // OpenAI
  'gpt-4o-mini': 128_000,
  'gpt-4o': 128_000,
  'gpt-4-turbo': 128_000,
  'gpt-4': 8_192,
  'gpt-3.5-turbo': 16_385,
  // Ollama (local)
  'llama3.2:3b': 131_072,
  'llama3.2:1b': 131_072,
  'mistral:7b': 32_768,
  'qwen2.5:7b': 32_768,
  'phi-3:mini': 4_096,
};

export const DEFAULT_CONTEXT_WINDOW = 4_096;

export const DEFAULT_CONFIG: SemantixConfig = {
  reasoning: {
    provider: 'openai',
    model: 'gpt-4o-mini',
    temperature: 0,
  },
  embedding: {
    provider: 'openai',
    model: 'text-embedding-3-small',
  },
  indexing: {
    provider: 'memory',
    topK: DEFAULT_TOP_K,
  },
  memory: {
    tokenRatio: DEFAULT_TOKEN_RATIO,
    windowSize: 10,
    maxSize: 1000,
  },
  logging: {
    level: 'info',
    traceOutput: 'memory',
  },
  store: {},
};
