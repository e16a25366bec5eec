export type ReasoningProviderName = 'openai' | 'ollama' | 'none';

export type EmbeddingProviderName = 'openai' | 'ollama' | 'none';

export type IndexingProviderName = 'memory' | 'sqlite';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ReasoningConfig {
  provider: ReasoningProviderName;
  apiKey?: string;
  baseUrl?: string;
  model: string;
  /** Overrides the model table when the context window is known */
  maxTokens?: number;
  temperature?: number;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderName;
  apiKey?: string;
  baseUrl?: string;
  model: string;
}

export interface IndexingConfig {
  provider: IndexingProviderName;
  topK: number;
}

export interface MemoryConfig {
  tokenRatio: number;
  windowSize: number;
  maxSize: number;
}

export interface LoggingConfig {
  level: LogLevel;
  traceOutput: 'memory' | 'console';
}

export interface StoreConfig {
  dbPath?: string;
  sessionsDir?: string;
  dumpDir?: string;
}

export interface SemantixConfig {
  reasoning: ReasoningConfig;
  embedding: EmbeddingConfig;
  indexing: IndexingConfig;
  memory: MemoryConfig;
  logging: LoggingConfig;
  store: StoreConfig;
}
