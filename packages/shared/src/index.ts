// ── Types ────────────────────────────────────────────────────────
export { OperationKind } from './types/operation.js';
export type { CompareOperator, LogicOperator, Overrides } from './types/operation.js';

export { Capability } from './types/backend.js';
export type {
  CapabilityName,
  VectorMetadata,
  VectorEntryInput,
  VectorMatch,
  IndexCommand,
  PromptInput,
  EmbedInput,
  IndexInput,
  BackendInput,
  InvokeOptions,
  BackendReply,
  BackendProperties,
  BackendSettings,
} from './types/backend.js';

export type {
  ReasoningProviderName,
  EmbeddingProviderName,
  IndexingProviderName,
  LogLevel,
  ReasoningConfig,
  EmbeddingConfig,
  IndexingConfig,
  MemoryConfig,
  LoggingConfig,
  StoreConfig,
  SemantixConfig,
} from './types/config.js';

export type { TraceEventType, TraceEvent, TraceSpan, DispatchTrace } from './types/trace.js';

export type { ConversationTurn, ConversationState, ConversationListEntry } from './types/session.js';

// ── Schemas ──────────────────────────────────────────────────────
export {
  reasoningConfigSchema,
  embeddingConfigSchema,
  indexingConfigSchema,
  memoryConfigSchema,
  loggingConfigSchema,
  storeConfigSchema,
  semantixConfigSchema,
} from './schemas/config.schema.js';
export { conversationTurnSchema, conversationStateSchema } from './schemas/session.schema.js';
export { vectorMetadataSchema, vectorMatchSchema } from './schemas/backend.schema.js';

// ── Constants & utils ────────────────────────────────────────────
export {
  MEMORY_MARKER,
  DEFAULT_INDEX_NAME,
  DEFAULT_TOP_K,
  DEFAULT_TOKEN_RATIO,
  RESERVED_OVERRIDE_KEYS,
  MODEL_CONTEXT_WINDOWS,
  DEFAULT_CONTEXT_WINDOW,
  DEFAULT_CONFIG,
} from './constants.js';

export * from './utils/index.js';
