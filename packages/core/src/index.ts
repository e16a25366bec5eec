// ── Values & dispatch ────────────────────────────────────────────
export { SemanticValue, isPlainObject, renderPayload, unwrap } from './value.js';
export type { ValueOptions, ItemKey } from './value.js';
export { Expression } from './expression.js';
export { Dispatcher } from './dispatcher.js';
export { resolveOperation, compareOperation, logicOperation, indexOperation } from './operations.js';
export type { Operation, ResolvedOperation } from './operations.js';
export {
  template,
  strip,
  parseBoolean,
  parseList,
  parseVectors,
  parseMatches,
  expectBoolean,
  expectCount,
} from './processors.js';
export type { DispatchRequest, PreProcessor, PostProcessor } from './processors.js';
export { renderPrompt } from './prompt.js';
export type { PromptParts } from './prompt.js';
export { ContextRegistry, renderStaticContext } from './context-registry.js';

// ── Runtime ──────────────────────────────────────────────────────
export { SemanticRuntime, initializeRuntime, getRuntime, resetRuntime } from './runtime.js';
export type { RuntimeOptions } from './runtime.js';
export { createRuntimeFromConfig, initializeRuntimeFromConfig } from './bootstrap.js';
export type { BootstrapOptions } from './bootstrap.js';
export { TiktokenTokenizer, WhitespaceTokenizer } from './tokenizer.js';
export type { Tokenizer } from './tokenizer.js';
export { TraceLogger } from './trace-logger.js';
export type { TraceLoggerOptions } from './trace-logger.js';
export { ConfigManager, CONFIG_FILE_NAMES, deepMerge } from './config-manager.js';
export type { ConfigManagerOptions } from './config-manager.js';

// ── Memory ───────────────────────────────────────────────────────
export { Memory } from './memory/memory.js';
export { TokenBudgetMemory } from './memory/token-budget.js';
export type { TokenBudgetMemoryOptions } from './memory/token-budget.js';
export { SlidingWindowListMemory } from './memory/sliding-window.js';
export type { SlidingWindowListMemoryOptions } from './memory/sliding-window.js';
export { VectorMemory } from './memory/vector-memory.js';
export type { VectorMemoryOptions } from './memory/vector-memory.js';

// ── Retrieval ────────────────────────────────────────────────────
export { ParagraphFormatter } from './retrieval/paragraph-formatter.js';
export type { Formatter, ParagraphFormatterOptions } from './retrieval/paragraph-formatter.js';
export { FileReader } from './retrieval/file-reader.js';
export { Indexer } from './retrieval/indexer.js';
export type { IndexerOptions } from './retrieval/indexer.js';
export { DocumentRetriever } from './retrieval/document-retriever.js';
export type { DocumentSource, DocumentRetrieverOptions } from './retrieval/document-retriever.js';

// ── Conversations ────────────────────────────────────────────────
export { Conversation, parseState } from './conversation.js';
export type { ConversationOptions } from './conversation.js';
export { ConversationStore } from './conversation-store.js';
