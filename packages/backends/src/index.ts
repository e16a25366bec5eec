export { Backend } from './backend.js';
export { BackendRegistry } from './registry.js';
export type { RegistryChange, RegistryListener } from './registry.js';
export { getContextWindow, resolveMaxTokens } from './limits.js';
export { remoteSettingsSchema, remoteOverridesSchema } from './settings.js';
export type { RemoteSettings, RemoteOverrides } from './settings.js';
export { createBackendsFromConfig, createRegistryFromConfig } from './factory.js';
export type { BackendFactoryOptions } from './factory.js';
export { OpenAIBackend } from './providers/openai.js';
export type { OpenAIBackendConfig } from './providers/openai.js';
export { OllamaBackend } from './providers/ollama.js';
export type { OllamaBackendConfig } from './providers/ollama.js';
export { MemoryVectorIndex } from './providers/memory-index.js';
export { SqliteVectorIndex } from './providers/sqlite-index.js';
