import type { ConversationListEntry, SemantixConfig } from '@semantix/shared';
import type { BackendRegistry } from '@semantix/backends';

export function formatMatches(texts: string[]): string {
  if (texts.length === 0) return 'No matches.';
  return texts.map((text, i) => `${i + 1}. ${truncate(oneLine(text), 200)}`).join('\n');
}

/** One line per capability: name, backend and model. */
export function formatCapabilities(registry: BackendRegistry): string {
  const capabilities = registry.listCapabilities();
  if (capabilities.length === 0) return 'No capabilities configured.';

  const width = Math.max(...capabilities.map(c => c.length));
  return capabilities
    .map(capability => {
      const backend = registry.resolve(capability);
      const model = backend.properties().model;
      return `${capability.padEnd(width)}  ${backend.name}${model ? ` (${model})` : ''}`;
    })
    .join('\n');
}

export function formatConversationList(entries: ConversationListEntry[]): string {
  if (entries.length === 0) return 'No saved conversations.';
  return entries
    .map(entry => `${entry.id} | ${entry.turnCount} turns | ${entry.updatedAt} | ${truncate(oneLine(entry.preview), 60)}`)
    .join('\n');
}

/** Configuration with API keys masked. */
export function redactConfig(config: SemantixConfig): SemantixConfig {
  return {
    ...config,
    reasoning: { ...config.reasoning, apiKey: mask(config.reasoning.apiKey) },
    embedding: { ...config.embedding, apiKey: mask(config.embedding.apiKey) },
  };
}

function mask(key: string | undefined): string | undefined {
  if (!key) return key;
  return key.length <= 8 ? '****' : `${key.slice(0, 4)}****`;
}

export function truncate(str: string, max: number): string {
  if (str.length <= max) return str;
  return str.slice(0, max - 3) + '...';
}

function oneLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
