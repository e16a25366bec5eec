import type { OperationKind, Overrides } from './operation.js';

export enum Capability {
  Reasoning = 'reasoning',
  Embedding = 'embedding',
  Indexing = 'indexing',
}

/** Capabilities are open-ended; the built-in names live in {@link Capability}. */
export type CapabilityName = Capability | string;

export interface VectorMetadata {
  text: string;
  [key: string]: unknown;
}

export interface VectorEntryInput {
  vector: number[];
  metadata: VectorMetadata;
}

export interface VectorMatch {
  score: number;
  metadata: VectorMetadata;
}

export type IndexCommand =
  | { op: 'register'; index: string; overwrite: boolean }
  | { op: 'exists'; index: string }
  | { op: 'upsert'; index: string; entries: VectorEntryInput[] }
  | { op: 'query'; index: string; vector: number[]; topK: number }
  | { op: 'drop'; index: string };

export interface PromptInput {
  kind: 'prompt';
  /** Fully rendered request text */
  text: string;
  operation: OperationKind;
  /** String forms of the subject followed by each operand */
  args: string[];
}

export interface EmbedInput {
  kind: 'embed';
  texts: string[];
}

export interface IndexInput {
  kind: 'index';
  command: IndexCommand;
}

export type BackendInput = PromptInput | EmbedInput | IndexInput;

export interface InvokeOptions {
  stop: string[];
  overrides: Overrides;
}

/** Raw, unparsed backend output. Post-processors narrow it. */
export type BackendReply = unknown;

export interface BackendProperties {
  model?: string;
  /** Context window of the reasoning model, in tokens */
  maxTokens?: number;
  dimensions?: number;
}

/** Runtime settings accepted by `command` / `setup`. */
export type BackendSettings = Record<string, unknown>;
