import fs from 'node:fs/promises';
import path from 'node:path';
import {
  conversationStateSchema,
  NotFoundError,
  SemantixError,
  generateId,
  isoNow,
  type ConversationState,
  type ConversationTurn,
} from '@semantix/shared';
import { Expression } from './expression.js';
import { TokenBudgetMemory, type TokenBudgetMemoryOptions } from './memory/token-budget.js';
import type { SemanticValue } from './value.js';

export interface ConversationOptions extends TokenBudgetMemoryOptions {
  id?: string;
}

/**
 * A stateful dispatch session. Each message is stored in a token-budgeted
 * memory and answered by a query over that memory; the reply is stored too.
 */
export class Conversation extends Expression<SemanticValue> {
  static typeTag = 'Conversation';

  readonly id: string;
  readonly memory: TokenBudgetMemory;
  private created: string;
  private turns: ConversationTurn[] = [];
  private updated: string;

  constructor(options: ConversationOptions = {}) {
    super(undefined, options);
    this.id = options.id ?? generateId('conv');
    this.memory = new TokenBudgetMemory({ ...options, runtime: this.runtime });
    this.created = isoNow();
    this.updated = this.created;
  }

  get createdAt(): string {
    return this.created;
  }

  get history(): readonly ConversationTurn[] {
    return this.turns;
  }

  get updatedAt(): string {
    return this.updated;
  }

  async forward(message: string): Promise<SemanticValue> {
    this.record('user', message);
    await this.memory.store(`user: ${message}`);

    const reply = await this.memory.recall(message);
    const text = reply.toString();

    this.record('assistant', text);
    await this.memory.store(`assistant: ${text}`);
    return reply;
  }

  toState(): ConversationState {
    return {
      id: this.id,
      createdAt: this.createdAt,
      updatedAt: this.updated,
      typeTag: this.typeTag,
      memory: this.memory.contents,
      tokenRatio: this.memory.tokenRatio,
      turns: this.turns.map(turn => ({ ...turn })),
      dynamicContext: [...this.runtime.contexts.get(this.typeTag)],
    };
  }

  /** Rebuild a conversation; its saved dynamic context replaces the live one. */
  static fromState(state: ConversationState, options: Omit<ConversationOptions, 'id' | 'tokenRatio'> = {}): Conversation {
    const conversation = new Conversation({ ...options, id: state.id, tokenRatio: state.tokenRatio });
    conversation.created = state.createdAt;
    conversation.updated = state.updatedAt;
    conversation.turns = state.turns.map(turn => ({ ...turn }));
    conversation.memory.restore(state.memory);
    conversation.runtime.contexts.set(state.typeTag, state.dynamicContext);
    return conversation;
  }

  async save(filePath: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(this.toState(), null, 2), 'utf-8');
  }

  static async load(filePath: string, options: Omit<ConversationOptions, 'id' | 'tokenRatio'> = {}): Promise<Conversation> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        throw new NotFoundError('Conversation file', filePath);
      }
      throw err;
    }
    return Conversation.fromState(parseState(content, filePath), options);
  }

  private record(role: ConversationTurn['role'], content: string): void {
    this.updated = isoNow();
    this.turns.push({ role, content, timestamp: this.updated });
  }
}

export function parseState(content: string, source: string): ConversationState {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new SemantixError(`${source} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  const result = conversationStateSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new SemantixError(`${source} is not a saved conversation: ${issues}`);
  }
  return result.data;
}
