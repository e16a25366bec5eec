import fs from 'node:fs/promises';
import path from 'node:path';
import { isoNow, type ConversationListEntry, type ConversationState } from '@semantix/shared';
import type { ConversationRepository } from '@semantix/store';
import { Conversation, parseState, type ConversationOptions } from './conversation.js';

const DEFAULT_CONVERSATIONS_DIR = '.semantix/conversations';

/**
 * Saves conversations as JSON files under a directory, or through the
 * SQLite conversation repository when one is given.
 */
export class ConversationStore {
  private dir: string;
  private repo?: ConversationRepository;

  constructor(baseDir?: string, repo?: ConversationRepository) {
    this.dir = baseDir ?? path.join(process.cwd(), DEFAULT_CONVERSATIONS_DIR);
    this.repo = repo;
  }

  async ensureDir(): Promise<void> {
    if (!this.repo) {
      await fs.mkdir(this.dir, { recursive: true });
    }
  }

  async save(conversation: Conversation): Promise<void> {
    const state: ConversationState = { ...conversation.toState(), updatedAt: isoNow() };

    if (this.repo) {
      this.repo.save(state);
      return;
    }

    await this.ensureDir();
    await fs.writeFile(this.filePath(state.id), JSON.stringify(state, null, 2), 'utf-8');
  }

  async load(id: string, options: Omit<ConversationOptions, 'id' | 'tokenRatio'> = {}): Promise<Conversation | null> {
    const state = await this.loadState(id);
    return state ? Conversation.fromState(state, options) : null;
  }

  async list(): Promise<ConversationListEntry[]> {
    if (this.repo) {
      return this.repo.list();
    }

    await this.ensureDir();
    const files = (await fs.readdir(this.dir)).filter(file => file.endsWith('.json'));

    const entries: ConversationListEntry[] = [];
    for (const file of files) {
      const source = path.join(this.dir, file);
      const state = parseState(await fs.readFile(source, 'utf-8'), source);
      entries.push({
        id: state.id,
        createdAt: state.createdAt,
        updatedAt: state.updatedAt,
        turnCount: state.turns.length,
        preview: state.turns[0]?.content.slice(0, 100) ?? '',
      });
    }

    return entries.sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }

  async delete(id: string): Promise<boolean> {
    if (this.repo) {
      return this.repo.delete(id);
    }

    try {
      await fs.unlink(this.filePath(id));
      return true;
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
  }

  private async loadState(id: string): Promise<ConversationState | null> {
    if (this.repo) {
      return this.repo.load(id);
    }

    const source = this.filePath(id);
    try {
      return parseState(await fs.readFile(source, 'utf-8'), source);
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
  }

  private filePath(id: string): string {
    return path.join(this.dir, `${id}.json`);
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
