import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { ConversationState, ConversationListEntry, ConversationTurn } from '@semantix/shared';

export interface ConversationRow {
  id: string;
  type_tag: string;
  memory: string;
  token_ratio: number;
  dynamic_ctx: string;  // JSON array
  created_at: string;
  updated_at: string;
}

export interface ConversationTurnRow {
  id: number;
  conversation_id: string;
  role: ConversationTurn['role'];
  content: string;
  timestamp: string;
}

const dynamicContextSchema = z.array(z.string());

export class ConversationRepository {
  private upsertStmt: Database.Statement;
  private getStmt: Database.Statement;
  private deleteStmt: Database.Statement;
  private insertTurnStmt: Database.Statement;
  private getTurnsStmt: Database.Statement;
  private deleteTurnsStmt: Database.Statement;
  private countStmt: Database.Statement;

  constructor(private db: Database.Database) {
    this.upsertStmt = db.prepare(`
      INSERT OR REPLACE INTO conversations
        (id, type_tag, memory, token_ratio, dynamic_ctx, created_at, updated_at)
      VALUES
        (@id, @type_tag, @memory, @token_ratio, @dynamic_ctx, @created_at, @updated_at)
    `);
    this.getStmt = db.prepare('SELECT * FROM conversations WHERE id = ?');
    this.deleteStmt = db.prepare('DELETE FROM conversations WHERE id = ?');
    this.insertTurnStmt = db.prepare(
      'INSERT INTO conversation_turns (conversation_id, role, content, timestamp) VALUES (?, ?, ?, ?)',
    );
    this.getTurnsStmt = db.prepare(
      'SELECT * FROM conversation_turns WHERE conversation_id = ? ORDER BY id ASC',
    );
    this.deleteTurnsStmt = db.prepare('DELETE FROM conversation_turns WHERE conversation_id = ?');
    this.countStmt = db.prepare('SELECT COUNT(*) AS c FROM conversations');
  }

  /**
   * Save a complete conversation, replacing its turns.
   * INSERT OR REPLACE deletes the old row, so turns are rewritten after it.
   */
  save(state: ConversationState): void {
    const saveTx = this.db.transaction(() => {
      this.deleteTurnsStmt.run(state.id);
      this.upsertStmt.run({
        id: state.id,
        type_tag: state.typeTag,
        memory: state.memory,
        token_ratio: state.tokenRatio,
        dynamic_ctx: JSON.stringify(state.dynamicContext),
        created_at: state.createdAt,
        updated_at: state.updatedAt,
      });
      for (const turn of state.turns) {
        this.insertTurnStmt.run(state.id, turn.role, turn.content, turn.timestamp);
      }
    });
    saveTx();
  }

  load(id: string): ConversationState | null {
    const row = this.getStmt.get(id) as ConversationRow | undefined;
    if (!row) return null;

    const turns = this.getTurnsStmt.all(id) as ConversationTurnRow[];

    return {
      id: row.id,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      typeTag: row.type_tag,
      memory: row.memory,
      tokenRatio: row.token_ratio,
      turns: turns.map(t => ({ role: t.role, content: t.content, timestamp: t.timestamp })),
      dynamicContext: dynamicContextSchema.parse(JSON.parse(row.dynamic_ctx)),
    };
  }

  /** Newest first, previewing the first turn. */
  list(): ConversationListEntry[] {
    const rows = this.db
      .prepare('SELECT * FROM conversations ORDER BY updated_at DESC')
      .all() as ConversationRow[];

    const firstTurn = this.db.prepare(
      'SELECT content FROM conversation_turns WHERE conversation_id = ? ORDER BY id ASC LIMIT 1',
    );
    const turnCount = this.db.prepare(
      'SELECT COUNT(*) AS c FROM conversation_turns WHERE conversation_id = ?',
    );

    return rows.map(row => {
      const first = firstTurn.get(row.id) as { content: string } | undefined;
      return {
        id: row.id,
        createdAt: row.created_at,
        updatedAt: row.updated_at,
        turnCount: (turnCount.get(row.id) as { c: number }).c,
        preview: first?.content.slice(0, 100) ?? '',
      };
    });
  }

  delete(id: string): boolean {
    return this.deleteStmt.run(id).changes > 0;
  }

  count(): number {
    return (this.countStmt.get() as { c: number }).c;
  }
}
