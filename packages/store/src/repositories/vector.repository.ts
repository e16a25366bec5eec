import type Database from 'better-sqlite3';
import { z } from 'zod';
import { vectorMetadataSchema, type VectorEntryInput, type VectorMetadata } from '@semantix/shared';

export interface VectorEntryRow {
  seq: number;
  index_name: string;
  vector: string;    // JSON array
  text: string;
  metadata: string;  // JSON object
}

export interface VectorEntryData {
  seq: number;
  indexName: string;
  vector: number[];
  metadata: VectorMetadata;
}

const vectorSchema = z.array(z.number());

export class VectorRepository {
  private createIndexStmt: Database.Statement;
  private hasIndexStmt: Database.Statement;
  private dropIndexStmt: Database.Statement;
  private insertEntryStmt: Database.Statement;
  private entriesStmt: Database.Statement;
  private countStmt: Database.Statement;

  constructor(private db: Database.Database) {
    this.createIndexStmt = db.prepare('INSERT OR IGNORE INTO vector_indices (name) VALUES (?)');
    this.hasIndexStmt = db.prepare('SELECT 1 AS found FROM vector_indices WHERE name = ?');
    this.dropIndexStmt = db.prepare('DELETE FROM vector_indices WHERE name = ?');
    this.insertEntryStmt = db.prepare(`
      INSERT INTO vector_entries (index_name, vector, text, metadata)
      VALUES (@index_name, @vector, @text, @metadata)
    `);
    this.entriesStmt = db.prepare('SELECT * FROM vector_entries WHERE index_name = ? ORDER BY seq ASC');
    this.countStmt = db.prepare('SELECT COUNT(*) AS c FROM vector_entries WHERE index_name = ?');
  }

  createIndex(name: string): void {
    this.createIndexStmt.run(name);
  }

  hasIndex(name: string): boolean {
    return this.hasIndexStmt.get(name) !== undefined;
  }

  /** Drops the index and, by cascade, all of its entries. */
  dropIndex(name: string): boolean {
    return this.dropIndexStmt.run(name).changes > 0;
  }

  listIndices(): string[] {
    const rows = this.db.prepare('SELECT name FROM vector_indices ORDER BY created_at ASC, name ASC').all() as Array<{ name: string }>;
    return rows.map(r => r.name);
  }

  /** Insert entries in one transaction. Returns the number inserted. */
  insert(indexName: string, entries: VectorEntryInput[]): number {
    const insertTx = this.db.transaction((batch: VectorEntryInput[]) => {
      for (const entry of batch) {
        this.insertEntryStmt.run({
          index_name: indexName,
          vector: JSON.stringify(entry.vector),
          text: entry.metadata.text,
          metadata: JSON.stringify(entry.metadata),
        });
      }
    });
    insertTx(entries);
    return entries.length;
  }

  /** All entries of an index in insertion order. */
  entries(indexName: string): VectorEntryData[] {
    const rows = this.entriesStmt.all(indexName) as VectorEntryRow[];
    return rows.map(row => ({
      seq: row.seq,
      indexName: row.index_name,
      vector: vectorSchema.parse(JSON.parse(row.vector)),
      metadata: vectorMetadataSchema.parse(JSON.parse(row.metadata)),
    }));
  }

  count(indexName: string): number {
    return (this.countStmt.get(indexName) as { c: number }).c;
  }
}
