/**
 * EmbeddingCache.ts - Persist document embeddings between restarts
 *
 * A vector is keyed by (doc_id, model) and only reused while the
 * content hash of the embedded text still matches.
 */

import { createHash } from "crypto";
import type Database from "better-sqlite3";
import type { DatabaseAdapter } from "./Database.js";

export interface CachedEmbedding {
  docId: string;
  model: string;
  contentHash: string;
  vector: number[];
}

interface EmbeddingRow {
  contentHash: string;
  vector: string;
}

export function hashContent(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex");
}

function parseVector(raw: string): number[] | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (
      Array.isArray(parsed) &&
      parsed.every((value): value is number => typeof value === "number")
    ) {
      return parsed;
    }
  } catch (error) {
    console.warn("[EmbeddingCache] Discarding unreadable vector:", error);
  }
  return null;
}

export class EmbeddingCache {
  private getStmt: Database.Statement<[string, string], EmbeddingRow>;
  private upsertStmt: Database.Statement<[string, string, string, string]>;
  private countStmt: Database.Statement<[string], { count: number }>;
  private clearStmt: Database.Statement<[]>;
  private docIdsStmt: Database.Statement<[string], { docId: string }>;
  private deleteStmt: Database.Statement<[string, string]>;

  constructor(private db: DatabaseAdapter) {
    const raw = db.getDb();

    this.getStmt = raw.prepare<[string, string], EmbeddingRow>(`
      SELECT content_hash as contentHash, vector
      FROM embeddings
      WHERE doc_id = ? AND model = ?
    `);

    this.upsertStmt = raw.prepare<[string, string, string, string]>(`
      INSERT INTO embeddings (doc_id, model, content_hash, vector)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(doc_id, model) DO UPDATE SET
        content_hash = excluded.content_hash,
        vector = excluded.vector,
        created_at = datetime('now')
    `);

    this.countStmt = raw.prepare<[string], { count: number }>(
      "SELECT COUNT(*) as count FROM embeddings WHERE model = ?",
    );

    this.clearStmt = raw.prepare<[]>("DELETE FROM embeddings");

    this.docIdsStmt = raw.prepare<[string], { docId: string }>(
      "SELECT doc_id as docId FROM embeddings WHERE model = ?",
    );

    this.deleteStmt = raw.prepare<[string, string]>(
      "DELETE FROM embeddings WHERE doc_id = ? AND model = ?",
    );
  }

  /**
   * Cached vector for a document, or null when missing or stale
   */
  get(docId: string, model: string, contentHash: string): number[] | null {
    const row = this.getStmt.get(docId, model);
    if (!row || row.contentHash !== contentHash) {
      return null;
    }
    return parseVector(row.vector);
  }

  putMany(entries: CachedEmbedding[]): void {
    this.db.transaction(() => {
      for (const entry of entries) {
        this.upsertStmt.run(
          entry.docId,
          entry.model,
          entry.contentHash,
          JSON.stringify(entry.vector),
        );
      }
    });
  }

  count(model: string): number {
    return this.countStmt.get(model)?.count ?? 0;
  }

  /**
   * Delete vectors for this model whose doc id is not in keepIds.
   * Returns the number of rows removed.
   */
  prune(model: string, keepIds: Iterable<string>): number {
    const keep = new Set(keepIds);
    return this.db.transaction(() => {
      let removed = 0;
      for (const { docId } of this.docIdsStmt.all(model)) {
        if (!keep.has(docId)) {
          removed += this.deleteStmt.run(docId, model).changes;
        }
      }
      return removed;
    });
  }

  clear(): number {
    return this.clearStmt.run().changes;
  }
}
