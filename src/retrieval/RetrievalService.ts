/**
 * Retrieval Service for the assessment catalog.
 * Embeds catalog entries (reusing cached vectors), indexes them, and
 * returns the closest entries for a question.
 */

import {
  AssessmentCatalog,
  AssessmentEntry,
  toDocumentText,
} from "./AssessmentCatalog.js";
import { VectorStore, VectorDocument } from "./VectorStore.js";
import { EmbeddingCache, CachedEmbedding, hashContent } from "../storage/EmbeddingCache.js";
import type { EmbeddingProvider } from "../providers/types.js";

export interface RetrievedAssessment {
  entry: AssessmentEntry;
  text: string;
  score: number;
}

export interface RetrievalServiceOptions {
  topK?: number;
}

export interface IndexStats {
  indexed: number;
  embedded: number;
  cached: number;
}

const DEFAULT_TOP_K = 10;

export class RetrievalService {
  private readonly vectorStore = new VectorStore<AssessmentEntry>();
  private ready = false;
  private topK: number;

  constructor(
    private catalog: AssessmentCatalog,
    private embedder: EmbeddingProvider,
    private cache: EmbeddingCache | null = null,
    options: RetrievalServiceOptions = {},
  ) {
    this.topK = options.topK ?? DEFAULT_TOP_K;
  }

  isReady(): boolean {
    return this.ready;
  }

  getDefaults(): { topK: number } {
    return { topK: this.topK };
  }

  async buildIndex(): Promise<IndexStats> {
    const entries = this.catalog.entries;
    if (entries.length === 0) {
      throw new Error(
        `[Retrieval] No assessments to index in ${this.catalog.getPath()}`,
      );
    }

    const model = this.embedder.model;
    const docs: VectorDocument<AssessmentEntry>[] = [];
    const missing: Array<{ entry: AssessmentEntry; text: string; hash: string }> = [];

    for (const entry of entries) {
      const text = toDocumentText(entry);
      const hash = hashContent(text);
      const cached = this.cache?.get(entry.id, model, hash) ?? null;
      if (cached) {
        docs.push({ id: entry.id, text, metadata: entry, embedding: cached });
      } else {
        missing.push({ entry, text, hash });
      }
    }

    if (missing.length > 0) {
      console.log(`[Retrieval] Embedding ${missing.length} assessments with ${model}...`);
      const vectors = await this.embedder.embedDocuments(
        missing.map((item) => item.text),
      );
      if (vectors.length !== missing.length) {
        throw new Error(
          `[Retrieval] Expected ${missing.length} embeddings, received ${vectors.length}`,
        );
      }

      const fresh: CachedEmbedding[] = missing.map((item, i) => ({
        docId: item.entry.id,
        model,
        contentHash: item.hash,
        vector: vectors[i],
      }));
      this.cache?.putMany(fresh);

      missing.forEach((item, i) => {
        docs.push({
          id: item.entry.id,
          text: item.text,
          metadata: item.entry,
          embedding: vectors[i],
        });
      });
    }

    const pruned = this.cache?.prune(model, entries.map((entry) => entry.id)) ?? 0;
    if (pruned > 0) {
      console.log(`[Retrieval] Pruned ${pruned} cached embeddings no longer in the catalog`);
    }

    // Keep catalog order regardless of which vectors came from the cache.
    const order = new Map(entries.map((entry, i) => [entry.id, i]));
    docs.sort((a, b) => (order.get(a.id) ?? 0) - (order.get(b.id) ?? 0));

    this.vectorStore.index(docs);
    this.ready = true;

    const stats: IndexStats = {
      indexed: docs.length,
      embedded: missing.length,
      cached: docs.length - missing.length,
    };
    console.log(
      `[Retrieval] Indexed ${stats.indexed} assessments (${stats.embedded} embedded, ${stats.cached} from cache)`,
    );
    return stats;
  }

  async retrieve(query: string, topK?: number): Promise<RetrievedAssessment[]> {
    if (!this.ready) {
      throw new Error("[Retrieval] Index not built. Call buildIndex() first.");
    }

    const cleanedQuery = query.trim();
    if (!cleanedQuery) return [];

    const queryEmbedding = await this.embedder.embedQuery(cleanedQuery);
    const results = this.vectorStore.search(queryEmbedding, topK ?? this.topK);

    return results.map((result) => ({
      entry: result.doc.metadata,
      text: result.doc.text,
      score: result.score,
    }));
  }
}
