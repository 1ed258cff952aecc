/**
 * In-memory dense vector store (cosine similarity).
 * Sized for a catalog of a few hundred entries, so search is a linear scan.
 */

export interface VectorDocument<TMeta> {
  id: string;
  text: string;
  metadata: TMeta;
  embedding: number[];
}

export interface VectorSearchResult<TMeta> {
  doc: VectorDocument<TMeta>;
  score: number;
}

function norm(vector: number[]): number {
  let sum = 0;
  for (const value of vector) {
    sum += value * value;
  }
  return Math.sqrt(sum);
}

export class VectorStore<TMeta> {
  private documents: VectorDocument<TMeta>[] = [];
  private docNorms: Map<string, number> = new Map();
  private dimension: number | null = null;

  index(documents: VectorDocument<TMeta>[]): void {
    this.documents = [];
    this.docNorms.clear();
    this.dimension = null;

    for (const doc of documents) {
      if (this.dimension === null) {
        this.dimension = doc.embedding.length;
      } else if (doc.embedding.length !== this.dimension) {
        throw new Error(
          `Embedding dimension mismatch for ${doc.id}: expected ${this.dimension}, got ${doc.embedding.length}`,
        );
      }
      this.documents.push(doc);
      this.docNorms.set(doc.id, norm(doc.embedding));
    }
  }

  size(): number {
    return this.documents.length;
  }

  search(queryEmbedding: number[], topK: number): VectorSearchResult<TMeta>[] {
    if (topK <= 0 || this.documents.length === 0) return [];
    if (this.dimension !== null && queryEmbedding.length !== this.dimension) {
      throw new Error(
        `Query embedding dimension mismatch: expected ${this.dimension}, got ${queryEmbedding.length}`,
      );
    }

    const queryNorm = norm(queryEmbedding);
    if (queryNorm === 0) return [];

    const results: VectorSearchResult<TMeta>[] = [];

    for (const doc of this.documents) {
      const docNorm = this.docNorms.get(doc.id) || 0;
      if (docNorm === 0) continue;

      let dot = 0;
      for (let i = 0; i < queryEmbedding.length; i++) {
        dot += queryEmbedding[i] * doc.embedding[i];
      }

      results.push({ doc, score: dot / (docNorm * queryNorm) });
    }

    return results.sort((a, b) => b.score - a.score).slice(0, topK);
  }
}
