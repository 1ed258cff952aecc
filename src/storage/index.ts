/**
 * Storage module exports
 *
 * Provides the SQLite-backed embedding cache for the vector index.
 */

export { DatabaseAdapter, getDatabase, closeDatabase } from "./Database.js";
export type { DatabaseConfig } from "./Database.js";

export { EmbeddingCache, hashContent } from "./EmbeddingCache.js";
export type { CachedEmbedding } from "./EmbeddingCache.js";
