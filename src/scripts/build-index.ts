/**
 * Build the persisted vector index ahead of the first request.
 *
 * Usage: npm run build-index [-- --rebuild]
 *   --rebuild  drop every cached embedding first
 */

import { config } from "../config/index.js";
import { getRagChain } from "../retrieval/index.js";
import { EmbeddingCache, getDatabase, closeDatabase } from "../storage/index.js";

async function buildIndex(): Promise<void> {
  const database = getDatabase({
    path: config.storage.databasePath,
    walMode: config.storage.enableWalMode,
  });

  try {
    if (process.argv.includes("--rebuild")) {
      const removed = new EmbeddingCache(database).clear();
      console.log(`[BuildIndex] Cleared ${removed} cached embeddings`);
    }

    await getRagChain({
      apiKey: config.google.apiKey,
      knowledgeDir: config.rag.knowledgeDir,
      embeddingModel: config.google.embeddingModel,
      chatModel: config.google.chatModel,
      topK: config.rag.topK,
      database,
    });

    const count = new EmbeddingCache(database).count(config.google.embeddingModel);
    console.log(`[BuildIndex] Index ready: ${count} embeddings in ${config.storage.databasePath}`);
  } finally {
    closeDatabase();
  }
}

buildIndex().catch((error) => {
  console.error("[BuildIndex] Failed to build index:", error);
  process.exit(1);
});
