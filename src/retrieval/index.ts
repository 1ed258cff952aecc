/**
 * Retrieval module exports and chain construction.
 */

import { resolve } from "path";
import { AssessmentCatalog } from "./AssessmentCatalog.js";
import { RetrievalService } from "./RetrievalService.js";
import { RecommendationChain, RagChain } from "./RecommendationChain.js";
import { EmbeddingCache } from "../storage/EmbeddingCache.js";
import type { DatabaseAdapter } from "../storage/Database.js";
import {
  GeminiChatProvider,
  GeminiEmbeddingProvider,
} from "../providers/GeminiProvider.js";

export const CATALOG_FILE = "assessments.jsonl";

export interface RagChainOptions {
  apiKey: string;
  knowledgeDir: string;
  chatModel?: string;
  embeddingModel?: string;
  temperature?: number;
  topK?: number;
  /** Persist embeddings here; without it the index is rebuilt on every start */
  database?: DatabaseAdapter;
}

/**
 * Load the catalog, build (or reload) the vector index and return a ready chain.
 * Slow on a cold cache: every catalog entry is embedded.
 */
export async function getRagChain(options: RagChainOptions): Promise<RagChain> {
  if (!options.apiKey) {
    throw new Error("GOOGLE_API_KEY is not set");
  }

  const catalog = new AssessmentCatalog(resolve(options.knowledgeDir, CATALOG_FILE));
  catalog.load();
  console.log(`[Retrieval] Loaded ${catalog.entries.length} assessments`);

  const embedder = new GeminiEmbeddingProvider({
    apiKey: options.apiKey,
    model: options.embeddingModel,
  });
  const chat = new GeminiChatProvider({
    apiKey: options.apiKey,
    model: options.chatModel,
    temperature: options.temperature,
  });

  const cache = options.database ? new EmbeddingCache(options.database) : null;
  const retrieval = new RetrievalService(catalog, embedder, cache, {
    topK: options.topK,
  });
  await retrieval.buildIndex();

  return new RecommendationChain(retrieval, chat, { topK: options.topK });
}

export { AssessmentCatalog, toDocumentText } from "./AssessmentCatalog.js";
export type { AssessmentEntry } from "./AssessmentCatalog.js";
export { RetrievalService } from "./RetrievalService.js";
export type { RetrievedAssessment } from "./RetrievalService.js";
export { RecommendationChain, buildRecommendationPrompt } from "./RecommendationChain.js";
export type { RagChain, RagChainFactory } from "./RecommendationChain.js";
export { VectorStore } from "./VectorStore.js";
