/**
 * Gemini adapters for embeddings and text generation.
 */

import { GoogleGenerativeAI, TaskType } from "@google/generative-ai";
import type { ChatProvider, EmbeddingProvider } from "./types.js";

// batchEmbedContents rejects more than 100 requests per call
const MAX_EMBED_BATCH = 100;

export const DEFAULT_EMBEDDING_MODEL = "text-embedding-004";
export const DEFAULT_CHAT_MODEL = "gemini-1.5-flash";

export interface GeminiEmbeddingOptions {
  apiKey: string;
  model?: string;
}

export interface GeminiChatOptions {
  apiKey: string;
  model?: string;
  temperature?: number;
}

export class GeminiEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  private client: GoogleGenerativeAI;

  constructor(options: GeminiEmbeddingOptions) {
    this.model = options.model ?? DEFAULT_EMBEDDING_MODEL;
    this.client = new GoogleGenerativeAI(options.apiKey);
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    const model = this.client.getGenerativeModel({ model: this.model });
    const vectors: number[][] = [];

    for (let start = 0; start < texts.length; start += MAX_EMBED_BATCH) {
      const batch = texts.slice(start, start + MAX_EMBED_BATCH);
      const result = await model.batchEmbedContents({
        requests: batch.map((text) => ({
          content: { role: "user", parts: [{ text }] },
          taskType: TaskType.RETRIEVAL_DOCUMENT,
        })),
      });

      if (result.embeddings.length !== batch.length) {
        throw new Error(
          `Embedding batch returned ${result.embeddings.length} vectors for ${batch.length} texts`,
        );
      }
      for (const embedding of result.embeddings) {
        vectors.push(embedding.values);
      }
    }

    return vectors;
  }

  async embedQuery(text: string): Promise<number[]> {
    const model = this.client.getGenerativeModel({ model: this.model });
    const result = await model.embedContent({
      content: { role: "user", parts: [{ text }] },
      taskType: TaskType.RETRIEVAL_QUERY,
    });
    return result.embedding.values;
  }
}

export class GeminiChatProvider implements ChatProvider {
  readonly model: string;
  private temperature: number;
  private client: GoogleGenerativeAI;

  constructor(options: GeminiChatOptions) {
    this.model = options.model ?? DEFAULT_CHAT_MODEL;
    this.temperature = options.temperature ?? 0.2;
    this.client = new GoogleGenerativeAI(options.apiKey);
  }

  async generate(prompt: string): Promise<string> {
    const model = this.client.getGenerativeModel({
      model: this.model,
      generationConfig: { temperature: this.temperature },
    });
    const result = await model.generateContent(prompt);
    return result.response.text();
  }
}
