/**
 * Provider contracts used by the recommendation chain.
 * Implementations wrap a vendor SDK; tests substitute in-process fakes.
 */

export interface EmbeddingProvider {
  readonly model: string;
  embedDocuments(texts: string[]): Promise<number[][]>;
  embedQuery(text: string): Promise<number[]>;
}

export interface ChatProvider {
  readonly model: string;
  generate(prompt: string): Promise<string>;
}
