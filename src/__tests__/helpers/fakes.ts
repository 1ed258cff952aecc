/**
 * In-process stand-ins for the Gemini providers
 */

import type { ChatProvider, EmbeddingProvider } from "../../providers/types.js";
import type { AssessmentEntry } from "../../retrieval/AssessmentCatalog.js";

/** Words that get their own embedding dimension */
export const FAKE_VOCABULARY = [
  "java",
  "python",
  "sql",
  "reasoning",
  "sales",
  "customer",
  "team",
  "leadership",
];

/**
 * Bag-of-words vector over FAKE_VOCABULARY, so similarity is predictable.
 */
export function fakeEmbed(text: string): number[] {
  const tokens = text.toLowerCase().split(/[^a-z0-9]+/);
  return FAKE_VOCABULARY.map(
    (word) => tokens.filter((token) => token === word).length,
  );
}

export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  readonly documentCalls: string[][] = [];
  readonly queryCalls: string[] = [];

  constructor(options: { model?: string } = {}) {
    this.model = options.model ?? "fake-embedding";
  }

  embedDocuments(texts: string[]): Promise<number[][]> {
    this.documentCalls.push(texts);
    return Promise.resolve(texts.map(fakeEmbed));
  }

  embedQuery(text: string): Promise<number[]> {
    this.queryCalls.push(text);
    return Promise.resolve(fakeEmbed(text));
  }
}

/**
 * Echoes the prompt back unless a fixed reply is given.
 */
export class FakeChatProvider implements ChatProvider {
  readonly model: string;
  readonly prompts: string[] = [];
  private reply: string | undefined;

  constructor(options: { model?: string; reply?: string } = {}) {
    this.model = options.model ?? "fake-chat";
    this.reply = options.reply;
  }

  generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return Promise.resolve(this.reply ?? prompt);
  }
}

export function makeEntry(overrides: Partial<AssessmentEntry> & { id: string }): AssessmentEntry {
  return {
    name: `Assessment ${overrides.id}`,
    url: "",
    description: "General assessment.",
    test_types: ["Knowledge"],
    remote_testing: false,
    adaptive: false,
    ...overrides,
  };
}
