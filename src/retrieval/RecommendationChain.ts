/**
 * Recommendation chain: retrieve catalog context, build the prompt,
 * and ask the chat model for a recommendation.
 */

import type { ChatProvider } from "../providers/types.js";
import type { RetrievalService, RetrievedAssessment } from "./RetrievalService.js";

/**
 * Anything that answers a question. The request adapter only depends on this.
 */
export interface RagChain {
  invoke(question: string): Promise<string>;
}

export type RagChainFactory = () => Promise<RagChain>;

export interface RecommendationChainOptions {
  topK?: number;
}

const MAX_RECOMMENDATIONS = 10;

export function formatContext(results: RetrievedAssessment[]): string {
  if (results.length === 0) {
    return "(no matching assessments found in the catalog)";
  }
  return results
    .map((result, i) => `[${i + 1}] ${result.text}`)
    .join("\n\n");
}

export function buildRecommendationPrompt(
  question: string,
  results: RetrievedAssessment[],
): string {
  return [
    "You are an assistant that recommends pre-employment assessments from a fixed catalog.",
    `Using ONLY the catalog entries in CONTEXT, recommend at most ${MAX_RECOMMENDATIONS} assessments that fit the request.`,
    "For each recommendation give the assessment name as a markdown link to its URL, then its test types, duration, remote testing support and adaptive/IRT support, then one sentence on why it fits.",
    "Order recommendations from most to least relevant.",
    "If no entry in CONTEXT fits, say that no suitable assessment was found. Do not invent assessments or URLs.",
    "",
    "CONTEXT:",
    formatContext(results),
    "",
    "REQUEST:",
    question.trim(),
  ].join("\n");
}

export class RecommendationChain implements RagChain {
  constructor(
    private retrieval: RetrievalService,
    private chat: ChatProvider,
    private options: RecommendationChainOptions = {},
  ) {}

  async invoke(question: string): Promise<string> {
    const topK = this.options.topK ?? this.retrieval.getDefaults().topK;
    const results = await this.retrieval.retrieve(question, topK);
    const prompt = buildRecommendationPrompt(question, results);
    return this.chat.generate(prompt);
  }
}
