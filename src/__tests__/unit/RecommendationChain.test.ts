/**
 * RecommendationChain Unit Tests
 *
 * Covers prompt assembly and the retrieve -> prompt -> generate flow.
 */

import { AssessmentCatalog } from "../../retrieval/AssessmentCatalog.js";
import { RetrievalService, RetrievedAssessment } from "../../retrieval/RetrievalService.js";
import {
  RecommendationChain,
  buildRecommendationPrompt,
  formatContext,
} from "../../retrieval/RecommendationChain.js";
import { FakeChatProvider, FakeEmbeddingProvider, makeEntry } from "../helpers/fakes.js";

function retrieved(id: string, text: string, score: number): RetrievedAssessment {
  return { entry: makeEntry({ id }), text, score };
}

describe("formatContext", () => {
  it("should number each retrieved entry", () => {
    expect(
      formatContext([retrieved("A", "First entry", 0.9), retrieved("B", "Second entry", 0.5)]),
    ).toBe("[1] First entry\n\n[2] Second entry");
  });

  it("should say when nothing matched", () => {
    expect(formatContext([])).toBe("(no matching assessments found in the catalog)");
  });
});

describe("buildRecommendationPrompt", () => {
  it("should end with the context followed by the trimmed request", () => {
    const prompt = buildRecommendationPrompt("  Hiring Java developers  ", [
      retrieved("A", "Entry A", 0.9),
      retrieved("B", "Entry B", 0.4),
    ]);

    expect(
      prompt.endsWith(
        "CONTEXT:\n[1] Entry A\n\n[2] Entry B\n\nREQUEST:\nHiring Java developers",
      ),
    ).toBe(true);
  });

  it("should cap the number of recommendations", () => {
    const prompt = buildRecommendationPrompt("q", []);
    expect(prompt).toContain("recommend at most 10 assessments");
  });
});

describe("RecommendationChain", () => {
  let retrieval: RetrievalService;

  beforeEach(async () => {
    jest.spyOn(console, "log").mockImplementation(() => {});
    const catalog = new AssessmentCatalog("/virtual/assessments.jsonl");
    catalog.entries = [
      makeEntry({ id: "A", name: "Java Test", description: "Core java skills." }),
      makeEntry({ id: "B", name: "Sales Test", description: "Sales calls." }),
    ];
    retrieval = new RetrievalService(catalog, new FakeEmbeddingProvider(), null, {
      topK: 7,
    });
    await retrieval.buildIndex();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("should return the chat model's text", async () => {
    const chat = new FakeChatProvider({ reply: "Try the Java Test." });
    const chain = new RecommendationChain(retrieval, chat);

    await expect(chain.invoke("java")).resolves.toBe("Try the Java Test.");
  });

  it("should prompt with the retrieved entries", async () => {
    const chat = new FakeChatProvider({ reply: "ok" });
    const chain = new RecommendationChain(retrieval, chat);

    await chain.invoke("java");

    const results = await retrieval.retrieve("java", 7);
    expect(chat.prompts).toEqual([buildRecommendationPrompt("java", results)]);
    expect(chat.prompts[0]).toContain("[1] Assessment: Java Test");
  });

  it("should use the retrieval default topK unless overridden", async () => {
    const retrieveSpy = jest.spyOn(retrieval, "retrieve");

    await new RecommendationChain(retrieval, new FakeChatProvider()).invoke("java");
    await new RecommendationChain(retrieval, new FakeChatProvider(), { topK: 3 }).invoke(
      "sales",
    );

    expect(retrieveSpy).toHaveBeenNthCalledWith(1, "java", 7);
    expect(retrieveSpy).toHaveBeenNthCalledWith(2, "sales", 3);
  });

  it("should propagate chat failures", async () => {
    const chat = new FakeChatProvider();
    jest.spyOn(chat, "generate").mockRejectedValue(new Error("quota exceeded"));
    const chain = new RecommendationChain(retrieval, chat);

    await expect(chain.invoke("java")).rejects.toThrow("quota exceeded");
  });
});
