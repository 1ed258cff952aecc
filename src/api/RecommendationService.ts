/**
 * Recommendation request adapter
 *
 * Owns the single chain instance for the process. The chain is built once,
 * either eagerly via initialize() or on the first valid request. A failed
 * build is remembered for the life of the process and never retried.
 */

import { v4 as uuidv4 } from "uuid";
import type { RagChain, RagChainFactory } from "../retrieval/RecommendationChain.js";

export type InitStatus =
  | { state: "uninitialized" }
  | { state: "ready" }
  | { state: "failed"; reason: string };

export type HealthStatus =
  | { status: "ok" }
  | { status: "unhealthy"; reason: string };

export type RecommendationErrorKind =
  | "invalid_input"
  | "service_unavailable"
  | "internal_error";

export const INTERNAL_ERROR_MESSAGE =
  "An internal error occurred while processing the request.";

export class RecommendationError extends Error {
  constructor(
    readonly kind: RecommendationErrorKind,
    message: string,
    readonly reason?: string,
  ) {
    super(message);
    this.name = "RecommendationError";
  }
}

type InitPhase = "Startup" | "On-demand";

const QUESTION_PREVIEW_CHARS = 100;

function preview(question: string): string {
  return question.length > QUESTION_PREVIEW_CHARS
    ? `${question.slice(0, QUESTION_PREVIEW_CHARS)}...`
    : question;
}

function errorName(error: unknown): string {
  return error instanceof Error ? error.name : typeof error;
}

export class RecommendationService {
  private chain: RagChain | null = null;
  private initError: string | null = null;
  private pendingInit: Promise<RagChain | null> | null = null;

  constructor(private readonly createChain: RagChainFactory) {}

  getStatus(): InitStatus {
    if (this.initError !== null) {
      return { state: "failed", reason: this.initError };
    }
    return this.chain ? { state: "ready" } : { state: "uninitialized" };
  }

  /**
   * Build the chain up front. Never throws; the outcome is reflected in getStatus().
   */
  async initialize(): Promise<InitStatus> {
    await this.ensureChain("Startup");
    return this.getStatus();
  }

  health(): HealthStatus {
    if (this.initError !== null) {
      console.warn(
        `[Recommend] Health check reporting unhealthy: ${this.initError}`,
      );
      return { status: "unhealthy", reason: this.initError };
    }
    return { status: "ok" };
  }

  /**
   * Throws service_unavailable once initialization has failed.
   */
  assertAvailable(): void {
    if (this.initError !== null) {
      throw this.unavailable(this.initError);
    }
  }

  async recommend(question: unknown, requestId: string = uuidv4()): Promise<string> {
    this.assertAvailable();

    if (typeof question !== "string" || !question.trim()) {
      console.warn(`[Recommend] ${requestId} rejected: missing or blank question`);
      throw new RecommendationError(
        "invalid_input",
        "A non-empty question is required.",
      );
    }

    const chain = await this.ensureChain("On-demand");
    if (!chain) {
      throw this.unavailable(this.initError ?? "RAG components not ready.");
    }

    console.log(`[Recommend] ${requestId} question: '${preview(question)}'`);
    try {
      const answer = await chain.invoke(question);
      console.log(`[Recommend] ${requestId} answered`);
      return answer;
    } catch (error) {
      console.error(`[Recommend] ${requestId} chain invocation failed:`, error);
      throw new RecommendationError("internal_error", INTERNAL_ERROR_MESSAGE);
    }
  }

  private ensureChain(phase: InitPhase): Promise<RagChain | null> {
    if (this.chain) return Promise.resolve(this.chain);
    if (this.initError !== null) return Promise.resolve(null);

    // Concurrent first requests share one build.
    if (!this.pendingInit) {
      this.pendingInit = this.buildChain(phase).finally(() => {
        this.pendingInit = null;
      });
    }
    return this.pendingInit;
  }

  private async buildChain(phase: InitPhase): Promise<RagChain | null> {
    console.log(`[Recommend] ${phase} initialization of RAG chain...`);
    try {
      this.chain = await this.createChain();
      console.log("[Recommend] RAG chain ready");
      return this.chain;
    } catch (error) {
      console.error(`[Recommend] ${phase} initialization failed:`, error);
      this.initError = `${phase} init failed: ${errorName(error)} - check server logs.`;
      return null;
    }
  }

  private unavailable(reason: string): RecommendationError {
    return new RecommendationError(
      "service_unavailable",
      `Service Unavailable: ${reason}`,
      reason,
    );
  }
}
