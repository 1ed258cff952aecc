/**
 * Single-form web UI surface. Failures are shown as text in the output
 * panel rather than as HTTP status codes.
 */

import { RecommendationError, RecommendationService } from "./RecommendationService.js";

export const UI_EMPTY_QUESTION = "Error: Please enter a non-empty question.";
export const UI_INTERNAL_ERROR =
  "Error: An internal error occurred while processing the request.";

export async function askFromUi(
  service: RecommendationService,
  question: unknown,
): Promise<string> {
  try {
    return await service.recommend(question);
  } catch (error) {
    if (error instanceof RecommendationError) {
      switch (error.kind) {
        case "invalid_input":
          return UI_EMPTY_QUESTION;
        case "service_unavailable":
          return `Error: ${error.message}`;
        case "internal_error":
          return UI_INTERNAL_ERROR;
      }
    }
    console.error("[UI] Unexpected error:", error);
    return UI_INTERNAL_ERROR;
  }
}
