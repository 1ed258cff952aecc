/**
 * HTTP surface: JSON API plus the optional web form.
 */

import express from "express";
import type { ErrorRequestHandler, NextFunction, Request, Response } from "express";
import { resolve } from "path";
import {
  INTERNAL_ERROR_MESSAGE,
  RecommendationError,
  RecommendationErrorKind,
  RecommendationService,
} from "./RecommendationService.js";
import { askFromUi } from "./ui.js";

export interface AppOptions {
  enableUi?: boolean;
  corsOrigin?: string;
  publicDir?: string;
  /** body-parser limit, a byte count or a string such as "1mb" */
  maxBodySize?: number | string;
}

const JSON_TYPES = ["application/json", "application/*+json"];

export const INVALID_BODY_MESSAGE =
  'Invalid request body. Required: {"question": "<non-empty string>"}.';
export const INVALID_JSON_MESSAGE = "Invalid JSON format in request body.";
export const NOT_JSON_MESSAGE = "Request must be JSON.";
export const BODY_TOO_LARGE_MESSAGE = "Request body too large.";

export const DEFAULT_MAX_BODY_SIZE = "1mb";

const STATUS_BY_KIND: Record<RecommendationErrorKind, number> = {
  invalid_input: 400,
  service_unavailable: 503,
  internal_error: 500,
};

const DEFAULT_PUBLIC_DIR = resolve(__dirname, "..", "..", "public");

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readQuestion(body: unknown): unknown {
  return isRecord(body) ? body.question : undefined;
}

type BodyErrorKind = "malformed" | "too_large";

/**
 * Classify errors raised by express.json(); null for anything else.
 */
function bodyErrorKind(err: unknown): BodyErrorKind | null {
  if (!isRecord(err)) return null;
  if (err.type === "entity.parse.failed") return "malformed";
  if (err.type === "entity.too.large") return "too_large";
  return null;
}

function sendRecommendationError(res: Response, error: RecommendationError): void {
  const message =
    error.kind === "invalid_input" ? INVALID_BODY_MESSAGE : error.message;
  res.status(STATUS_BY_KIND[error.kind]).json({ error: message });
}

export function createApp(
  service: RecommendationService,
  options: AppOptions = {},
): express.Express {
  const app = express();
  const corsOrigin = options.corsOrigin ?? "*";
  const publicDir = options.publicDir ?? DEFAULT_PUBLIC_DIR;
  const parseJson = express.json({
    type: JSON_TYPES,
    limit: options.maxBodySize ?? DEFAULT_MAX_BODY_SIZE,
  });

  app.use((req, res, next) => {
    res.header("Access-Control-Allow-Origin", corsOrigin);
    res.header(
      "Access-Control-Allow-Headers",
      "Origin, X-Requested-With, Content-Type, Accept",
    );
    res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    if (req.method === "OPTIONS") {
      res.sendStatus(204);
      return;
    }
    next();
  });

  app.get("/health", (_req, res) => {
    const health = service.health();
    res.status(health.status === "ok" ? 200 : 503).json(health);
  });

  // Availability is checked before the body is even parsed, so a failed
  // initialization answers 503 to every request.
  const requireAvailable = (_req: Request, res: Response, next: NextFunction) => {
    try {
      service.assertAvailable();
      next();
    } catch (error) {
      if (error instanceof RecommendationError) {
        console.error(`[Server] Rejecting request: ${error.message}`);
        sendRecommendationError(res, error);
        return;
      }
      next(error);
    }
  };

  const requireJson = (req: Request, res: Response, next: NextFunction) => {
    if (!req.is(JSON_TYPES)) {
      console.warn("[Server] Request Content-Type is not application/json");
      res.status(415).json({ error: NOT_JSON_MESSAGE });
      return;
    }
    next();
  };

  app.post(
    "/recommend",
    requireAvailable,
    requireJson,
    parseJson,
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const answer = await service.recommend(readQuestion(req.body));
        res.status(200).json({ answer });
      } catch (error) {
        if (error instanceof RecommendationError) {
          sendRecommendationError(res, error);
          return;
        }
        next(error);
      }
    },
  );

  if (options.enableUi ?? true) {
    app.get("/", (_req, res) => {
      res.sendFile(resolve(publicDir, "index.html"));
    });

    // The form always gets 200 with text output, body errors included.
    const parseUiJson = (req: Request, res: Response, next: NextFunction) => {
      parseJson(req, res, (err?: unknown) => {
        const kind = bodyErrorKind(err);
        if (kind === "malformed") {
          console.warn("[Server] Malformed JSON body from UI");
          res.status(200).json({ output: `Error: ${INVALID_JSON_MESSAGE}` });
          return;
        }
        if (kind === "too_large") {
          console.warn("[Server] Oversized body from UI");
          res.status(200).json({ output: `Error: ${BODY_TOO_LARGE_MESSAGE}` });
          return;
        }
        next(err);
      });
    };

    app.post("/ui/ask", parseUiJson, async (req: Request, res: Response) => {
      const output = await askFromUi(service, readQuestion(req.body));
      res.status(200).json({ output });
    });
  }

  const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
    const kind = bodyErrorKind(err);
    if (kind === "malformed") {
      console.warn("[Server] Malformed JSON body");
      res.status(400).json({ error: INVALID_JSON_MESSAGE });
      return;
    }
    if (kind === "too_large") {
      console.warn("[Server] Request body exceeds the size limit");
      res.status(413).json({ error: BODY_TOO_LARGE_MESSAGE });
      return;
    }
    console.error("[Server] Unhandled error:", err);
    res.status(500).json({ error: INTERNAL_ERROR_MESSAGE });
  };
  app.use(errorHandler);

  return app;
}
