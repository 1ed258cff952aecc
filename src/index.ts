/**
 * Assessment Recommender Server Entry Point
 */

import { createServer } from "http";
import { config } from "./config/index.js";
import { createApp } from "./api/http.js";
import { RecommendationService } from "./api/RecommendationService.js";
import { getRagChain } from "./retrieval/index.js";
import { getDatabase, closeDatabase } from "./storage/index.js";

async function main(): Promise<void> {
  const service = new RecommendationService(() =>
    getRagChain({
      apiKey: config.google.apiKey,
      knowledgeDir: config.rag.knowledgeDir,
      chatModel: config.google.chatModel,
      embeddingModel: config.google.embeddingModel,
      temperature: config.google.temperature,
      topK: config.rag.topK,
      database: getDatabase({
        path: config.storage.databasePath,
        walMode: config.storage.enableWalMode,
      }),
    }),
  );

  if (config.server.initMode === "eager") {
    const status = await service.initialize();
    if (status.state === "failed") {
      console.error(`[Server] Starting in degraded mode: ${status.reason}`);
    }
  } else {
    console.log("[Server] RAG chain will be built on the first /recommend request");
  }

  const app = createApp(service, {
    enableUi: config.server.enableUi,
    corsOrigin: config.server.corsOrigin,
    maxBodySize: config.server.maxBodySize,
  });
  const server = createServer(app);

  server.listen(config.port, () => {
    console.log("\n=== Assessment Recommender ===\n");
    console.log(`[Server] Listening on port ${config.port}`);
    console.log(`[Server] Environment: ${config.nodeEnv}`);
    console.log(`[Server] Init mode: ${config.server.initMode}`);
    console.log(`[Server] Recommend: POST http://localhost:${config.port}/recommend`);
    console.log(`[Server] Health: http://localhost:${config.port}/health`);
    if (config.server.enableUi) {
      console.log(`[Server] UI: http://localhost:${config.port}/`);
    }
    console.log(`[Server] Models: ${config.google.chatModel} / ${config.google.embeddingModel}\n`);
  });

  const shutdown = (signal: string) => {
    console.log(`\n[Server] ${signal} received, shutting down gracefully...`);

    server.close(() => {
      closeDatabase();
      console.log("[Server] HTTP server closed");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((error) => {
  console.error("[Server] Failed to start:", error);
  process.exit(1);
});
