/**
 * Configuration loader for the assessment recommender server
 */

import { config as loadEnv } from "dotenv";
import { resolve } from "path";
import { existsSync } from "fs";

export type InitMode = "lazy" | "eager";

const currentDir = process.cwd();
const parentDir = resolve(currentDir, "..");

const envPaths = [
  resolve(currentDir, ".env"), // Project root (most common)
  resolve(parentDir, ".env"), // Parent directory (fallback)
];

let envLoaded = false;
for (const envPath of envPaths) {
  if (existsSync(envPath)) {
    const result = loadEnv({ path: envPath });
    if (!result.error) {
      console.log(`✓ Loaded environment variables from: ${envPath}`);
      envLoaded = true;
      break;
    }
  }
}

if (!envLoaded) {
  console.warn("⚠ No .env file found in expected locations:");
  envPaths.forEach((p) => console.warn(`  - ${p}`));
  console.warn("Continuing with environment variables from shell/system...");
}

export interface ServerConfig {
  port: number;
  nodeEnv: string;
  server: {
    initMode: InitMode;
    enableUi: boolean;
    corsOrigin: string;
    maxBodySize: string;
  };
  google: {
    apiKey: string;
    chatModel: string;
    embeddingModel: string;
    temperature: number;
  };
  rag: {
    topK: number;
    knowledgeDir: string;
  };
  storage: {
    databasePath: string;
    enableWalMode: boolean;
  };
}

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value) return value;
  if (defaultValue === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return defaultValue;
}

function getEnvBool(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === "true";
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  if (isNaN(num)) {
    throw new Error(`Invalid number for ${key}: ${value}`);
  }
  return num;
}

function getEnvFloat(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const num = parseFloat(value);
  if (isNaN(num) || num < 0 || num > 2) {
    console.warn(
      `[Config] Invalid ${key}="${value}". Using default "${defaultValue}".`,
    );
    return defaultValue;
  }
  return num;
}

function isInitMode(value: string): value is InitMode {
  return value === "lazy" || value === "eager";
}

function getEnvInitMode(key: string, defaultValue: InitMode): InitMode {
  const value = process.env[key];
  if (!value) return defaultValue;

  const normalized = value.trim().toLowerCase();
  if (isInitMode(normalized)) {
    return normalized;
  }

  console.warn(
    `[Config] Invalid ${key}="${value}". Using default "${defaultValue}".`,
  );
  return defaultValue;
}

export const config: ServerConfig = {
  port: getEnvNumber("PORT", 5001),
  nodeEnv: getEnvVar("NODE_ENV", "development"),
  server: {
    initMode: getEnvInitMode("INIT_MODE", "lazy"),
    enableUi: getEnvBool("ENABLE_UI", true),
    corsOrigin: getEnvVar("CORS_ORIGIN", "*"),
    maxBodySize: getEnvVar("MAX_BODY_SIZE", "1mb"),
  },
  google: {
    apiKey: getEnvVar("GOOGLE_API_KEY"),
    chatModel: getEnvVar("GEMINI_CHAT_MODEL", "gemini-1.5-flash"),
    embeddingModel: getEnvVar("GEMINI_EMBEDDING_MODEL", "text-embedding-004"),
    temperature: getEnvFloat("GEMINI_TEMPERATURE", 0.2),
  },
  rag: {
    topK: getEnvNumber("RAG_TOP_K", 10),
    knowledgeDir: getEnvVar("KNOWLEDGE_DIR", resolve(currentDir, "knowledge")),
  },
  storage: {
    databasePath: getEnvVar(
      "DATABASE_PATH",
      resolve(currentDir, "data", "vector-index.db"),
    ),
    enableWalMode: getEnvBool("DATABASE_WAL_MODE", true),
  },
};
