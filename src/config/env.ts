// ============================================================
// Environment Configuration
// ============================================================
// All configuration comes from environment variables (a local
// .env file is loaded by dotenv in server.ts / worker.ts before
// this runs).
//
// loadConfig() is called ONCE at process start. It validates the
// raw variables with zod and returns a typed, frozen AppConfig.
// Any missing or malformed required key throws a ConfigError that
// names every offending key, and the entry point exits.
//
// REQUIRED:
//   MONGODB_URI, JWT_SECRET, GEMINI_API_KEY,
//   PINECONE_API_KEY, PINECONE_INDEX_NAME
// Everything else has a default (see .env.example).
// ============================================================

import { z } from "zod";
import { ConfigError, FieldIssue } from "../utils/errors";

export type DispatchMode = "sync" | "memory" | "queue";

export interface AppConfig {
  env: "development" | "production" | "test";
  port: number;
  mongoUri: string;
  jwt: {
    secret: string;
    accessTtlSeconds: number;
    refreshTtlSeconds: number;
  };
  apiKeys: string[];
  apiKeyHeader: string;
  gemini: {
    apiKey: string;
    model: string;
    allowedModels: string[];
    temperature: number;
    embeddingModel: string;
    embeddingDimensions: number;
  };
  pinecone: {
    apiKey: string;
    indexName: string;
    namespace?: string;
  };
  retrieval: {
    defaultTopK: number;
    maxTopK: number;
  };
  upstreamTimeoutMs: number;
  dispatch: {
    mode: DispatchMode;
    concurrency: number;
    pollIntervalMs: number;
    leaseMs: number;
    maxAttempts: number;
    resultTtlMs: number;
  };
  http: {
    allowedOrigins: string[];
    chatRateLimit: number;
    retrievalRateLimit: number;
    authRateLimit: number;
    logRequests: boolean;
  };
}

const required = z.string().trim().min(1, "is required");
const positiveInt = z.coerce.number().int().positive();
const commaList = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? "")
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: positiveInt.default(3000),
  MONGODB_URI: required,

  JWT_SECRET: required,
  JWT_ACCESS_EXPIRES_IN: positiveInt.default(86400),
  JWT_REFRESH_EXPIRES_IN: positiveInt.default(86400),

  API_KEYS: commaList,
  API_KEY_HEADER: z.string().trim().toLowerCase().default("x-api-key"),

  GEMINI_API_KEY: required,
  GEMINI_MODEL: z.string().trim().min(1).default("gemini-2.0-flash"),
  GEMINI_ALLOWED_MODELS: commaList,
  GEMINI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.4),
  EMBEDDING_MODEL: z.string().trim().min(1).default("gemini-embedding-001"),
  EMBEDDING_DIMENSIONS: positiveInt.default(768),

  PINECONE_API_KEY: required,
  PINECONE_INDEX_NAME: required,
  PINECONE_NAMESPACE: z.string().trim().optional(),

  RETRIEVAL_TOP_K: positiveInt.default(5),
  RETRIEVAL_MAX_TOP_K: positiveInt.default(20),
  UPSTREAM_TIMEOUT_MS: positiveInt.default(30000),

  CHAT_DISPATCH: z.enum(["sync", "memory", "queue"]).default("sync"),
  WORKER_CONCURRENCY: positiveInt.default(4),
  WORKER_POLL_INTERVAL_MS: positiveInt.default(1000),
  TASK_LEASE_MS: positiveInt.default(120000),
  TASK_MAX_ATTEMPTS: positiveInt.default(3),
  TASK_RESULT_TTL_MS: positiveInt.default(86400000),

  ALLOWED_ORIGINS: commaList,
  CHAT_RATE_LIMIT: positiveInt.default(20),
  RETRIEVAL_RATE_LIMIT: positiveInt.default(20),
  AUTH_RATE_LIMIT: positiveInt.default(10),
});

/**
 * Validate `env` and build the AppConfig.
 * Throws ConfigError listing every invalid key.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => ({
        field: issue.path.join("."),
        message: issue.message,
      }))
    );
  }

  const e = parsed.data;

  const conflicts: FieldIssue[] = [];
  if (e.RETRIEVAL_TOP_K > e.RETRIEVAL_MAX_TOP_K) {
    conflicts.push({ field: "RETRIEVAL_TOP_K", message: "must not exceed RETRIEVAL_MAX_TOP_K" });
  }
  // A lease that can run out mid-call lets a second worker call the model again
  if (e.TASK_LEASE_MS <= e.UPSTREAM_TIMEOUT_MS) {
    conflicts.push({ field: "TASK_LEASE_MS", message: "must be greater than UPSTREAM_TIMEOUT_MS" });
  }
  if (conflicts.length > 0) throw new ConfigError(conflicts);

  // The default model is always allowed, even when the list omits it
  const allowedModels = Array.from(new Set([e.GEMINI_MODEL, ...e.GEMINI_ALLOWED_MODELS]));

  const config: AppConfig = {
    env: e.NODE_ENV,
    port: e.PORT,
    mongoUri: e.MONGODB_URI,
    jwt: {
      secret: e.JWT_SECRET,
      accessTtlSeconds: e.JWT_ACCESS_EXPIRES_IN,
      refreshTtlSeconds: e.JWT_REFRESH_EXPIRES_IN,
    },
    apiKeys: e.API_KEYS,
    apiKeyHeader: e.API_KEY_HEADER,
    gemini: {
      apiKey: e.GEMINI_API_KEY,
      model: e.GEMINI_MODEL,
      allowedModels,
      temperature: e.GEMINI_TEMPERATURE,
      embeddingModel: e.EMBEDDING_MODEL,
      embeddingDimensions: e.EMBEDDING_DIMENSIONS,
    },
    pinecone: {
      apiKey: e.PINECONE_API_KEY,
      indexName: e.PINECONE_INDEX_NAME,
      namespace: e.PINECONE_NAMESPACE || undefined,
    },
    retrieval: {
      defaultTopK: e.RETRIEVAL_TOP_K,
      maxTopK: e.RETRIEVAL_MAX_TOP_K,
    },
    upstreamTimeoutMs: e.UPSTREAM_TIMEOUT_MS,
    dispatch: {
      mode: e.CHAT_DISPATCH,
      concurrency: e.WORKER_CONCURRENCY,
      pollIntervalMs: e.WORKER_POLL_INTERVAL_MS,
      leaseMs: e.TASK_LEASE_MS,
      maxAttempts: e.TASK_MAX_ATTEMPTS,
      resultTtlMs: e.TASK_RESULT_TTL_MS,
    },
    http: {
      allowedOrigins:
        e.ALLOWED_ORIGINS.length > 0 ? e.ALLOWED_ORIGINS : ["http://localhost:5173"],
      chatRateLimit: e.CHAT_RATE_LIMIT,
      retrievalRateLimit: e.RETRIEVAL_RATE_LIMIT,
      authRateLimit: e.AUTH_RATE_LIMIT,
      logRequests: e.NODE_ENV !== "test",
    },
  };

  return Object.freeze(config);
};
