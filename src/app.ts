// ============================================================
// App Factory — Express Application Setup
// ============================================================
// Builds the Express app from already-constructed services. No
// environment reads, no database connection, no listen() here:
// server.ts does that, and the test suite calls createApp() with
// in-process fakes and drives it through supertest.
//
// PIPELINE:
//   Request → [CORS] → [JSON Parser] → [Request Log] → [Router]
//           → [Auth Gate] → [Rate Limit] → [Controller] → Response
//   Anything thrown ends up in errorHandler (registered LAST).
//
// ROUTES:
//   GET  /health
//   POST /api/token/            → access + refresh token pair
//   POST /api/token/refresh/    → new access token
//   POST /api/chat/             → message → model reply (bearer or API key)
//   GET  /api/chat/tasks/:id    → poll a queued chat task
//   POST /api/test-query/       → vector search over indexed documents
// ============================================================

import express, { Express } from "express";
import cors from "cors";
import { AppConfig } from "./config/env";
import { AuthService } from "./modules/auth/auth.service";
import { createAuthRoutes } from "./modules/auth/auth.routes";
import { ChatService } from "./modules/chat/chat.service";
import { createChatRoutes } from "./modules/chat/chat.routes";
import { RetrievalService } from "./modules/retrieval/retrieval.service";
import { createRetrievalRoutes } from "./modules/retrieval/retrieval.routes";
import { createAuthGate } from "./middlewares/auth";
import { createRateLimiters } from "./middlewares/rateLimiter";
import { requestLogger } from "./middlewares/requestLogger";
import { errorHandler, notFound } from "./middlewares/errorHandler";
import { TaskQueue } from "./types";

export interface AppDeps {
  config: AppConfig;
  authService: AuthService;
  chat: ChatService;
  retrieval: RetrievalService;
  /** Present when CHAT_DISPATCH is memory or queue. */
  queue?: TaskQueue;
}

export const createApp = ({ config, authService, chat, retrieval, queue }: AppDeps): Express => {
  const app = express();

  // Behind a load balancer, rate limits must key on the client IP
  if (config.env === "production") app.set("trust proxy", 1);

  // ── Global Middleware ────────────────────────────────────────

  app.use(
    cors({
      origin: config.http.allowedOrigins,
      credentials: true,
    })
  );
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: true }));

  if (config.http.logRequests) app.use(requestLogger);

  const { protect, protectWithApiKey } = createAuthGate({
    authService,
    apiKeys: config.apiKeys,
    apiKeyHeader: config.apiKeyHeader,
  });
  const { chatLimiter, retrievalLimiter, authLimiter } = createRateLimiters(config.http);

  // ── Route Registration ──────────────────────────────────────

  app.use("/api/token", authLimiter, createAuthRoutes(authService));

  app.use(
    "/api/chat",
    createChatRoutes({ chat, queue, gate: protectWithApiKey, limiter: chatLimiter })
  );

  app.use(
    "/api/test-query",
    createRetrievalRoutes({
      retrieval,
      limits: config.retrieval,
      gate: protect,
      limiter: retrievalLimiter,
    })
  );

  // ── Health Check Endpoint ───────────────────────────────────
  app.get("/health", (_req, res) => {
    res.status(200).json({
      success: true,
      message: "AI Gateway API is running",
      dispatch: config.dispatch.mode,
      timestamp: new Date().toISOString(),
    });
  });

  // ── 404 + Error Handler (MUST be last) ──────────────────────
  app.use(notFound);
  app.use(errorHandler);

  return app;
};
