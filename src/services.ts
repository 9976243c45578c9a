// ============================================================
// Service Wiring
// ============================================================
// Builds the production implementation of every interface in
// types/index.ts from one AppConfig:
//
//   TextGenerator  → Gemini generateContent
//   Embedder       → Gemini embedContent
//   VectorIndex    → Pinecone
//   DocumentStore  → MongoDB (documents)
//   UserRepository → MongoDB (users)
//
// Shared by server.ts, worker.ts and the scripts so they all talk
// to the same collaborators. Call connectDB() before using anything
// backed by MongoDB.
// ============================================================

import { AppConfig } from "./config/env";
import { createGeminiClient, createGeminiGenerator } from "./config/gemini";
import { createPineconeIndex } from "./config/pinecone";
import { createGeminiEmbedder } from "./utils/embeddings";
import { createMongoUserRepository } from "./modules/auth/user.repository";
import { createTokenService } from "./modules/auth/token.service";
import { createAuthService } from "./modules/auth/auth.service";
import { createChatService } from "./modules/chat/chat.service";
import { createMongoDocumentStore } from "./modules/retrieval/document.store";
import { createRetrievalService } from "./modules/retrieval/retrieval.service";
import { createIndexingService } from "./modules/retrieval/indexing.service";

export const createServices = (config: AppConfig) => {
  const ai = createGeminiClient(config);
  const embedder = createGeminiEmbedder(ai, config);
  const index = createPineconeIndex(config);
  const documents = createMongoDocumentStore();

  const authService = createAuthService({
    users: createMongoUserRepository(),
    tokens: createTokenService(config.jwt),
  });

  const chat = createChatService(createGeminiGenerator(ai, config.upstreamTimeoutMs), {
    model: config.gemini.model,
    allowedModels: config.gemini.allowedModels,
    temperature: config.gemini.temperature,
  });

  return {
    authService,
    chat,
    retrieval: createRetrievalService({ embedder, index, documents }),
    indexing: createIndexingService({ embedder, index, documents }),
  };
};

export type Services = ReturnType<typeof createServices>;
