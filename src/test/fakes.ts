// In-process stand-ins for every external collaborator, plus a
// helper that wires them into createApp() for supertest.

import { Express } from "express";
import { createApp } from "../app";
import { AppConfig, loadConfig } from "../config/env";
import { AuthService, createAuthService } from "../modules/auth/auth.service";
import { createTokenService } from "../modules/auth/token.service";
import { ChatService, createChatService } from "../modules/chat/chat.service";
import { createRetrievalService } from "../modules/retrieval/retrieval.service";
import {
  DocumentStore,
  Embedder,
  GenerationRequest,
  NewUser,
  StoredDocument,
  TaskQueue,
  TextGenerator,
  UserCredentials,
  UserRecord,
  UserRepository,
  VectorIndex,
  VectorMatch,
  VectorRecord,
} from "../types";

export const TEST_ENV: NodeJS.ProcessEnv = {
  NODE_ENV: "test",
  MONGODB_URI: "mongodb://localhost:27017/ai-gateway-test",
  JWT_SECRET: "test-secret",
  GEMINI_API_KEY: "test-gemini-key",
  PINECONE_API_KEY: "test-pinecone-key",
  PINECONE_INDEX_NAME: "test-index",
  API_KEYS: "test-api-key",
};

export const testConfig = (overrides: NodeJS.ProcessEnv = {}): AppConfig =>
  loadConfig({ ...TEST_ENV, ...overrides });

// ── Clock ───────────────────────────────────────────────────

export class FakeClock {
  constructor(private current = Date.UTC(2026, 0, 1)) {}

  now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

// ── Users ───────────────────────────────────────────────────

export class MemoryUserRepository implements UserRepository {
  private readonly users = new Map<string, UserCredentials>();

  private static view({ passwordHash: _hash, ...user }: UserCredentials): UserRecord {
    return { ...user };
  }

  async findById(id: string): Promise<UserRecord | null> {
    const user = this.users.get(id);
    return user ? MemoryUserRepository.view(user) : null;
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    const user = await this.findCredentials(email);
    return user ? MemoryUserRepository.view(user) : null;
  }

  async findCredentials(email: string): Promise<UserCredentials | null> {
    const user = Array.from(this.users.values()).find((u) => u.email === email);
    return user ? { ...user } : null;
  }

  async create(data: NewUser): Promise<UserRecord> {
    const user: UserCredentials = { id: `user-${this.users.size + 1}`, isActive: true, ...data };
    this.users.set(user.id, user);
    return MemoryUserRepository.view(user);
  }

  deactivate(id: string): void {
    const user = this.users.get(id);
    if (user) user.isActive = false;
  }
}

// ── Upstream services ───────────────────────────────────────

type Responder = (request: GenerationRequest) => string | Promise<string>;

/** Echoes the prompt unless given another responder. Records every call. */
export class FakeGenerator implements TextGenerator {
  readonly calls: GenerationRequest[] = [];

  constructor(private readonly respond: Responder = (request) => request.prompt) {}

  async generate(request: GenerationRequest): Promise<string> {
    this.calls.push(request);
    return this.respond(request);
  }
}

/** Deterministic two-dimensional "embedding": [length, 1]. */
export class FakeEmbedder implements Embedder {
  readonly queries: string[] = [];
  readonly batches: string[][] = [];

  async embedQuery(text: string): Promise<number[]> {
    this.queries.push(text);
    return [text.length, 1];
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    this.batches.push(texts);
    return texts.map((text) => [text.length, 1]);
  }
}

export class FakeVectorIndex implements VectorIndex {
  readonly queries: { vector: number[]; topK: number }[] = [];
  readonly upserts: VectorRecord[][] = [];

  constructor(public matches: VectorMatch[] = []) {}

  async query(vector: number[], topK: number): Promise<VectorMatch[]> {
    this.queries.push({ vector, topK });
    return this.matches.slice(0, topK);
  }

  async upsert(records: VectorRecord[]): Promise<void> {
    this.upserts.push(records);
  }
}

export class MemoryDocumentStore implements DocumentStore {
  readonly docs = new Map<string, StoredDocument>();
  readonly lookups: string[][] = [];

  constructor(initial: StoredDocument[] = []) {
    for (const doc of initial) this.docs.set(doc.id, doc);
  }

  async findByIds(ids: string[]): Promise<StoredDocument[]> {
    this.lookups.push(ids);
    return ids.flatMap((id) => {
      const doc = this.docs.get(id);
      return doc ? [doc] : [];
    });
  }

  async upsertMany(documents: StoredDocument[]): Promise<void> {
    for (const doc of documents) this.docs.set(doc.id, doc);
  }
}

// ── App ─────────────────────────────────────────────────────

export const TEST_USER = {
  email: "ana@example.com",
  name: "Ana",
  password: "correct-horse",
};

export interface TestAppOptions {
  env?: NodeJS.ProcessEnv;
  generator?: FakeGenerator;
  matches?: VectorMatch[];
  documents?: StoredDocument[];
  queue?: TaskQueue;
}

export interface TestApp {
  app: Express;
  config: AppConfig;
  authService: AuthService;
  chat: ChatService;
  users: MemoryUserRepository;
  generator: FakeGenerator;
  embedder: FakeEmbedder;
  index: FakeVectorIndex;
  documents: MemoryDocumentStore;
  clock: FakeClock;
}

export const buildTestApp = (options: TestAppOptions = {}): TestApp => {
  const config = testConfig(options.env);
  const clock = new FakeClock();
  const users = new MemoryUserRepository();
  const generator = options.generator ?? new FakeGenerator();
  const embedder = new FakeEmbedder();
  const index = new FakeVectorIndex(options.matches);
  const documents = new MemoryDocumentStore(options.documents);

  const authService = createAuthService({
    users,
    tokens: createTokenService({ ...config.jwt, now: clock.now }),
    saltRounds: 4,
  });

  const chat = createChatService(generator, {
    model: config.gemini.model,
    allowedModels: config.gemini.allowedModels,
    temperature: config.gemini.temperature,
  });

  const app = createApp({
    config,
    authService,
    chat,
    retrieval: createRetrievalService({ embedder, index, documents }),
    queue: options.queue,
  });

  return { app, config, authService, chat, users, generator, embedder, index, documents, clock };
};
