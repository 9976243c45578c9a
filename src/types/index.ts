// ============================================================
// Type Definitions for the AI Gateway API
// ============================================================
// Shapes shared across modules. The service layer only talks to
// the outside world through the interfaces declared here
// (TextGenerator, Embedder, VectorIndex, DocumentStore,
// UserRepository, TaskQueue), so every external collaborator can
// be swapped for an in-process fake in tests.
// ============================================================

import { Request } from "express";

// ── Auth Types ──────────────────────────────────────────────

/**
 * Who is calling. A bearer token resolves to a user; a matching
 * API key admits the client that key was issued to.
 */
export type AuthContext =
  | { kind: "user"; userId: string; email: string }
  | { kind: "api-key"; clientId: string };

/**
 * AuthRequest — Express Request after the Auth Gate has run.
 * `auth` is optional because unauthenticated routes never set it.
 */
export interface AuthRequest extends Request {
  auth?: AuthContext;
}

export interface UserRecord {
  id: string;
  email: string;
  name: string;
  isActive: boolean;
}

/** A user plus the stored bcrypt hash; only the login path reads this. */
export interface UserCredentials extends UserRecord {
  passwordHash: string;
}

export interface NewUser {
  email: string;
  name: string;
  passwordHash: string;
}

export interface UserRepository {
  findById(id: string): Promise<UserRecord | null>;
  findByEmail(email: string): Promise<UserRecord | null>;
  findCredentials(email: string): Promise<UserCredentials | null>;
  create(user: NewUser): Promise<UserRecord>;
}

export type TokenType = "access" | "refresh";

export interface TokenClaims {
  sub: string;
  type: TokenType;
  jti: string;
  iat: number;
  exp: number;
}

export interface TokenPair {
  access: string;
  refresh: string;
}

// ── Chat Types ──────────────────────────────────────────────

export interface GenerationRequest {
  prompt: string;
  model: string;
  temperature: number;
}

/** The external text-generation service (Gemini in production). */
export interface TextGenerator {
  generate(request: GenerationRequest): Promise<string>;
}

export type ChatTaskStatus = "pending" | "running" | "succeeded" | "failed";

export interface ChatTask {
  id: string;
  owner: string;
  requestId: string;
  prompt: string;
  model: string;
  temperature: number;
  status: ChatTaskStatus;
  reply: string | null;
  error: string | null;
  attempts: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface EnqueueChatTask {
  owner: string;
  requestId?: string;
  prompt: string;
  model: string;
  temperature: number;
}

/**
 * Producer/consumer channel for chat generation, doubling as the
 * result store the client polls.
 *
 * A task is claimed under a lease; `complete` and `fail` only take
 * effect for the worker that holds the current lease.
 */
export interface TaskQueue {
  /** Returns the existing task when `requestId` was already used by `owner`. */
  enqueue(input: EnqueueChatTask): Promise<ChatTask>;
  claim(workerId: string): Promise<ChatTask | null>;
  complete(taskId: string, workerId: string, reply: string): Promise<void>;
  fail(taskId: string, workerId: string, message: string): Promise<void>;
  findForOwner(taskId: string, owner: string): Promise<ChatTask | null>;
}

export interface ChatBody {
  message: string;
  model?: string;
  temperature?: number;
  requestId?: string;
}

// ── Retrieval Types ─────────────────────────────────────────

/** The external embedding service. */
export interface Embedder {
  embedQuery(text: string): Promise<number[]>;
  embedDocuments(texts: string[]): Promise<number[][]>;
}

export type VectorMetadata = Record<string, string | number | boolean>;

export interface VectorMatch {
  id: string;
  score: number;
  metadata?: Record<string, unknown>;
}

export interface VectorRecord {
  id: string;
  values: number[];
  metadata: VectorMetadata;
}

/** The managed nearest-neighbour index (Pinecone in production). */
export interface VectorIndex {
  query(vector: number[], topK: number): Promise<VectorMatch[]>;
  upsert(records: VectorRecord[]): Promise<void>;
}

export interface StoredDocument {
  id: string;
  text: string;
  metadata: Record<string, string>;
}

/** Side lookup from vector ids back to document text. */
export interface DocumentStore {
  findByIds(ids: string[]): Promise<StoredDocument[]>;
  upsertMany(documents: StoredDocument[]): Promise<void>;
}

export interface RetrievalHit {
  id: string;
  doc: string;
  score: number;
}

export interface RetrievalResult {
  query: string;
  elapsed: string;
  results: RetrievalHit[];
}

export interface TestQueryBody {
  query: string;
  topK?: number;
}
