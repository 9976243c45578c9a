// ============================================================
// Auth Gate Middleware
// ============================================================
// Sits in front of every AI-backed route. Nothing downstream
// (Gemini, Pinecone, the task queue) is touched until it passes.
//
// CREDENTIALS ACCEPTED:
//   1. "Authorization: Bearer <access token>"
//        → signature + expiry verified, user looked up
//        → req.auth = { kind: "user", userId, email }
//   2. "Authorization: Api-Key <key>"  or  "<API_KEY_HEADER>: <key>"
//        → compared against API_KEYS in constant time
//        → req.auth = { kind: "api-key", clientId: "key-<sha256 prefix>" }
//          (each configured key is its own client: own idempotency
//          keys, own chat tasks)
//        (only on routes built with allowApiKey: true)
//
// ORDER:
//   A valid bearer token wins. If the bearer token is bad but a
//   correct API key is also present (and allowed), the key admits
//   the caller. Otherwise → 401 with the most specific reason.
// ============================================================

import { createHash, timingSafeEqual } from "crypto";
import { NextFunction, Response } from "express";
import { AuthService } from "../modules/auth/auth.service";
import { AuthContext, AuthRequest } from "../types";
import { AuthenticationError } from "../utils/errors";

export interface AuthGateOptions {
  authService: AuthService;
  apiKeys: string[];
  apiKeyHeader: string;
}

type Middleware = (req: AuthRequest, res: Response, next: NextFunction) => Promise<void>;

const digest = (value: string): Buffer => createHash("sha256").update(value).digest();

/** Stable, non-secret id for a configured key. */
export const apiKeyClientId = (key: string): string =>
  `key-${digest(key).toString("hex").slice(0, 12)}`;

/**
 * Constant-time lookup over the configured keys.
 * Returns the client id of the matching key, or null.
 */
export const matchesApiKey = (candidate: string, keys: string[]): string | null => {
  const candidateDigest = digest(candidate);
  let matched: string | null = null;
  for (const key of keys) {
    if (timingSafeEqual(candidateDigest, digest(key))) matched = apiKeyClientId(key);
  }
  return matched;
};

const splitAuthorization = (req: AuthRequest): { scheme: string; credential: string } | null => {
  const header = req.headers.authorization;
  if (!header) return null;
  const [scheme, credential] = header.trim().split(/\s+/, 2);
  if (!scheme || !credential) return null;
  return { scheme: scheme.toLowerCase(), credential };
};

const extractBearer = (req: AuthRequest): string | null => {
  const parts = splitAuthorization(req);
  return parts && parts.scheme === "bearer" ? parts.credential : null;
};

const extractApiKey = (req: AuthRequest, headerName: string): string | null => {
  const parts = splitAuthorization(req);
  if (parts && parts.scheme === "api-key") return parts.credential;

  const header = req.headers[headerName];
  const value = Array.isArray(header) ? header[0] : header;
  return value && value.trim().length > 0 ? value.trim() : null;
};

/**
 * Build the two gate variants:
 *   protect            → bearer token only
 *   protectWithApiKey  → bearer token or API key
 */
export const createAuthGate = ({ authService, apiKeys, apiKeyHeader }: AuthGateOptions) => {
  const resolve = async (req: AuthRequest, allowApiKey: boolean): Promise<AuthContext> => {
    const bearer = extractBearer(req);
    const apiKey = allowApiKey ? extractApiKey(req, apiKeyHeader) : null;

    let bearerError: AuthenticationError | null = null;
    if (bearer) {
      try {
        return await authService.authenticateAccess(bearer);
      } catch (error) {
        // Only a rejected credential may fall through to the API key
        if (!(error instanceof AuthenticationError)) throw error;
        bearerError = error;
      }
    }

    if (apiKey) {
      const clientId = matchesApiKey(apiKey, apiKeys);
      if (clientId) return { kind: "api-key", clientId };
      if (!bearerError) throw new AuthenticationError("Invalid API key.");
    }

    if (bearerError) throw bearerError;
    throw new AuthenticationError();
  };

  const gate =
    (allowApiKey: boolean): Middleware =>
    async (req, _res, next) => {
      try {
        req.auth = await resolve(req, allowApiKey);
        next();
      } catch (error) {
        next(error);
      }
    };

  return {
    protect: gate(false),
    protectWithApiKey: gate(true),
  };
};

/** The caller attached by the gate; a route without the gate is a wiring bug. */
export const requireAuth = (req: AuthRequest): AuthContext => {
  if (!req.auth) throw new AuthenticationError();
  return req.auth;
};

/** Stable owner key for per-caller resources (chat tasks). */
export const ownerKey = (auth: AuthContext): string =>
  auth.kind === "user" ? `user:${auth.userId}` : `api-key:${auth.clientId}`;
