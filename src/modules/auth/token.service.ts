// ============================================================
// Token Service — JWT Issue, Verify and Refresh
// ============================================================
// Two kinds of HS256 tokens, signed with JWT_SECRET:
//
//   access  → sent as "Authorization: Bearer <token>" on API calls
//   refresh → exchanged at POST /api/token/refresh/ for a new access
//
// PAYLOAD:
//   { sub: userId, type: "access" | "refresh", jti: uuid, iat, exp }
//
// `type` is checked on every verify, so a refresh token is never
// accepted as an access token (and the other way round). Each kind
// has its own lifetime (JWT_ACCESS_EXPIRES_IN / JWT_REFRESH_EXPIRES_IN).
//
// Nothing is stored server-side. A token is valid while its
// signature checks out and `exp` has not passed.
// ============================================================

import jwt from "jsonwebtoken";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { AuthenticationError } from "../../utils/errors";
import { TokenClaims, TokenPair, TokenType } from "../../types";

const claimsSchema = z.object({
  sub: z.string().min(1),
  type: z.enum(["access", "refresh"]),
  jti: z.string().min(1),
  iat: z.number(),
  exp: z.number(),
});

export interface TokenServiceOptions {
  secret: string;
  accessTtlSeconds: number;
  refreshTtlSeconds: number;
  /** Clock in milliseconds; defaults to Date.now. */
  now?: () => number;
}

export interface TokenService {
  issuePair(subject: string): TokenPair;
  issueAccess(subject: string): string;
  verify(token: string, expected: TokenType): TokenClaims;
}

export const createTokenService = ({
  secret,
  accessTtlSeconds,
  refreshTtlSeconds,
  now = Date.now,
}: TokenServiceOptions): TokenService => {
  const nowSeconds = () => Math.floor(now() / 1000);

  const sign = (subject: string, type: TokenType): string =>
    jwt.sign(
      // iat comes from our clock so expiry follows it too
      { sub: subject, type, jti: uuidv4(), iat: nowSeconds() },
      secret,
      {
        algorithm: "HS256",
        expiresIn: type === "access" ? accessTtlSeconds : refreshTtlSeconds,
      }
    );

  const verify = (token: string, expected: TokenType): TokenClaims => {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, secret, {
        algorithms: ["HS256"],
        clockTimestamp: nowSeconds(),
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new AuthenticationError("Token has expired.");
      }
      throw new AuthenticationError("Token is invalid.");
    }

    const claims = claimsSchema.safeParse(decoded);
    if (!claims.success || claims.data.type !== expected) {
      throw new AuthenticationError(`Token is not a valid ${expected} token.`);
    }
    return claims.data;
  };

  return {
    issuePair: (subject) => ({
      access: sign(subject, "access"),
      refresh: sign(subject, "refresh"),
    }),
    issueAccess: (subject) => sign(subject, "access"),
    verify,
  };
};
