// ============================================================
// Auth Service — Business Logic for Authentication
// ============================================================
// Controller: handles HTTP (req, res) → extracts data → calls service
// Service:    pure logic → knows nothing about Express
//
// FLOWS:
//   Obtain:   credentials → find user → bcrypt compare → token pair
//   Refresh:  refresh token → verify → user still active → new access
//   Access:   access token → verify → user still active → AuthContext
//   Create:   email/name/password → hash → save (CLI only, no route)
// ============================================================

import bcrypt from "bcryptjs";
import { AuthenticationError, ValidationError } from "../../utils/errors";
import { AuthContext, TokenPair, UserRecord, UserRepository } from "../../types";
import { TokenService } from "./token.service";

// Same message for unknown email AND wrong password (no user enumeration)
export const INVALID_CREDENTIALS = "No active account found with the given credentials.";

export const MIN_PASSWORD_LENGTH = 8;

export interface AuthServiceDeps {
  users: UserRepository;
  tokens: TokenService;
  /** bcrypt cost factor; 12 in production */
  saltRounds?: number;
}

export interface AuthService {
  obtainTokens(email: string, password: string): Promise<TokenPair>;
  refreshAccess(refreshToken: string): Promise<{ access: string }>;
  authenticateAccess(accessToken: string): Promise<AuthContext>;
  createUser(data: { email: string; name: string; password: string }): Promise<UserRecord>;
}

export const createAuthService = ({
  users,
  tokens,
  saltRounds = 12,
}: AuthServiceDeps): AuthService => {
  /** Load the token subject and make sure it may still act. */
  const activeSubject = async (userId: string): Promise<UserRecord> => {
    const user = await users.findById(userId);
    if (!user) throw new AuthenticationError("User not found.");
    if (!user.isActive) throw new AuthenticationError("User is inactive.");
    return user;
  };

  return {
    obtainTokens: async (email, password) => {
      const user = await users.findCredentials(email.trim().toLowerCase());
      if (!user || !user.isActive) throw new AuthenticationError(INVALID_CREDENTIALS);

      const isValid = await bcrypt.compare(password, user.passwordHash);
      if (!isValid) throw new AuthenticationError(INVALID_CREDENTIALS);

      console.log(`[Auth] Issued token pair for user ${user.id}`);
      return tokens.issuePair(user.id);
    },

    refreshAccess: async (refreshToken) => {
      const claims = tokens.verify(refreshToken, "refresh");
      const user = await activeSubject(claims.sub);
      return { access: tokens.issueAccess(user.id) };
    },

    authenticateAccess: async (accessToken) => {
      const claims = tokens.verify(accessToken, "access");
      const user = await activeSubject(claims.sub);
      return { kind: "user", userId: user.id, email: user.email };
    },

    createUser: async ({ email, name, password }) => {
      const normalized = email.trim().toLowerCase();
      if (password.length < MIN_PASSWORD_LENGTH) {
        throw new ValidationError(
          `Password must be at least ${MIN_PASSWORD_LENGTH} characters.`
        );
      }

      const existing = await users.findByEmail(normalized);
      if (existing) throw new ValidationError("Email already registered");

      const passwordHash = await bcrypt.hash(password, saltRounds);
      return users.create({ email: normalized, name: name.trim(), passwordHash });
    },
  };
};
