// ============================================================
// Rate Limiter Middleware
// ============================================================
// Every chat or retrieval request costs a paid upstream call, and
// the token endpoint is the brute-force target. express-rate-limit
// counts requests per IP inside a window and answers 429 once the
// count passes `limit`.
//
// Limiters are created per app instance (createApp), so each app
// in the test suite starts with fresh counters.
// ============================================================

import rateLimit from "express-rate-limit";

export interface RateLimitSettings {
  chatRateLimit: number;
  retrievalRateLimit: number;
  authRateLimit: number;
}

export const createRateLimiters = ({
  chatRateLimit,
  retrievalRateLimit,
  authRateLimit,
}: RateLimitSettings) => ({
  // Protects the AI budget — per minute
  chatLimiter: rateLimit({
    windowMs: 60 * 1000,
    limit: chatRateLimit,
    message: {
      success: false,
      message: "Too many requests. Please wait a moment before sending more.",
    },
    standardHeaders: true,
    legacyHeaders: false,
  }),

  // Retrieval has its own budget so test queries never eat into chat
  retrievalLimiter: rateLimit({
    windowMs: 60 * 1000,
    limit: retrievalRateLimit,
    message: {
      success: false,
      message: "Too many requests. Please wait a moment before sending more.",
    },
    standardHeaders: true,
    legacyHeaders: false,
  }),

  // Login / refresh — longer window, brute force is the threat here
  authLimiter: rateLimit({
    windowMs: 15 * 60 * 1000,
    limit: authRateLimit,
    message: {
      success: false,
      message: "Too many login attempts. Please try again later.",
    },
    standardHeaders: true,
    legacyHeaders: false,
  }),
});
