// ============================================================
// Auth Controller — Token Endpoints
// ============================================================
//   POST /api/token/          { email, password } → { access, refresh }
//   POST /api/token/refresh/  { refresh }         → { access }
//
// Both endpoints are public. Failures reach the error handler:
//   400 = missing fields
//   401 = wrong credentials / bad or expired refresh token
// ============================================================

import { NextFunction, Request, Response } from "express";
import { z } from "zod";
import { AuthService } from "./auth.service";
import { parseBody } from "../../utils/validate";

const obtainSchema = z.object({
  email: z.string({ required_error: "email is required" }).trim().min(1, "email is required"),
  password: z.string({ required_error: "password is required" }).min(1, "password is required"),
});

const refreshSchema = z.object({
  refresh: z.string({ required_error: "refresh is required" }).min(1, "refresh is required"),
});

export const createAuthController = (authService: AuthService) => ({
  /**
   * POST /api/token/
   *
   * Request body: { email: "ana@example.com", password: "..." }
   * Success response (200): { success: true, access, refresh }
   */
  obtainToken: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { email, password } = parseBody(obtainSchema, req.body);
      const pair = await authService.obtainTokens(email, password);
      res.status(200).json({ success: true, ...pair });
    } catch (error) {
      next(error);
    }
  },

  /**
   * POST /api/token/refresh/
   *
   * Request body: { refresh: "<refresh token>" }
   * Success response (200): { success: true, access }
   */
  refreshToken: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { refresh } = parseBody(refreshSchema, req.body);
      const result = await authService.refreshAccess(refresh);
      res.status(200).json({ success: true, ...result });
    } catch (error) {
      next(error);
    }
  },
});
