import { Router } from "express";
import { AuthService } from "./auth.service";
import { createAuthController } from "./auth.controller";

/**
 * Token routes, mounted at /api/token (with the auth rate limiter):
 *   POST /api/token/          → obtainToken
 *   POST /api/token/refresh/  → refreshToken
 */
export const createAuthRoutes = (authService: AuthService): Router => {
  const router = Router();
  const controller = createAuthController(authService);

  router.post("/", controller.obtainToken);
  router.post("/refresh", controller.refreshToken);

  return router;
};
