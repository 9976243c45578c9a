import { RequestHandler, Router } from "express";
import { RetrievalService } from "./retrieval.service";
import { createRetrievalController, RetrievalLimits } from "./retrieval.controller";

export interface RetrievalRouteDeps {
  retrieval: RetrievalService;
  limits: RetrievalLimits;
  gate: RequestHandler;
  limiter: RequestHandler;
}

/**
 * Mounted at /api/test-query. Bearer token only: API keys are for
 * the chat endpoint.
 */
export const createRetrievalRoutes = ({ retrieval, limits, gate, limiter }: RetrievalRouteDeps): Router => {
  const router = Router();
  const controller = createRetrievalController(retrieval, limits);

  router.post("/", gate, limiter, controller.testQuery);

  return router;
};
