// ============================================================
// Chat Routes
// ============================================================
//   POST /api/chat/           → sendMessage  (rate limited)
//   GET  /api/chat/tasks/:id  → getTask
//
// MIDDLEWARE CHAIN:
//   protectWithApiKey (bearer token OR API key) → chatLimiter → controller
// ============================================================

import { RequestHandler, Router } from "express";
import { ChatService } from "./chat.service";
import { createChatController } from "./chat.controller";
import { TaskQueue } from "../../types";

export interface ChatRouteDeps {
  chat: ChatService;
  queue?: TaskQueue;
  gate: RequestHandler;
  limiter: RequestHandler;
}

export const createChatRoutes = ({ chat, queue, gate, limiter }: ChatRouteDeps): Router => {
  const router = Router();
  const controller = createChatController(chat, queue);

  router.use(gate);

  router.post("/", limiter, controller.sendMessage);
  router.get("/tasks/:id", controller.getTask);

  return router;
};
