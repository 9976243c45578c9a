// ============================================================
// Chat Controller — HTTP Request Handlers
// ============================================================
//   POST /api/chat/           → send a message to the model
//   GET  /api/chat/tasks/:id  → poll a queued chat task
//
// req.auth is set by the Auth Gate (bearer token OR API key).
//
// DISPATCH:
//   No queue wired (CHAT_DISPATCH=sync)
//     → await the model, 200 { success, reply, model }
//   Queue wired (CHAT_DISPATCH=memory | queue)
//     → enqueue, 202 { success, taskId, requestId, status }
//       the client then polls GET /api/chat/tasks/:id
//
// IDEMPOTENCY:
//   `requestId` in the body (or an Idempotency-Key header) is unique
//   per caller. Sending it again returns the original task.
// ============================================================

import { NextFunction, Response } from "express";
import { z } from "zod";
import { ChatService } from "./chat.service";
import { AuthRequest, ChatBody, ChatTask, TaskQueue } from "../../types";
import { ownerKey, requireAuth } from "../../middlewares/auth";
import { parseBody } from "../../utils/validate";
import { NotFoundError } from "../../utils/errors";

const chatSchema = z.object({
  message: z
    .string({
      required_error: "Message cannot be empty",
      invalid_type_error: "Message must be a string",
    })
    .refine((value) => value.trim().length > 0, "Message cannot be empty"),
  model: z.string().trim().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  requestId: z.string().trim().min(1).max(128).optional(),
});

const taskView = (task: ChatTask) => ({
  id: task.id,
  requestId: task.requestId,
  status: task.status,
  reply: task.reply,
  error: task.error,
  attempts: task.attempts,
  model: task.model,
  createdAt: task.createdAt,
  updatedAt: task.updatedAt,
});

const idempotencyKey = (req: AuthRequest): string | undefined => {
  const header = req.get("Idempotency-Key");
  return header && header.trim().length > 0 ? header.trim() : undefined;
};

export const createChatController = (chat: ChatService, queue?: TaskQueue) => ({
  /**
   * POST /api/chat/
   *
   * Request body: { message: "Hello!", model?: "...", temperature?: 0.4, requestId?: "..." }
   * Sync response (200):   { success: true, reply: "...", model: "gemini-2.0-flash" }
   * Queued response (202): { success: true, taskId, requestId, status: "pending" }
   */
  sendMessage: async (req: AuthRequest, res: Response, next: NextFunction): Promise<void> => {
    try {
      const auth = requireAuth(req);
      const body: ChatBody = parseBody(chatSchema, req.body);
      // The message goes out exactly as typed; only emptiness is checked
      const request = chat.resolve(body.message, body);

      if (!queue) {
        const reply = await chat.reply(request);
        res.status(200).json({ success: true, reply, model: request.model });
        return;
      }

      const task = await queue.enqueue({
        owner: ownerKey(auth),
        requestId: body.requestId ?? idempotencyKey(req),
        ...request,
      });
      console.log(`[Chat] Task ${task.id} ${task.attempts === 0 ? "queued" : "re-submitted"}`);

      res.status(202).json({
        success: true,
        taskId: task.id,
        requestId: task.requestId,
        status: task.status,
        ...(task.status === "succeeded" ? { reply: task.reply } : {}),
      });
    } catch (error) {
      next(error);
    }
  },

  /**
   * GET /api/chat/tasks/:id
   *
   * Response (200): { success: true, task: { id, status, reply, error, attempts, ... } }
   * Response (404): unknown id, or a task created by another caller
   */
  getTask: async (req: AuthRequest, res: Response, next: NextFunction): Promise<void> => {
    try {
      const auth = requireAuth(req);
      const task = queue ? await queue.findForOwner(req.params.id, ownerKey(auth)) : null;
      if (!task) throw new NotFoundError("Task not found");

      res.status(200).json({ success: true, task: taskView(task) });
    } catch (error) {
      next(error);
    }
  },
});
