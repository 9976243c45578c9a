// ============================================================
// ChatTask Model (MongoDB Schema)
// ============================================================
// One document per queued chat request. The collection is both
// the queue the worker pool consumes and the result store the
// client polls at GET /api/chat/tasks/:id.
//
// LIFECYCLE:
//   pending ──claim──▶ running ──complete──▶ succeeded
//                        │
//                        ├──fail (attempts left)──▶ pending
//                        ├──fail (no attempts left)──▶ failed
//                        └──lease expired──▶ claimable again
//
// Finished tasks carry `expiresAt` (now + TASK_RESULT_TTL_MS) and
// MongoDB's TTL monitor deletes them once it passes. Open tasks keep
// expiresAt null, which the TTL index ignores.
//
// (owner, requestId) is unique: re-submitting the same request id
// returns the existing task instead of calling the model twice.
// ============================================================

import mongoose, { Schema } from "mongoose";
import { ChatTaskStatus } from "../../types";

export interface ChatTaskDocument {
  owner: string;
  requestId: string;
  prompt: string;
  model: string;
  temperature: number;
  status: ChatTaskStatus;
  reply: string | null;
  error: string | null;
  attempts: number;
  workerId: string | null;
  leaseExpiresAt: Date | null;
  expiresAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

const STATUSES: ChatTaskStatus[] = ["pending", "running", "succeeded", "failed"];

const chatTaskSchema = new Schema<ChatTaskDocument>(
  {
    owner: { type: String, required: true },
    requestId: { type: String, required: true },
    prompt: { type: String, required: true },
    model: { type: String, required: true },
    temperature: { type: Number, required: true },
    status: {
      type: String,
      enum: STATUSES,
      default: "pending",
    },
    reply: { type: String, default: null },
    error: { type: String, default: null },
    attempts: { type: Number, default: 0 },
    workerId: { type: String, default: null },
    leaseExpiresAt: { type: Date, default: null },
    expiresAt: { type: Date, default: null },
  },
  { timestamps: true }
);

chatTaskSchema.index({ owner: 1, requestId: 1 }, { unique: true });
// claim() scans by status, oldest first
chatTaskSchema.index({ status: 1, createdAt: 1 });
chatTaskSchema.index({ expiresAt: 1 }, { expireAfterSeconds: 0 });

export default mongoose.model<ChatTaskDocument>("ChatTask", chatTaskSchema);
