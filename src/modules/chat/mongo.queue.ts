import mongoose from "mongoose";
import { v4 as uuidv4 } from "uuid";
import ChatTaskModel, { ChatTaskDocument } from "./chatTask.model";
import { ChatTask, TaskQueue } from "../../types";
import { QueueOptions, leaseExpiredMessage } from "./task.queue";

type StoredTask = ChatTaskDocument & { _id: mongoose.Types.ObjectId };

const toTask = (doc: StoredTask): ChatTask => ({
  id: doc._id.toString(),
  owner: doc.owner,
  requestId: doc.requestId,
  prompt: doc.prompt,
  model: doc.model,
  temperature: doc.temperature,
  status: doc.status,
  reply: doc.reply,
  error: doc.error,
  attempts: doc.attempts,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const isDuplicateKey = (error: unknown): boolean =>
  error instanceof mongoose.mongo.MongoServerError && error.code === 11000;

/**
 * TaskQueue over the ChatTask collection.
 *
 * Claims are a single findOneAndUpdate, so two workers can never
 * hold the same task. Completion is conditional on the caller still
 * holding the lease; a worker whose lease was taken over cannot
 * overwrite the newer run.
 */
export const createMongoTaskQueue = ({
  leaseMs,
  maxAttempts,
  resultTtlMs,
  now = Date.now,
}: QueueOptions): TaskQueue => {
  const resultExpiry = () => new Date(now() + resultTtlMs);

  const findExisting = async (owner: string, requestId: string) => {
    const doc = await ChatTaskModel.findOne({ owner, requestId });
    return doc ? toTask(doc) : null;
  };

  return {
    enqueue: async ({ owner, requestId, prompt, model, temperature }) => {
      if (requestId) {
        const existing = await findExisting(owner, requestId);
        if (existing) return existing;
      }

      try {
        const doc = await ChatTaskModel.create({
          owner,
          requestId: requestId ?? uuidv4(),
          prompt,
          model,
          temperature,
        });
        return toTask(doc);
      } catch (error) {
        // Lost a race with a concurrent submit of the same request id
        if (requestId && isDuplicateKey(error)) {
          const existing = await findExisting(owner, requestId);
          if (existing) return existing;
        }
        throw error;
      }
    },

    claim: async (workerId) => {
      const current = new Date(now());

      // Tasks whose worker died on the last allowed attempt are finished
      const exhausted = await ChatTaskModel.find({
        status: "running",
        leaseExpiresAt: { $lte: current },
        attempts: { $gte: maxAttempts },
      });
      for (const doc of exhausted) {
        await ChatTaskModel.updateOne(
          { _id: doc._id, status: "running", workerId: doc.workerId },
          {
            $set: {
              status: "failed",
              error: leaseExpiredMessage(doc.attempts),
              workerId: null,
              leaseExpiresAt: null,
              expiresAt: resultExpiry(),
            },
          }
        );
      }

      const doc = await ChatTaskModel.findOneAndUpdate(
        {
          attempts: { $lt: maxAttempts },
          $or: [
            { status: "pending" },
            { status: "running", leaseExpiresAt: { $lte: current } },
          ],
        },
        {
          $set: {
            status: "running",
            workerId,
            leaseExpiresAt: new Date(current.getTime() + leaseMs),
          },
          $inc: { attempts: 1 },
        },
        { sort: { createdAt: 1 }, new: true }
      );
      return doc ? toTask(doc) : null;
    },

    complete: async (taskId, workerId, reply) => {
      await ChatTaskModel.updateOne(
        { _id: taskId, status: "running", workerId },
        {
          $set: {
            status: "succeeded",
            reply,
            error: null,
            workerId: null,
            leaseExpiresAt: null,
            expiresAt: resultExpiry(),
          },
        }
      );
    },

    fail: async (taskId, workerId, message) => {
      const doc = await ChatTaskModel.findOne({ _id: taskId, status: "running", workerId });
      if (!doc) return;

      const exhausted = doc.attempts >= maxAttempts;
      await ChatTaskModel.updateOne(
        { _id: taskId, status: "running", workerId },
        {
          $set: {
            status: exhausted ? "failed" : "pending",
            error: message,
            workerId: null,
            leaseExpiresAt: null,
            expiresAt: exhausted ? resultExpiry() : null,
          },
        }
      );
    },

    findForOwner: async (taskId, owner) => {
      if (!mongoose.isValidObjectId(taskId)) return null;
      const doc = await ChatTaskModel.findOne({ _id: taskId, owner });
      return doc ? toTask(doc) : null;
    },
  };
};
