import { v4 as uuidv4 } from "uuid";
import { ChatTask, TaskQueue } from "../../types";
import { QueueOptions, leaseExpiredMessage } from "./task.queue";

interface Entry extends ChatTask {
  workerId: string | null;
  leaseExpiresAt: number | null;
  /** Set once the task is finished; the entry is dropped after this. */
  expiresAt: number | null;
}

const snapshot = ({ workerId: _w, leaseExpiresAt: _l, expiresAt: _e, ...task }: Entry): ChatTask => ({
  ...task,
});

const requestKey = (owner: string, requestId: string): string => `${owner}\u0000${requestId}`;

/**
 * In-process TaskQueue with the same claim/lease/retry rules as the
 * MongoDB queue. Backs CHAT_DISPATCH=memory (single-process
 * deployments) and the test suite. Tasks do not survive a restart.
 *
 * Finished tasks are kept for `resultTtlMs` so clients can poll the
 * result, then evicted together with their request id.
 */
export const createMemoryTaskQueue = ({
  leaseMs,
  maxAttempts,
  resultTtlMs,
  now = Date.now,
}: QueueOptions): TaskQueue => {
  const tasks = new Map<string, Entry>();
  const byRequest = new Map<string, string>();

  const prune = (current: number): void => {
    for (const [id, entry] of tasks) {
      if (entry.expiresAt !== null && entry.expiresAt <= current) {
        tasks.delete(id);
        byRequest.delete(requestKey(entry.owner, entry.requestId));
      }
    }
  };

  const held = (taskId: string, workerId: string): Entry | undefined => {
    const entry = tasks.get(taskId);
    return entry && entry.status === "running" && entry.workerId === workerId ? entry : undefined;
  };

  const release = (entry: Entry, changes: Partial<Entry>): void => {
    const current = now();
    Object.assign(entry, changes, { workerId: null, leaseExpiresAt: null, updatedAt: new Date(current) });
    entry.expiresAt = entry.status === "succeeded" || entry.status === "failed" ? current + resultTtlMs : null;
  };

  return {
    enqueue: async ({ owner, requestId, prompt, model, temperature }) => {
      prune(now());

      const existingId = requestId ? byRequest.get(requestKey(owner, requestId)) : undefined;
      const existing = existingId ? tasks.get(existingId) : undefined;
      if (existing) return snapshot(existing);

      const created = new Date(now());
      const entry: Entry = {
        id: uuidv4(),
        owner,
        requestId: requestId ?? uuidv4(),
        prompt,
        model,
        temperature,
        status: "pending",
        reply: null,
        error: null,
        attempts: 0,
        createdAt: created,
        updatedAt: created,
        workerId: null,
        leaseExpiresAt: null,
        expiresAt: null,
      };
      tasks.set(entry.id, entry);
      byRequest.set(requestKey(owner, entry.requestId), entry.id);
      return snapshot(entry);
    },

    claim: async (workerId) => {
      const current = now();
      prune(current);

      const expired = (t: Entry) =>
        t.status === "running" && t.leaseExpiresAt !== null && t.leaseExpiresAt <= current;

      let next: Entry | undefined;
      // Map iteration follows insertion order, i.e. oldest first
      for (const entry of tasks.values()) {
        if (expired(entry) && entry.attempts >= maxAttempts) {
          release(entry, { status: "failed", error: leaseExpiredMessage(entry.attempts) });
          continue;
        }
        if (!next && entry.attempts < maxAttempts && (entry.status === "pending" || expired(entry))) {
          next = entry;
        }
      }
      if (!next) return null;

      Object.assign(next, {
        status: "running",
        workerId,
        leaseExpiresAt: current + leaseMs,
        attempts: next.attempts + 1,
        updatedAt: new Date(current),
      });
      return snapshot(next);
    },

    complete: async (taskId, workerId, reply) => {
      const entry = held(taskId, workerId);
      if (entry) release(entry, { status: "succeeded", reply, error: null });
    },

    fail: async (taskId, workerId, message) => {
      const entry = held(taskId, workerId);
      if (entry) {
        release(entry, {
          status: entry.attempts < maxAttempts ? "pending" : "failed",
          error: message,
        });
      }
    },

    findForOwner: async (taskId, owner) => {
      prune(now());
      const entry = tasks.get(taskId);
      return entry && entry.owner === owner ? snapshot(entry) : null;
    },
  };
};
