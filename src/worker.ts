// ============================================================
// Worker Entry Point (CHAT_DISPATCH=queue)
// ============================================================
// `npm run worker` runs this file. It consumes the MongoDB chat
// queue the API server writes to:
//
//   claim pending task → Gemini → store reply (or error) → repeat
//
// Run as many worker processes as needed; leases keep two workers
// from running the same task at once. A worker that dies mid-task
// leaves its lease to expire, and the task is picked up again.
// ============================================================

import dotenv from "dotenv";
dotenv.config();

import { loadConfig } from "./config/env";
import { connectDB, disconnectDB } from "./config/db";
import { createServices } from "./services";
import { ChatWorkerPool } from "./modules/chat/chat.worker";
import { createMongoTaskQueue } from "./modules/chat/mongo.queue";
import { ConfigError, errorMessage } from "./utils/errors";

const startWorker = async (): Promise<void> => {
  const config = loadConfig();
  await connectDB(config.mongoUri);

  const { chat } = createServices(config);
  const { leaseMs, maxAttempts, resultTtlMs, concurrency, pollIntervalMs } = config.dispatch;

  const pool = new ChatWorkerPool({
    queue: createMongoTaskQueue({ leaseMs, maxAttempts, resultTtlMs }),
    chat,
    concurrency,
    pollIntervalMs,
  });
  pool.start();

  const shutdown = async (signal: string): Promise<void> => {
    console.log(`[Worker] ${signal} received, finishing in-flight tasks`);
    try {
      await pool.stop();
      await disconnectDB();
      process.exit(0);
    } catch (error) {
      console.error(`[Worker] Shutdown failed: ${errorMessage(error)}`);
      process.exit(1);
    }
  };

  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));
};

startWorker().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`[Config] ${error.message}`);
  } else {
    console.error(`[Worker] Failed to start: ${errorMessage(error)}`);
  }
  process.exit(1);
});
