// ============================================================
// Server Entry Point
// ============================================================
// `npm start` runs this file. It:
//
//   1. Loads .env (dotenv) and validates it (loadConfig)
//   2. Connects to MongoDB
//   3. Builds the services and picks the chat dispatch mode
//   4. Starts listening for HTTP requests
//   5. On SIGINT / SIGTERM: stops accepting, drains the in-process
//      worker pool (memory mode), disconnects
//
// CHAT_DISPATCH:
//   sync    → POST /api/chat/ waits for Gemini
//   memory  → in-process queue + worker pool in this process
//   queue   → MongoDB queue, consumed by `npm run worker`
//
// We connect to the DB BEFORE listening: no requests are accepted
// without a working database.
// ============================================================

import dotenv from "dotenv";
dotenv.config();

import { Server } from "http";
import { createApp } from "./app";
import { AppConfig, loadConfig } from "./config/env";
import { connectDB, disconnectDB } from "./config/db";
import { createServices } from "./services";
import { ChatWorkerPool } from "./modules/chat/chat.worker";
import { createMemoryTaskQueue } from "./modules/chat/memory.queue";
import { createMongoTaskQueue } from "./modules/chat/mongo.queue";
import { TaskQueue } from "./types";
import { ConfigError, errorMessage } from "./utils/errors";

const buildQueue = (config: AppConfig): TaskQueue | undefined => {
  const { mode, leaseMs, maxAttempts, resultTtlMs } = config.dispatch;
  if (mode === "memory") return createMemoryTaskQueue({ leaseMs, maxAttempts, resultTtlMs });
  if (mode === "queue") return createMongoTaskQueue({ leaseMs, maxAttempts, resultTtlMs });
  return undefined;
};

const closeServer = (server: Server): Promise<void> =>
  new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });

const startServer = async (): Promise<void> => {
  const config = loadConfig();
  await connectDB(config.mongoUri);

  const services = createServices(config);
  const queue = buildQueue(config);

  const pool =
    config.dispatch.mode === "memory" && queue
      ? new ChatWorkerPool({
          queue,
          chat: services.chat,
          concurrency: config.dispatch.concurrency,
          pollIntervalMs: config.dispatch.pollIntervalMs,
        })
      : null;
  pool?.start();

  const app = createApp({ config, ...services, queue });

  const server = app.listen(config.port, () => {
    console.log(`
    ╔══════════════════════════════════════════╗
    ║   AI Gateway API                         ║
    ║   Running on: http://localhost:${config.port}
    ║   Environment: ${config.env}
    ║   Chat dispatch: ${config.dispatch.mode}
    ╚══════════════════════════════════════════╝
    `);
  });

  const shutdown = async (signal: string): Promise<void> => {
    console.log(`[Server] ${signal} received, shutting down`);
    try {
      await closeServer(server);
      await pool?.stop();
      await disconnectDB();
      process.exit(0);
    } catch (error) {
      console.error(`[Server] Shutdown failed: ${errorMessage(error)}`);
      process.exit(1);
    }
  };

  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));
};

startServer().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`[Config] ${error.message}`);
  } else {
    console.error(`[Server] Failed to start: ${errorMessage(error)}`);
  }
  process.exit(1);
});
