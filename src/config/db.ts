// ============================================================
// MongoDB Connection
// ============================================================
// MongoDB stores the three things this service owns:
//   - users        (credentials behind POST /api/token/)
//   - documents    (text behind each Pinecone vector id)
//   - chattasks    (the async chat queue and its results)
//
// CONNECTION FLOW:
//   1. server.ts / worker.ts load the config
//   2. connectDB() connects using MONGODB_URI
//   3. On failure the error propagates and the entry point exits
//
// MONGODB_URI FORMAT:
//   Local:  mongodb://localhost:27017/ai-gateway
//   Docker: mongodb://mongo:27017/ai-gateway
// ============================================================

import mongoose from "mongoose";

// Cache the connection promise so concurrent callers share one connect()
let cached: Promise<typeof mongoose> | null = null;

export const connectDB = async (uri: string): Promise<typeof mongoose> => {
  if (mongoose.connection.readyState === 1) return mongoose;

  if (!cached) {
    cached = mongoose.connect(uri);
  }

  try {
    const conn = await cached;
    console.log(`[MongoDB] Connected: ${conn.connection.host}`);
    return conn;
  } catch (error) {
    cached = null; // Reset so the next call retries
    throw error;
  }
};

export const disconnectDB = async (): Promise<void> => {
  cached = null;
  await mongoose.disconnect();
};
