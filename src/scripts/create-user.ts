// ============================================================
// create-user — provision an account for POST /api/token/
// ============================================================
// There is no public registration endpoint. Accounts are made here:
//
//   npm run create-user -- <email> <name> <password>
// ============================================================

import dotenv from "dotenv";
dotenv.config();

import { loadConfig } from "../config/env";
import { connectDB, disconnectDB } from "../config/db";
import { createServices } from "../services";
import { errorMessage } from "../utils/errors";

const USAGE = "Usage: npm run create-user -- <email> <name> <password>";

const main = async (args: string[]): Promise<void> => {
  const [email, name, password] = args;
  if (!email || !name || !password) {
    throw new Error(USAGE);
  }

  const config = loadConfig();
  await connectDB(config.mongoUri);
  try {
    const { authService } = createServices(config);
    const user = await authService.createUser({ email, name, password });
    console.log(`[Auth] Created user ${user.email} (${user.id})`);
  } finally {
    await disconnectDB();
  }
};

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error(`[create-user] ${errorMessage(error)}`);
  process.exit(1);
});
