// ============================================================
// index-documents — load a corpus into Pinecone + MongoDB
// ============================================================
//   npm run index-documents -- ./corpus.json
//
// The file holds a JSON array:
//   [{ "id": "doc-1", "text": "...", "metadata": { "source": "faq" } }, ...]
// Re-running with the same ids overwrites the earlier entries.
// ============================================================

import dotenv from "dotenv";
dotenv.config();

import { readFile } from "fs/promises";
import { loadConfig } from "../config/env";
import { connectDB, disconnectDB } from "../config/db";
import { createServices } from "../services";
import { parseCorpus } from "../modules/retrieval/indexing.service";
import { errorMessage } from "../utils/errors";

const main = async (file: string | undefined): Promise<void> => {
  if (!file) throw new Error("Usage: npm run index-documents -- <file.json>");

  const documents = parseCorpus(await readFile(file, "utf8"));
  const config = loadConfig();
  await connectDB(config.mongoUri);
  try {
    const { indexing } = createServices(config);
    const count = await indexing.indexDocuments(documents);
    console.log(`[Indexing] Done: ${count} document(s) from ${file}`);
  } finally {
    await disconnectDB();
  }
};

main(process.argv[2]).catch((error: unknown) => {
  console.error(`[index-documents] ${errorMessage(error)}`);
  process.exit(1);
});
