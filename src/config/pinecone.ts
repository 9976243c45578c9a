// ============================================================
// Pinecone Vector Index
// ============================================================
// Pinecone holds one vector per indexed document. Each vector
// carries the document text in its `text` metadata field so most
// queries need no side lookup at all.
//
// SETUP REQUIRED:
//   1. Create an index with dimension = EMBEDDING_DIMENSIONS
//      (768 by default) and metric = cosine
//   2. Set PINECONE_API_KEY and PINECONE_INDEX_NAME
//   3. Optionally set PINECONE_NAMESPACE to isolate this dataset
// ============================================================

import { Pinecone } from "@pinecone-database/pinecone";
import { AppConfig } from "./env";
import { VectorIndex, VectorMetadata } from "../types";
import { callUpstream } from "../utils/upstream";

export const PINECONE_SERVICE = "Pinecone";

export const createPineconeIndex = (config: AppConfig): VectorIndex => {
  const pinecone = new Pinecone({ apiKey: config.pinecone.apiKey });
  const index = pinecone.index<VectorMetadata>(config.pinecone.indexName);
  const target = config.pinecone.namespace
    ? index.namespace(config.pinecone.namespace)
    : index;
  const timeoutMs = config.upstreamTimeoutMs;

  return {
    query: (vector, topK) =>
      callUpstream(PINECONE_SERVICE, timeoutMs, async () => {
        const response = await target.query({
          vector,
          topK,
          includeMetadata: true,
        });
        return response.matches.map((match) => ({
          id: match.id,
          score: match.score ?? 0,
          metadata: match.metadata,
        }));
      }),

    upsert: (records) =>
      callUpstream(PINECONE_SERVICE, timeoutMs, () => target.upsert(records)),
  };
};
