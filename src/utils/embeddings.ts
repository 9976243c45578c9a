// ============================================================
// Embeddings (Gemini)
// ============================================================
// Text → vector, through ai.models.embedContent().
//
// The vector size is fixed by EMBEDDING_DIMENSIONS (768 by
// default) and MUST match the dimension the Pinecone index was
// created with.
//
// WHERE EMBEDDINGS ARE USED:
//   1. QUERYING: the retrieval endpoint embeds the query text
//   2. INDEXING: scripts/index-documents.ts embeds document batches
// ============================================================

import { GoogleGenAI } from "@google/genai";
import { AppConfig } from "../config/env";
import { GEMINI_SERVICE } from "../config/gemini";
import { Embedder } from "../types";
import { callUpstream } from "./upstream";
import { UpstreamServiceError } from "./errors";

export const createGeminiEmbedder = (ai: GoogleGenAI, config: AppConfig): Embedder => {
  const embed = (texts: string[]): Promise<number[][]> =>
    callUpstream(GEMINI_SERVICE, config.upstreamTimeoutMs, async () => {
      const response = await ai.models.embedContent({
        model: config.gemini.embeddingModel,
        contents: texts,
        config: {
          outputDimensionality: config.gemini.embeddingDimensions,
        },
      });

      const vectors = (response.embeddings ?? []).map((e) => e.values ?? []);
      if (vectors.length !== texts.length || vectors.some((v) => v.length === 0)) {
        throw new UpstreamServiceError(GEMINI_SERVICE, "no embedding returned");
      }
      return vectors;
    });

  return {
    /**
     * Embed a single string.
     *   embedQuery("grant deadlines") → [0.123, -0.456, ...] (768 numbers)
     */
    embedQuery: async (text) => {
      const [vector] = await embed([text]);
      return vector;
    },

    /** Embed many strings in one API call; output order matches input order. */
    embedDocuments: (texts) => (texts.length === 0 ? Promise.resolve([]) : embed(texts)),
  };
};
