// ============================================================
// Retrieval Service — Query → Embedding → Nearest Neighbours
// ============================================================
// The "Retrieval" half of RAG, exposed on its own:
//
//   1. Embed the query text (Gemini embeddings)
//   2. Ask the vector index for the top-k nearest vectors (Pinecone)
//   3. Map every returned id back to document text:
//        - the vector's `text` metadata, when present
//        - otherwise the document store (MongoDB side lookup)
//   4. Order by similarity (highest first) and cut snippets
//
// An empty match list is a normal, successful result.
// Embedding / index failures surface as 502 (503 on timeout).
// ============================================================

import { DocumentStore, Embedder, RetrievalHit, RetrievalResult, VectorIndex } from "../../types";

// Snippet length returned per hit
export const SNIPPET_LENGTH = 300;
export const MAX_QUERY_LENGTH = 500;

export interface RetrievalDeps {
  embedder: Embedder;
  index: VectorIndex;
  documents: DocumentStore;
  now?: () => number;
}

export interface RetrievalService {
  search(query: string, topK: number): Promise<RetrievalResult>;
}

const metadataText = (metadata?: Record<string, unknown>): string | undefined => {
  const text = metadata?.text;
  return typeof text === "string" && text.length > 0 ? text : undefined;
};

export const createRetrievalService = ({
  embedder,
  index,
  documents,
  now = Date.now,
}: RetrievalDeps): RetrievalService => ({
  search: async (query, topK) => {
    const vector = await embedder.embedQuery(query);

    const started = now();
    const matches = await index.query(vector, topK);
    const elapsed = `${((now() - started) / 1000).toFixed(2)}s`;

    const missing = matches.filter((m) => !metadataText(m.metadata)).map((m) => m.id);
    const stored = missing.length > 0 ? await documents.findByIds(missing) : [];
    const storedText = new Map(stored.map((d) => [d.id, d.text]));

    const results: RetrievalHit[] = [];
    for (const match of matches) {
      const text = metadataText(match.metadata) ?? storedText.get(match.id);
      if (text === undefined) {
        console.warn(`[Retrieval] No document found for vector ${match.id}; skipping`);
        continue;
      }
      results.push({ id: match.id, doc: text.slice(0, SNIPPET_LENGTH), score: match.score });
    }

    // Array.prototype.sort is stable: equal scores keep index order
    results.sort((a, b) => b.score - a.score);

    console.log(`[Retrieval] ${results.length} result(s) for query in ${elapsed}`);
    return { query, elapsed, results: results.slice(0, topK) };
  },
});
