// ============================================================
// Indexing Service — Documents → Vectors
// ============================================================
// Feeds the retrieval endpoint. For each batch of documents:
//
//   1. Embed all texts in one call
//   2. Upsert the vectors into the index (id = document id)
//   3. Save the full documents into the document store
//
// Texts up to METADATA_TEXT_LIMIT characters are also copied into
// the vector's `text` metadata so queries can skip the side lookup.
// Pinecone caps metadata size, so longer texts live only in MongoDB.
// ============================================================

import { z } from "zod";
import { DocumentStore, Embedder, StoredDocument, VectorIndex, VectorRecord } from "../../types";
import { ValidationError, errorMessage } from "../../utils/errors";

export const METADATA_TEXT_LIMIT = 8000;
export const DEFAULT_BATCH_SIZE = 50;

export interface IndexingDeps {
  embedder: Embedder;
  index: VectorIndex;
  documents: DocumentStore;
}

const corpusSchema = z.array(
  z.object({
    id: z.string().trim().min(1),
    text: z.string().min(1),
    metadata: z.record(z.string()).default({}),
  })
);

/** Parse the JSON corpus file read by the index-documents script. */
export const parseCorpus = (raw: string): StoredDocument[] => {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`Corpus is not valid JSON: ${errorMessage(error)}`);
  }

  const parsed = corpusSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`Invalid corpus at [${issue.path.join(".")}]: ${issue.message}`);
  }
  return parsed.data;
};

export const toVectorRecord = (doc: StoredDocument, values: number[]): VectorRecord => {
  // `text` is reserved for the document body; retrieval reads it as such
  const { text: _reserved, ...metadata } = doc.metadata;
  return {
    id: doc.id,
    values,
    metadata: doc.text.length <= METADATA_TEXT_LIMIT ? { ...metadata, text: doc.text } : metadata,
  };
};

export const createIndexingService = ({ embedder, index, documents }: IndexingDeps) => ({
  /** Returns the number of documents indexed. */
  indexDocuments: async (docs: StoredDocument[], batchSize = DEFAULT_BATCH_SIZE): Promise<number> => {
    const ids = new Set<string>();
    for (const doc of docs) {
      if (!doc.id || doc.text.trim().length === 0) {
        throw new ValidationError(`Document "${doc.id}" needs an id and non-empty text`);
      }
      if (ids.has(doc.id)) throw new ValidationError(`Duplicate document id "${doc.id}"`);
      ids.add(doc.id);
    }

    let indexed = 0;
    for (let i = 0; i < docs.length; i += batchSize) {
      const batch = docs.slice(i, i + batchSize);
      const vectors = await embedder.embedDocuments(batch.map((d) => d.text));

      await index.upsert(batch.map((doc, j) => toVectorRecord(doc, vectors[j])));
      await documents.upsertMany(batch);

      indexed += batch.length;
      console.log(`[Indexing] ${indexed}/${docs.length} documents indexed`);
    }
    return indexed;
  },
});

export type IndexingService = ReturnType<typeof createIndexingService>;
