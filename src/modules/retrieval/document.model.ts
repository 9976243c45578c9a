// ============================================================
// Document Model (MongoDB Schema)
// ============================================================
// The side lookup behind the vector index. Pinecone returns ids
// and scores; this collection maps an id back to the full text
// when the vector's own metadata does not carry it (long texts
// are not copied into Pinecone metadata, see indexing.service.ts).
//
// docId is the SAME id used for the Pinecone vector.
// ============================================================

import mongoose, { Schema } from "mongoose";

export interface DocumentRecord {
  docId: string;
  text: string;
  metadata: Record<string, string>;
  createdAt: Date;
  updatedAt: Date;
}

const documentSchema = new Schema<DocumentRecord>(
  {
    docId: { type: String, required: true, unique: true },
    text: { type: String, required: true },
    metadata: { type: Schema.Types.Mixed, default: {} },
  },
  { timestamps: true }
);

export default mongoose.model<DocumentRecord>("Document", documentSchema);
