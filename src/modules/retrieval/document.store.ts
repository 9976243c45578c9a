import DocumentModel from "./document.model";
import { DocumentStore } from "../../types";

/** DocumentStore over the mongoose Document model. */
export const createMongoDocumentStore = (): DocumentStore => ({
  findByIds: async (ids) => {
    if (ids.length === 0) return [];
    const docs = await DocumentModel.find({ docId: { $in: ids } });
    return docs.map((doc) => ({
      id: doc.docId,
      text: doc.text,
      metadata: doc.metadata ?? {},
    }));
  },

  upsertMany: async (documents) => {
    if (documents.length === 0) return;
    await DocumentModel.bulkWrite(
      documents.map((doc) => ({
        updateOne: {
          filter: { docId: doc.id },
          update: { $set: { text: doc.text, metadata: doc.metadata } },
          upsert: true,
        },
      }))
    );
  },
});
