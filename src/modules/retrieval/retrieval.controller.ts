// ============================================================
// Retrieval Controller
// ============================================================
//   POST /api/test-query/  → nearest documents for a query
//
// Request body:  { query: "how do refunds work?", topK?: 5 }
// Response (200):
//   {
//     success: true,
//     query: "how do refunds work?",
//     elapsed: "0.12s",
//     results: [{ id: "doc-7", doc: "Refunds are...", score: 0.91 }, ...]
//   }
//
// No matches is NOT an error: results is simply [].
// ============================================================

import { NextFunction, Response } from "express";
import { z } from "zod";
import { MAX_QUERY_LENGTH, RetrievalService } from "./retrieval.service";
import { AuthRequest, TestQueryBody } from "../../types";
import { parseBody } from "../../utils/validate";

export interface RetrievalLimits {
  defaultTopK: number;
  maxTopK: number;
}

const querySchema = (maxTopK: number) =>
  z.object({
    query: z
      .string({ required_error: "query is required", invalid_type_error: "query must be a string" })
      .trim()
      .min(1, "query is required")
      .max(MAX_QUERY_LENGTH, `query must be at most ${MAX_QUERY_LENGTH} characters`),
    topK: z
      .number({ invalid_type_error: "topK must be a number" })
      .int("topK must be an integer")
      .min(1, "topK must be at least 1")
      .max(maxTopK, `topK must be at most ${maxTopK}`)
      .optional(),
  });

export const createRetrievalController = (retrieval: RetrievalService, limits: RetrievalLimits) => {
  const schema = querySchema(limits.maxTopK);

  return {
    testQuery: async (req: AuthRequest, res: Response, next: NextFunction): Promise<void> => {
      try {
        const body: TestQueryBody = parseBody(schema, req.body);
        const result = await retrieval.search(body.query, body.topK ?? limits.defaultTopK);

        res.status(200).json({ success: true, ...result });
      } catch (error) {
        next(error);
      }
    },
  };
};
