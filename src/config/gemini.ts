// ============================================================
// Google Gemini Configuration
// ============================================================
// One GoogleGenAI client per process, shared by:
//   - the chat generator (ai.models.generateContent)
//   - the embedder in utils/embeddings.ts (ai.models.embedContent)
//
// Model names, temperature and embedding size come from AppConfig,
// never from module-level constants, so tests and scripts can build
// their own client.
// ============================================================

import { GoogleGenAI } from "@google/genai";
import { AppConfig } from "./env";
import { GenerationRequest, TextGenerator } from "../types";
import { callUpstream } from "../utils/upstream";
import { UpstreamServiceError } from "../utils/errors";

export const GEMINI_SERVICE = "Gemini";

export const createGeminiClient = (config: AppConfig): GoogleGenAI =>
  new GoogleGenAI({ apiKey: config.gemini.apiKey });

/**
 * TextGenerator backed by Gemini.
 *
 * The prompt is sent as a single user turn and the reply text is
 * returned exactly as the model produced it (no trimming).
 */
export const createGeminiGenerator = (
  ai: GoogleGenAI,
  timeoutMs: number
): TextGenerator => ({
  generate: ({ prompt, model, temperature }: GenerationRequest) =>
    callUpstream(GEMINI_SERVICE, timeoutMs, async () => {
      const response = await ai.models.generateContent({
        model,
        contents: prompt,
        config: { temperature },
      });

      const text = response.text;
      if (text === undefined || text.length === 0) {
        throw new UpstreamServiceError(GEMINI_SERVICE, "empty response");
      }
      return text;
    }),
});
