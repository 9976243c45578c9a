// ============================================================
// Chat Service
// ============================================================
// Turns a validated chat request into one call to the external
// text-generation service.
//
//   resolve()  → picks model + temperature (request overrides are
//                honoured only within the configured allow-list)
//   reply()    → sends the message as-is and returns the model's
//                text verbatim
//
// Used by the controller (sync dispatch) and by the worker pool
// (queue / memory dispatch), so both paths make the same call.
// ============================================================

import { GenerationRequest, TextGenerator } from "../../types";

export interface ChatDefaults {
  model: string;
  allowedModels: string[];
  temperature: number;
}

export interface ChatOptions {
  model?: string;
  temperature?: number;
}

export interface ChatService {
  resolve(message: string, options?: ChatOptions): GenerationRequest;
  reply(request: GenerationRequest): Promise<string>;
}

export const createChatService = (
  generator: TextGenerator,
  defaults: ChatDefaults
): ChatService => ({
  resolve: (message, options = {}) => ({
    prompt: message,
    // Unknown models fall back to the default instead of failing the request
    model:
      options.model && defaults.allowedModels.includes(options.model)
        ? options.model
        : defaults.model,
    temperature: options.temperature ?? defaults.temperature,
  }),

  reply: (request) => generator.generate(request),
});
