import { info } from "../logger";
import type { AIBackend, AIBackendOptions } from "./types";
import { createGeminiBackend } from "./providers/gemini";

export function createAIBackend(options: AIBackendOptions): AIBackend {
  const backend = createGeminiBackend(options);
  info("ai", "backend_created", {
    provider: backend.providerName,
    textModel: options.textModel,
    imageModel: options.imageModel,
    timeoutMs: options.timeoutMs,
  });
  return backend;
}

export type { AIBackend, AIBackendOptions, AIProviderName } from "./types";
