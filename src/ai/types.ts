export type AIProviderName = "gemini";

/**
 * Outbound generative backend. Every method may reject; callers classify the
 * rejection from its message text.
 */
export interface AIBackend {
  providerName: AIProviderName;
  generateText: (prompt: string) => Promise<string>;
  generateWithAudio: (prompt: string, audio: Uint8Array, mimeType: string) => Promise<string>;
  /** Resolves to null when the model produced no image. */
  generateImage: (prompt: string) => Promise<Uint8Array | null>;
}

export interface AIBackendOptions {
  apiKey: string;
  textModel: string;
  imageModel: string;
  // 0 disables the per-call deadline
  timeoutMs: number;
}
