import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { experimental_generateImage as generateImage, generateText, NoImageGeneratedError } from "ai";
import { debug } from "../../logger";
import type { AIBackend, AIBackendOptions } from "../types";

export function createGeminiBackend(options: AIBackendOptions): AIBackend {
  const google = createGoogleGenerativeAI({ apiKey: options.apiKey });

  const deadline = (): AbortSignal | undefined =>
    options.timeoutMs > 0 ? AbortSignal.timeout(options.timeoutMs) : undefined;

  return {
    providerName: "gemini",

    async generateText(prompt: string): Promise<string> {
      const startTime = Date.now();
      // Retries are disabled: failures surface to the user instead
      const result = await generateText({
        model: google(options.textModel),
        prompt,
        maxRetries: 0,
        abortSignal: deadline(),
      });
      debug("gemini", "text_generated", {
        model: options.textModel,
        promptLength: prompt.length,
        responseLength: result.text.length,
        durationMs: Date.now() - startTime,
      });
      return result.text;
    },

    async generateWithAudio(prompt: string, audio: Uint8Array, mimeType: string): Promise<string> {
      const startTime = Date.now();
      const result = await generateText({
        model: google(options.textModel),
        messages: [
          {
            role: "user",
            content: [
              { type: "text", text: prompt },
              { type: "file", data: audio, mediaType: mimeType },
            ],
          },
        ],
        maxRetries: 0,
        abortSignal: deadline(),
      });
      debug("gemini", "audio_answered", {
        model: options.textModel,
        audioBytes: audio.byteLength,
        mimeType,
        responseLength: result.text.length,
        durationMs: Date.now() - startTime,
      });
      return result.text;
    },

    async generateImage(prompt: string): Promise<Uint8Array | null> {
      try {
        const result = await generateImage({
          model: google.image(options.imageModel),
          prompt,
          n: 1,
          maxRetries: 0,
          abortSignal: deadline(),
        });
        return result.image.uint8Array;
      } catch (err) {
        if (NoImageGeneratedError.isInstance(err)) {
          debug("gemini", "no_image_generated", { model: options.imageModel });
          return null;
        }
        throw err;
      }
    },
  };
}
