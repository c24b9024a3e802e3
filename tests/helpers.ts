import { mkdtempSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { vi } from "vitest";
import type { AIBackend } from "../src/ai";
import { RequestDispatcher, type DispatcherOptions, type VoicePayload } from "../src/dispatcher";
import { RateLimiter } from "../src/rate-limiter";
import { AuthorizationStore } from "../src/storage";
import type { SentMessage, Transport } from "../src/transport";

export const ADMIN = 1001;
export const USER = 2002;
export const STRANGER = 3003;

export type TransportEvent =
  | { type: "send"; id: number; text: string }
  | { type: "edit"; id: number; text: string }
  | { type: "delete"; id: number }
  | { type: "photo"; bytes: number; caption?: string };

/** In-memory transport that records every outbound call in order. */
export class FakeTransport implements Transport {
  readonly events: TransportEvent[] = [];
  failEdits = false;
  failPhotos = false;
  /** 1-based index of the sendText call that should fail, if any. */
  failOnSend: number | null = null;
  private nextId = 1;
  private sendCalls = 0;

  async sendText(text: string): Promise<SentMessage> {
    this.sendCalls++;
    if (this.sendCalls === this.failOnSend) throw new Error("Network request for 'sendMessage' failed");
    const id = this.nextId++;
    this.events.push({ type: "send", id, text });
    return { messageId: id };
  }

  async sendChunks(segments: string[]): Promise<void> {
    for (const segment of segments) {
      await this.sendText(segment);
    }
  }

  async editText(messageId: number, text: string): Promise<void> {
    if (this.failEdits) throw new Error("Bad Request: message can't be edited");
    this.events.push({ type: "edit", id: messageId, text });
  }

  async sendPhoto(image: Uint8Array, caption?: string): Promise<void> {
    if (this.failPhotos) throw new Error("Bad Request: wrong file");
    this.events.push({ type: "photo", bytes: image.byteLength, caption });
  }

  async deleteMessage(messageId: number): Promise<void> {
    this.events.push({ type: "delete", id: messageId });
  }

  /** Text the user ends up seeing, in order. */
  visibleTexts(): string[] {
    const messages = new Map<number, string>();
    for (const event of this.events) {
      if (event.type === "send" || event.type === "edit") messages.set(event.id, event.text);
      if (event.type === "delete") messages.delete(event.id);
    }
    return [...messages.values()];
  }
}

export function fakeBackend(overrides: Partial<AIBackend> = {}): AIBackend {
  return {
    providerName: "gemini",
    generateText: vi.fn(async (prompt: string) => `echo: ${prompt}`),
    generateWithAudio: vi.fn(async () => "Transcription: hello. Response: hi there"),
    generateImage: vi.fn(async () => new Uint8Array([1, 2, 3, 4])),
    ...overrides,
  };
}

export function voicePayload(bytes = new Uint8Array([9, 9]), fileSize?: number): VoicePayload {
  return {
    mimeType: "audio/ogg",
    fileSize,
    withAudio: (use) => use(bytes),
  };
}

export interface Harness {
  dispatcher: RequestDispatcher;
  store: AuthorizationStore;
  backend: AIBackend;
  limiter: RateLimiter;
}

export function createHarness(options: Partial<DispatcherOptions> = {}): Harness {
  const dir = mkdtempSync(join(tmpdir(), "relay-dispatch-"));
  const store = new AuthorizationStore(join(dir, "authorized_users.json"), ADMIN);
  store.load();
  store.authorize(USER);

  const backend = options.backend ?? fakeBackend();
  const limiter = options.limiter ?? new RateLimiter({ minIntervalMs: 0 });
  const dispatcher = new RequestDispatcher({
    store,
    limiter,
    backend,
    maxMessageLength: 4000,
    voicePrompt: "transcribe then answer",
    maxVoiceBytes: 1000,
    ...options,
  });
  return { dispatcher, store, backend, limiter };
}
