/**
 * Outbound side of the chat transport.
 *
 * The dispatcher only sees `Transport`; `TelegramTransport` binds it to the
 * grammy context of one inbound update.
 */

import { Context, InputFile } from "grammy";
import { debug } from "./logger";

export interface SentMessage {
  messageId: number;
}

export interface Transport {
  sendText: (text: string) => Promise<SentMessage>;
  /** Sends segments one at a time, in order. */
  sendChunks: (segments: string[]) => Promise<void>;
  editText: (messageId: number, text: string) => Promise<void>;
  sendPhoto: (image: Uint8Array, caption?: string) => Promise<void>;
  deleteMessage: (messageId: number) => Promise<void>;
}

/** Check if a Telegram error is retryable (rate limit, server error) */
function isRetryableError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const msg = err.message;
  if (msg.includes("429") || msg.includes("Too Many Requests") || msg.includes("retry after")) return true;
  if (/\b5\d\d\b/.test(msg)) return true;
  if (msg.includes("ETIMEDOUT") || msg.includes("ECONNRESET") || msg.includes("Network request")) return true;
  return false;
}

export class TelegramTransport implements Transport {
  private initialReplySent = false;

  constructor(private readonly ctx: Context) {}

  async sendText(text: string): Promise<SentMessage> {
    const options = this.replyOptions();
    const sent = await this.withRetry("sendMessage", () => this.ctx.reply(text, options));
    this.initialReplySent = true;
    return { messageId: sent.message_id };
  }

  async sendChunks(segments: string[]): Promise<void> {
    for (const segment of segments) {
      await this.sendText(segment);
    }
  }

  async editText(messageId: number, text: string): Promise<void> {
    const chatId = this.chatId();
    await this.withRetry("editMessageText", () =>
      this.ctx.api.editMessageText(chatId, messageId, text, {
        link_preview_options: { is_disabled: true },
      })
    );
  }

  async sendPhoto(image: Uint8Array, caption?: string): Promise<void> {
    const threadId = this.ctx.msg?.message_thread_id;
    await this.withRetry("sendPhoto", () =>
      this.ctx.replyWithPhoto(new InputFile(image, "image.png"), {
        ...(caption ? { caption } : {}),
        ...(threadId !== undefined ? { message_thread_id: threadId } : {}),
      })
    );
  }

  async deleteMessage(messageId: number): Promise<void> {
    await this.ctx.api.deleteMessage(this.chatId(), messageId);
  }

  private chatId(): number {
    const chat = this.ctx.chat;
    if (!chat) {
      throw new Error("Update has no chat to reply in");
    }
    return chat.id;
  }

  // Only the first message of a response quotes the user's message
  private replyOptions() {
    const msg = this.ctx.msg;
    const threadId = msg?.message_thread_id;
    const quote = !this.initialReplySent;
    return {
      link_preview_options: { is_disabled: true },
      ...(threadId !== undefined ? { message_thread_id: threadId } : {}),
      ...(quote && msg ? { reply_parameters: { message_id: msg.message_id, allow_sending_without_reply: true } } : {}),
    };
  }

  /** Retry a Telegram API call once after a short delay for transient errors */
  private async withRetry<T>(label: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (!isRetryableError(err)) throw err;
      const delay = err instanceof Error && err.message.includes("retry after") ? 2000 : 1000;
      debug("transport", "telegram_retry", {
        label,
        delayMs: delay,
        error: err instanceof Error ? err.message : String(err),
      });
      await new Promise((resolve) => setTimeout(resolve, delay));
      return await fn();
    }
  }
}
