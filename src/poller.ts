/**
 * Bot wiring and update loop
 *
 * Updates are fed through @grammyjs/runner so requests from different users
 * are handled concurrently; the rate limiter is the only shared gate.
 */

import { Bot, Context } from "grammy";
import { run, type RunnerHandle } from "@grammyjs/runner";
import { BOT_COMMANDS, handleCommand, parseCommand } from "./commands";
import type { RequestDispatcher, VoicePayload } from "./dispatcher";
import { info, warn, error, debug } from "./logger";
import { TelegramTransport } from "./transport";
import { DEFAULT_VOICE_MIME_TYPE, downloadTelegramFile, withTempVoiceFile } from "./voice";

async function handleTextMessage(ctx: Context, dispatcher: RequestDispatcher): Promise<void> {
  const principal = ctx.from?.id;
  const messageText = ctx.message?.text;
  if (principal === undefined || !messageText) return;

  const transport = new TelegramTransport(ctx);
  const parsed = parseCommand(messageText);
  if (parsed) {
    await handleCommand(dispatcher, transport, principal, parsed);
    return;
  }
  await dispatcher.handleText(transport, principal, messageText);
}

async function handleVoiceMessage(ctx: Context, dispatcher: RequestDispatcher): Promise<void> {
  const principal = ctx.from?.id;
  const voice = ctx.message?.voice;
  if (principal === undefined || !voice) return;

  const payload: VoicePayload = {
    mimeType: voice.mime_type ?? DEFAULT_VOICE_MIME_TYPE,
    fileSize: voice.file_size,
    withAudio<T>(use: (audio: Uint8Array) => Promise<T>): Promise<T> {
      return withTempVoiceFile((destPath) => downloadTelegramFile(ctx.api, voice.file_id, destPath), use);
    },
  };
  await dispatcher.handleVoice(new TelegramTransport(ctx), principal, payload);
}

export function createBot(token: string, dispatcher: RequestDispatcher): Bot {
  const bot = new Bot(token);

  bot.on("message:text", (ctx) => handleTextMessage(ctx, dispatcher));
  bot.on("message:voice", (ctx) => handleVoiceMessage(ctx, dispatcher));

  bot.catch((err) => {
    const errObj = err.error || err;
    const errMsg = errObj instanceof Error ? errObj.message : String(errObj);
    // Editing a message to the same text is harmless
    if (errMsg.includes("message is not modified")) {
      debug("poller", "bot_error_benign", { error: errMsg });
      return;
    }
    error("poller", "bot_error", {
      error: errMsg,
      chatId: err.ctx?.chat?.id,
    });
  });

  return bot;
}

/** Publishes the command menu; failure only costs the menu. */
export async function registerCommandMenu(bot: Bot): Promise<void> {
  try {
    await bot.api.setMyCommands(BOT_COMMANDS);
  } catch (err) {
    warn("poller", "set_commands_failed", {
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

/**
 * Resolve the bot identity, retrying with capped exponential backoff, then
 * start the concurrent runner. An invalid token is fatal.
 */
export async function startPolling(bot: Bot): Promise<RunnerHandle> {
  info("poller", "starting_polling");

  let retryCount = 0;
  const baseDelay = 1000;
  const maxDelay = 300000; // 5 minutes

  while (true) {
    try {
      await bot.init();
      break;
    } catch (err) {
      retryCount++;
      const errMsg = err instanceof Error ? err.message : String(err);

      if (errMsg.includes("401") || errMsg.includes("Unauthorized")) {
        error("poller", "fatal_auth_error", { error: errMsg });
        throw new Error("Bot token is invalid or revoked. Cannot start polling.");
      }

      error("poller", "start_failed", {
        attempt: retryCount,
        error: errMsg,
      });

      const jitter = Math.random() * 1000;
      const delay = Math.min(baseDelay * Math.pow(2, retryCount - 1) + jitter, maxDelay);
      info("poller", "retrying", { delayMs: Math.round(delay), attempt: retryCount });
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  const runner = run(bot);
  info("poller", "bot_started", { username: bot.botInfo.username });
  return runner;
}
