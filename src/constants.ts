/**
 * Constants for the relay bot
 */

export const BOT_VERSION = "1.0.0";

// Telegram rejects messages above 4096 characters
export const TELEGRAM_MAX_MESSAGE_LENGTH = 4096;
// Telegram caps photo captions at 1024 characters
export const TELEGRAM_MAX_CAPTION_LENGTH = 1024;

export const TRANSCRIPT_PLACEHOLDER = "(voice message)";

export const ICONS = {
  success: "✅", error: "❌", pending: "⏳", warning: "⚠️",
  blocked: "⛔", voice: "🎙️", reply: "💬", image: "🎨",
  user: "👤", admin: "👑", bot: "🤖",
};

export const NOTICES = {
  processing: `${ICONS.pending} Processing…`,
  generatingImage: `${ICONS.image} Generating image…`,
  notAuthorized: `${ICONS.blocked} You are not authorized to use this bot. Send /whoami and share your ID with the admin to request access.`,
  adminOnly: `${ICONS.blocked} This command is available to the admin only.`,
  rateLimited: `${ICONS.pending} The AI service is receiving too many requests right now. Please try again later.`,
  backendFailure: `${ICONS.error} Something went wrong while processing your request. Please try again.`,
  deliveryFailed: `${ICONS.warning} The reply could not be delivered in full. Please try again.`,
  emptyResponse: "(empty response)",
  imageUnavailable: `${ICONS.warning} The model did not return an image for that description. Try rephrasing it.`,
  imageUsage: "Usage: /image <description>",
  storageFailure: `${ICONS.error} Could not save the user list. Check the server logs.`,
  voiceTooLarge: `${ICONS.warning} That voice message is too large to process. Please send a shorter one.`,
};
