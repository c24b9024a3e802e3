/**
 * Slash-command parsing and routing
 */

import { ICONS, NOTICES } from "./constants";
import type { AccessLevel, RequestDispatcher } from "./dispatcher";
import { debug } from "./logger";
import type { Transport } from "./transport";
import type { PrincipalId } from "./types";

export interface ParsedCommand {
  command: string;
  args: string;
}

/** Menu shown by Telegram clients; admin commands are listed too. */
export const BOT_COMMANDS = [
  { command: "start", description: "Introduction" },
  { command: "help", description: "Show available commands" },
  { command: "image", description: "Generate an image from a description" },
  { command: "whoami", description: "Show your Telegram user ID" },
  { command: "auth", description: "Authorize a user (admin)" },
  { command: "revoke", description: "Revoke a user's access (admin)" },
  { command: "users", description: "List authorized users (admin)" },
];

/**
 * Split "/cmd@bot_name some args" into `{ command: "cmd", args: "some args" }`.
 * Returns null for text that is not a command.
 */
export function parseCommand(text: string): ParsedCommand | null {
  if (!text.startsWith("/")) return null;
  const parts = text.slice(1).split(" ");
  const commandToken = parts[0] || "";
  const command = commandToken.split("@")[0].toLowerCase();
  if (!command) return null;
  return { command, args: parts.slice(1).join(" ") };
}

export function buildHelpText(access: AccessLevel): string {
  const lines = [
    `${ICONS.bot} Send me a text or a voice message and I'll pass it to the AI model.`,
    "",
    "/image <description> - generate an image",
    "/whoami - show your user ID and access status",
    "/help - this message",
  ];
  if (access === "admin") {
    lines.push(
      "",
      `${ICONS.admin} Admin`,
      "/auth <user_id> - authorize a user",
      "/revoke <user_id> - revoke a user's access",
      "/users - list authorized users"
    );
  }
  return lines.join("\n");
}

export function buildStartText(access: AccessLevel, principal: PrincipalId): string {
  if (access === "unauthorized") {
    return `Hi! ${NOTICES.notAuthorized}\n\n${ICONS.user} Your ID: ${principal}`;
  }
  return `Hi! ${buildHelpText(access)}`;
}

export async function handleCommand(
  dispatcher: RequestDispatcher,
  transport: Transport,
  principal: PrincipalId,
  parsed: ParsedCommand
): Promise<void> {
  const { command, args } = parsed;
  debug("commands", "command_received", { principal, command });

  switch (command) {
    case "start":
      await transport.sendText(buildStartText(dispatcher.describeAccess(principal), principal));
      return;

    case "help":
      await transport.sendText(buildHelpText(dispatcher.describeAccess(principal)));
      return;

    case "whoami":
      await dispatcher.whoami(transport, principal);
      return;

    case "image":
      await dispatcher.handleImage(transport, principal, args);
      return;

    case "auth":
      await dispatcher.authorizeUser(transport, principal, args);
      return;

    case "revoke":
      await dispatcher.revokeUser(transport, principal, args);
      return;

    case "users":
      await dispatcher.listUsers(transport, principal);
      return;

    default:
      if (dispatcher.describeAccess(principal) === "unauthorized") {
        await transport.sendText(NOTICES.notAuthorized);
        return;
      }
      await transport.sendText(`I don't recognize /${command}. Use /help to see what I can do.`);
  }
}
