/**
 * Utility functions for the relay bot
 */

import type { PrincipalId } from "./types";

/**
 * Parse a Telegram user id. Only positive safe integers are accepted;
 * anything else (including "0") yields null.
 */
export function parsePrincipalId(value: string | undefined): PrincipalId | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const id = Number(trimmed);
  if (!Number.isSafeInteger(id) || id <= 0) return null;
  return id;
}

/**
 * Generate a unique request ID for tracing
 * Format: req-{timestamp}-{counter}{random4chars}
 */
let requestCounter = 0;
export function generateRequestId(): string {
  const timestamp = Date.now();
  const count = (requestCounter++).toString(36);
  const chars = "abcdefghijklmnopqrstuvwxyz0123456789";
  let random = "";
  for (let i = 0; i < 4; i++) {
    random += chars.charAt(Math.floor(Math.random() * chars.length));
  }
  return `req-${timestamp}-${count}${random}`;
}
