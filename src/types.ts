/**
 * Type definitions for the relay bot
 */

/** Telegram user id */
export type PrincipalId = number;

/** On-disk shape of the authorized users file */
export interface AuthorizationFile {
  users: PrincipalId[];
}

export type RevokeResult = "revoked" | "admin_protected" | "not_present";

export interface TranscriptPair {
  transcription: string;
  reply: string;
}

export type RequestKind = "text" | "voice" | "image";
