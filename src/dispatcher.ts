/**
 * Request dispatcher
 *
 * Every inbound request goes through the same steps: authorization guard,
 * "Processing…" placeholder, rate-limited backend call, formatting and
 * in-order delivery. Failures end in exactly one notice to the user and one
 * log entry; the placeholder is always edited or deleted.
 */

import type { AIBackend } from "./ai";
import { truncateText } from "./chunker";
import { ICONS, NOTICES, TELEGRAM_MAX_CAPTION_LENGTH } from "./constants";
import { BackendError, GenericBackendError } from "./errors";
import { classifyBackendError, getFailureNotice } from "./failure-classifier";
import { info, warn, error, debug } from "./logger";
import type { RateLimiter } from "./rate-limiter";
import { formatTextReply, formatVoiceReply, toSegments, type FormattedReply } from "./response-format";
import type { AuthorizationStore } from "./storage";
import type { SentMessage, Transport } from "./transport";
import type { PrincipalId, RequestKind, RevokeResult } from "./types";
import { generateRequestId, parsePrincipalId } from "./utils";

export interface DispatcherOptions {
  store: AuthorizationStore;
  limiter: RateLimiter;
  backend: AIBackend;
  maxMessageLength: number;
  voicePrompt: string;
  maxVoiceBytes: number;
}

export interface VoicePayload {
  mimeType: string;
  fileSize?: number;
  /** Provides the audio bytes for the duration of `use`, then releases them. */
  withAudio: <T>(use: (audio: Uint8Array) => Promise<T>) => Promise<T>;
}

export type DispatchOutcome = "rejected" | "invalid" | "delivered" | "failed";

export type AccessLevel = "admin" | "authorized" | "unauthorized";

interface RequestScope {
  transport: Transport;
  principal: PrincipalId;
  requestId: string;
  kind: RequestKind;
}

function toBackendError(err: unknown): BackendError {
  if (err instanceof BackendError) return err;
  return new GenericBackendError(err instanceof Error ? err.message : String(err), { cause: err });
}

export class RequestDispatcher {
  constructor(private readonly options: DispatcherOptions) {}

  // ============ GUARDS ============

  /** Replies with the "not authorized" notice when the check fails. */
  async ensureAuthorized(transport: Transport, principal: PrincipalId, requestId: string): Promise<boolean> {
    if (this.options.store.isAuthorized(principal)) {
      return true;
    }
    warn("dispatcher", "unauthorized_access", { principal }, requestId);
    await transport.sendText(NOTICES.notAuthorized);
    return false;
  }

  async ensureAdmin(transport: Transport, principal: PrincipalId, requestId: string): Promise<boolean> {
    if (this.options.store.isAdmin(principal)) {
      return true;
    }
    warn("dispatcher", "admin_command_denied", { principal }, requestId);
    await transport.sendText(NOTICES.adminOnly);
    return false;
  }

  // ============ RELAYED REQUESTS ============

  async handleText(transport: Transport, principal: PrincipalId, text: string): Promise<DispatchOutcome> {
    const scope = this.scope(transport, principal, "text");
    if (!(await this.ensureAuthorized(transport, principal, scope.requestId))) {
      return "rejected";
    }

    debug("dispatcher", "text_received", { principal, length: text.length }, scope.requestId);
    return this.relay(scope, async () => {
      const raw = await this.callBackend(() => this.options.backend.generateText(text));
      return formatTextReply(raw);
    });
  }

  async handleVoice(transport: Transport, principal: PrincipalId, voice: VoicePayload): Promise<DispatchOutcome> {
    const scope = this.scope(transport, principal, "voice");
    if (!(await this.ensureAuthorized(transport, principal, scope.requestId))) {
      return "rejected";
    }

    if (voice.fileSize !== undefined && voice.fileSize > this.options.maxVoiceBytes) {
      warn("dispatcher", "voice_too_large", {
        principal,
        fileSize: voice.fileSize,
        maxVoiceBytes: this.options.maxVoiceBytes,
      }, scope.requestId);
      await transport.sendText(NOTICES.voiceTooLarge);
      return "invalid";
    }

    return this.relay(scope, () =>
      voice.withAudio(async (audio) => {
        const raw = await this.callBackend(() =>
          this.options.backend.generateWithAudio(this.options.voicePrompt, audio, voice.mimeType)
        );
        const reply = formatVoiceReply(raw);
        debug("dispatcher", "voice_split", {
          transcriptionLength: reply.transcript.transcription.length,
          replyLength: reply.transcript.reply.length,
        }, scope.requestId);
        return reply;
      })
    );
  }

  async handleImage(transport: Transport, principal: PrincipalId, description: string): Promise<DispatchOutcome> {
    const scope = this.scope(transport, principal, "image");
    if (!(await this.ensureAuthorized(transport, principal, scope.requestId))) {
      return "rejected";
    }

    const prompt = description.trim();
    if (!prompt) {
      await transport.sendText(NOTICES.imageUsage);
      return "invalid";
    }

    const placeholder = await this.sendPlaceholder(scope, NOTICES.generatingImage);

    let image: Uint8Array | null;
    try {
      image = await this.callBackend(() => this.options.backend.generateImage(prompt));
    } catch (err) {
      await this.reportFailure(scope, placeholder, toBackendError(err));
      return "failed";
    }

    if (!image) {
      warn("dispatcher", "image_not_generated", { principal }, scope.requestId);
      await this.notify(scope, placeholder, NOTICES.imageUnavailable);
      return "failed";
    }

    try {
      await transport.sendPhoto(image, truncateText(prompt, TELEGRAM_MAX_CAPTION_LENGTH));
    } catch (err) {
      error("dispatcher", "photo_delivery_failed", {
        principal,
        error: err instanceof Error ? err.message : String(err),
      }, scope.requestId);
      await this.notify(scope, placeholder, NOTICES.backendFailure);
      return "failed";
    }

    await this.removePlaceholder(scope, placeholder);
    info("dispatcher", "image_delivered", { principal, bytes: image.byteLength }, scope.requestId);
    return "delivered";
  }

  // ============ ADMIN COMMANDS ============

  async authorizeUser(transport: Transport, principal: PrincipalId, rawArgs: string): Promise<void> {
    const requestId = generateRequestId();
    if (!(await this.ensureAdmin(transport, principal, requestId))) return;

    const target = this.parseTarget(rawArgs);
    if (target === null) {
      warn("dispatcher", "malformed_admin_command", { command: "auth", args: rawArgs }, requestId);
      await transport.sendText("Usage: /auth <user_id>");
      return;
    }

    let added: boolean;
    try {
      added = this.options.store.authorize(target);
    } catch (err) {
      error("dispatcher", "authorize_failed", {
        target,
        error: err instanceof Error ? err.message : String(err),
      }, requestId);
      await transport.sendText(NOTICES.storageFailure);
      return;
    }

    info("dispatcher", "user_authorized", { target, added }, requestId);
    await transport.sendText(
      added
        ? `${ICONS.success} User ${target} is now authorized.`
        : `User ${target} is already authorized.`
    );
  }

  async revokeUser(transport: Transport, principal: PrincipalId, rawArgs: string): Promise<void> {
    const requestId = generateRequestId();
    if (!(await this.ensureAdmin(transport, principal, requestId))) return;

    const target = this.parseTarget(rawArgs);
    if (target === null) {
      warn("dispatcher", "malformed_admin_command", { command: "revoke", args: rawArgs }, requestId);
      await transport.sendText("Usage: /revoke <user_id>");
      return;
    }

    let result: RevokeResult;
    try {
      result = this.options.store.revoke(target);
    } catch (err) {
      error("dispatcher", "revoke_failed", {
        target,
        error: err instanceof Error ? err.message : String(err),
      }, requestId);
      await transport.sendText(NOTICES.storageFailure);
      return;
    }

    info("dispatcher", "revoke_requested", { target, result }, requestId);
    switch (result) {
      case "revoked":
        await transport.sendText(`${ICONS.success} Access revoked for user ${target}.`);
        return;
      case "admin_protected":
        await transport.sendText(`${ICONS.warning} The admin cannot be revoked.`);
        return;
      case "not_present":
        await transport.sendText(`User ${target} was not authorized.`);
        return;
    }
  }

  async listUsers(transport: Transport, principal: PrincipalId): Promise<void> {
    const requestId = generateRequestId();
    if (!(await this.ensureAdmin(transport, principal, requestId))) return;

    const users = this.options.store.list();
    const lines = users.map((id) => (this.options.store.isAdmin(id) ? `• ${id} (admin)` : `• ${id}`));
    await transport.sendText(`Authorized users (${users.length}):\n${lines.join("\n")}`);
  }

  describeAccess(principal: PrincipalId): AccessLevel {
    const { store } = this.options;
    if (store.isAdmin(principal)) return "admin";
    if (store.isAuthorized(principal)) return "authorized";
    return "unauthorized";
  }

  /** Open to everyone so new users can pass their id to the admin. */
  async whoami(transport: Transport, principal: PrincipalId): Promise<void> {
    const access = this.describeAccess(principal);
    const status =
      access === "admin"
        ? `${ICONS.admin} admin`
        : access === "authorized"
          ? `${ICONS.success} authorized`
          : `${ICONS.blocked} not authorized`;
    await transport.sendText(`${ICONS.user} Your ID: ${principal}\nStatus: ${status}`);
  }

  // ============ PIPELINE ============

  private scope(transport: Transport, principal: PrincipalId, kind: RequestKind): RequestScope {
    return { transport, principal, requestId: generateRequestId(), kind };
  }

  private parseTarget(rawArgs: string): PrincipalId | null {
    const parts = rawArgs.trim().split(/\s+/).filter(Boolean);
    if (parts.length !== 1) return null;
    return parsePrincipalId(parts[0]);
  }

  /** Waits for the global rate gate, then calls the backend. */
  private async callBackend<T>(call: () => Promise<T>): Promise<T> {
    await this.options.limiter.acquire();
    try {
      return await call();
    } catch (err) {
      throw classifyBackendError(err);
    }
  }

  private async relay(scope: RequestScope, produce: () => Promise<FormattedReply>): Promise<DispatchOutcome> {
    const placeholder = await this.sendPlaceholder(scope, NOTICES.processing);
    const startTime = Date.now();

    let reply: FormattedReply;
    try {
      reply = await produce();
    } catch (err) {
      await this.reportFailure(scope, placeholder, toBackendError(err));
      return "failed";
    }

    const segments = toSegments(reply, this.options.maxMessageLength);
    let placeholderReplaced = false;
    try {
      if (placeholder) {
        await this.replacePlaceholder(scope, placeholder, segments[0]);
        placeholderReplaced = true;
        await scope.transport.sendChunks(segments.slice(1));
      } else {
        await scope.transport.sendChunks(segments);
      }
    } catch (err) {
      error("dispatcher", "delivery_failed", {
        principal: scope.principal,
        kind: scope.kind,
        segments: segments.length,
        error: err instanceof Error ? err.message : String(err),
      }, scope.requestId);
      // A partial reply must not pass for a complete one
      await this.notify(scope, placeholderReplaced ? null : placeholder, NOTICES.deliveryFailed);
      return "failed";
    }

    info("dispatcher", "response_delivered", {
      principal: scope.principal,
      kind: scope.kind,
      segments: segments.length,
      durationMs: Date.now() - startTime,
    }, scope.requestId);
    return "delivered";
  }

  private async sendPlaceholder(scope: RequestScope, text: string): Promise<SentMessage | null> {
    try {
      return await scope.transport.sendText(text);
    } catch (err) {
      // Carry on without one; the reply is then sent as fresh messages
      warn("dispatcher", "placeholder_send_failed", {
        error: err instanceof Error ? err.message : String(err),
      }, scope.requestId);
      return null;
    }
  }

  private async reportFailure(scope: RequestScope, placeholder: SentMessage | null, failure: BackendError): Promise<void> {
    error("dispatcher", "backend_failed", {
      principal: scope.principal,
      kind: scope.kind,
      failure: failure.kind,
      error: failure.detail,
    }, scope.requestId);
    await this.notify(scope, placeholder, getFailureNotice(failure.kind));
  }

  /** Show a notice in place of the placeholder; delivery errors are only logged. */
  private async notify(scope: RequestScope, placeholder: SentMessage | null, notice: string): Promise<void> {
    try {
      await this.replacePlaceholder(scope, placeholder, notice);
    } catch (err) {
      error("dispatcher", "notice_undeliverable", {
        error: err instanceof Error ? err.message : String(err),
      }, scope.requestId);
    }
  }

  /**
   * Put `text` where the placeholder was: edit it in place, or delete it and
   * send `text` as a new message when the edit is rejected.
   */
  private async replacePlaceholder(scope: RequestScope, placeholder: SentMessage | null, text: string): Promise<void> {
    if (!placeholder) {
      await scope.transport.sendText(text);
      return;
    }
    try {
      await scope.transport.editText(placeholder.messageId, text);
    } catch (err) {
      warn("dispatcher", "placeholder_edit_failed", {
        messageId: placeholder.messageId,
        error: err instanceof Error ? err.message : String(err),
      }, scope.requestId);
      await this.removePlaceholder(scope, placeholder);
      await scope.transport.sendText(text);
    }
  }

  private async removePlaceholder(scope: RequestScope, placeholder: SentMessage | null): Promise<void> {
    if (!placeholder) return;
    try {
      await scope.transport.deleteMessage(placeholder.messageId);
    } catch (err) {
      error("dispatcher", "placeholder_delete_failed", {
        messageId: placeholder.messageId,
        error: err instanceof Error ? err.message : String(err),
      }, scope.requestId);
    }
  }
}
