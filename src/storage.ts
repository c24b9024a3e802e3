/**
 * Persistent authorization store
 *
 * Authorized users live in one JSON file (`{ "users": [id, ...] }`). The admin
 * is always a member. A missing or corrupt file is replaced with a fresh
 * document holding only the admin.
 */

import { readFileSync, existsSync, writeFileSync, renameSync, mkdirSync, unlinkSync } from "fs";
import { dirname, join } from "path";
import { info, warn, error } from "./logger";
import type { AuthorizationFile, PrincipalId, RevokeResult } from "./types";

/**
 * Atomic write: write to temp file then rename (prevents corruption on crash)
 */
function atomicWriteSync(filePath: string, content: string): void {
  const dir = dirname(filePath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  const tempPath = join(dir, `.${Date.now()}.${process.pid}.tmp`);
  try {
    writeFileSync(tempPath, content);
    renameSync(tempPath, filePath);
  } catch (err) {
    if (existsSync(tempPath)) {
      try {
        unlinkSync(tempPath);
      } catch (cleanupErr) {
        warn("storage", "temp_file_cleanup_failed", {
          tempPath,
          error: cleanupErr instanceof Error ? cleanupErr.message : String(cleanupErr),
        });
      }
    }
    throw err;
  }
}

function isValidPrincipal(value: unknown): value is PrincipalId {
  return typeof value === "number" && Number.isSafeInteger(value) && value > 0;
}

export class AuthorizationStore {
  private users: Set<PrincipalId>;

  constructor(
    private readonly filePath: string,
    private readonly adminId: PrincipalId | null
  ) {
    this.users = new Set(this.fallbackUsers());
  }

  /**
   * Read the users file. Never throws: unreadable or malformed storage is
   * replaced with the fallback set, which is written back immediately.
   */
  load(): ReadonlySet<PrincipalId> {
    const stored = this.readUsersFile();

    if (stored === null) {
      this.users = new Set(this.fallbackUsers());
      this.persistAfterLoad("fallback");
      return new Set(this.users);
    }

    this.users = new Set(stored);
    if (this.adminId !== null && !this.users.has(this.adminId)) {
      this.users.add(this.adminId);
      this.persistAfterLoad("admin_restored");
    }

    info("storage", "users_loaded", { count: this.users.size });
    return new Set(this.users);
  }

  /** Replace the stored set. The admin is always kept. */
  save(users: Iterable<PrincipalId> = this.users): void {
    const next = new Set(users);
    if (this.adminId !== null) {
      next.add(this.adminId);
    }
    const document: AuthorizationFile = { users: [...next] };
    atomicWriteSync(this.filePath, JSON.stringify(document, null, 2));
    this.users = next;
  }

  /** Returns true when the user was not authorized before. */
  authorize(principal: PrincipalId): boolean {
    const added = !this.users.has(principal);
    const next = new Set(this.users);
    next.add(principal);
    this.save(next);
    return added;
  }

  revoke(principal: PrincipalId): RevokeResult {
    if (principal === this.adminId) {
      return "admin_protected";
    }
    if (!this.users.has(principal)) {
      return "not_present";
    }
    const next = new Set(this.users);
    next.delete(principal);
    this.save(next);
    return "revoked";
  }

  isAuthorized(principal: PrincipalId): boolean {
    return principal === this.adminId || this.users.has(principal);
  }

  isAdmin(principal: PrincipalId): boolean {
    return this.adminId !== null && principal === this.adminId;
  }

  list(): PrincipalId[] {
    return [...this.users].sort((a, b) => a - b);
  }

  private fallbackUsers(): PrincipalId[] {
    return this.adminId !== null ? [this.adminId] : [];
  }

  private readUsersFile(): PrincipalId[] | null {
    if (!existsSync(this.filePath)) {
      info("storage", "users_file_missing", { path: this.filePath });
      return null;
    }

    let content: string;
    try {
      content = readFileSync(this.filePath, "utf-8");
    } catch (err) {
      error("storage", "users_file_read_failed", {
        path: this.filePath,
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      warn("storage", "users_file_corrupt", {
        path: this.filePath,
        error: err instanceof Error ? err.message : String(err),
        contentLength: content.length,
        contentPreview: content.substring(0, 100),
      });
      return null;
    }

    if (typeof parsed !== "object" || parsed === null || !("users" in parsed) || !Array.isArray(parsed.users)) {
      warn("storage", "users_file_invalid_shape", { path: this.filePath });
      return null;
    }

    const users: unknown[] = parsed.users;
    const valid = users.filter(isValidPrincipal);
    if (valid.length !== users.length) {
      warn("storage", "users_file_entries_dropped", { dropped: users.length - valid.length });
    }
    return valid;
  }

  private persistAfterLoad(reason: string): void {
    try {
      this.save(this.users);
      info("storage", "users_file_reseeded", { reason, count: this.users.size });
    } catch (err) {
      // The in-memory set stays usable; the next mutation retries the write
      error("storage", "users_file_write_failed", {
        path: this.filePath,
        reason,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
