/**
 * Voice payload handling: download a Telegram voice note into a temporary
 * file, hand its bytes to the caller, and always remove the file afterwards.
 */

import * as https from "https";
import * as fs from "fs";
import * as path from "path";
import type { Api } from "grammy";
import { env } from "./env";
import { debug, warn } from "./logger";

export const DEFAULT_VOICE_MIME_TYPE = "audio/ogg";

const DOWNLOAD_TIMEOUT_MS = 30000;

/**
 * Download a file from a URL to a local path
 * Handles redirects (up to 3 hops) and removes partial files on failure.
 */
export async function downloadFileFromUrl(url: string, destPath: string, maxRedirects: number = 3): Promise<void> {
  if (maxRedirects <= 0) {
    throw new Error("Too many redirects during file download");
  }

  return new Promise((resolve, reject) => {
    const file = fs.createWriteStream(destPath);
    let settled = false;

    const removePartial = () => {
      fs.rm(destPath, { force: true }, (err) => {
        if (err) warn("voice", "partial_download_cleanup_failed", { error: err.message });
      });
    };

    const settle = (err?: Error) => {
      if (settled) return;
      settled = true;
      if (err) {
        file.close(() => removePartial());
        reject(err);
      } else {
        resolve();
      }
    };

    const req = https.get(url, { timeout: DOWNLOAD_TIMEOUT_MS }, (response) => {
      if (response.statusCode === 301 || response.statusCode === 302) {
        const redirectUrl = response.headers.location;
        if (redirectUrl) {
          response.resume();
          settled = true;
          file.close(() => {
            downloadFileFromUrl(redirectUrl, destPath, maxRedirects - 1).then(resolve, reject);
          });
          return;
        }
      }

      if (response.statusCode !== 200) {
        response.resume();
        settle(new Error(`Download failed with status ${response.statusCode}`));
        return;
      }

      response.pipe(file);
      file.on("finish", () => {
        file.close(() => settle());
      });
      file.on("error", (err) => settle(err));
      response.on("error", (err) => settle(err));
    });

    req.on("error", (err) => settle(err));
    req.on("timeout", () => {
      req.destroy();
      settle(new Error(`Download timed out after ${DOWNLOAD_TIMEOUT_MS / 1000} seconds`));
    });
  });
}

/**
 * Resolve a Telegram file id and download it to `destPath`.
 */
export async function downloadTelegramFile(api: Api, fileId: string, destPath: string): Promise<void> {
  const file = await api.getFile(fileId);
  if (!file.file_path) {
    throw new Error("Telegram returned no download path for the file");
  }
  const fileUrl = `https://api.telegram.org/file/bot${api.token}/${file.file_path}`;
  await downloadFileFromUrl(fileUrl, destPath);
}

function tempVoicePath(tempDir: string): string {
  const id = `voice_${Date.now()}_${Math.random().toString(36).substring(2, 8)}`;
  return path.join(tempDir, `${id}.ogg`);
}

/**
 * Run `use` with the bytes of a freshly downloaded voice file. The temp file
 * is removed whether `download` or `use` succeeds or throws.
 */
export async function withTempVoiceFile<T>(
  download: (destPath: string) => Promise<void>,
  use: (audio: Uint8Array) => Promise<T>,
  tempDir: string = env.RELAY_TMP_DIR
): Promise<T> {
  fs.mkdirSync(tempDir, { recursive: true });
  const filePath = tempVoicePath(tempDir);

  try {
    await download(filePath);
    const audio = fs.readFileSync(filePath);
    debug("voice", "voice_file_ready", { path: filePath, bytes: audio.byteLength });
    return await use(audio);
  } finally {
    try {
      fs.rmSync(filePath, { force: true });
    } catch (err) {
      warn("voice", "temp_file_cleanup_failed", {
        path: filePath,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
