import { existsSync, readFileSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import { env } from "./env";
import { TELEGRAM_MAX_MESSAGE_LENGTH } from "./constants";

export interface RelayConfig {
  debug: boolean;
  logRetentionDays: number;
  // Global spacing between outbound backend calls
  minRequestIntervalMs: number;
  // Per-message segment size for chunked replies
  maxMessageLength: number;
  textModel: string;
  imageModel: string;
  // Prompt sent alongside voice payloads; asks for "Transcription:" / "Response:" sections
  voicePrompt: string;
  // 0 disables the deadline
  backendTimeoutMs: number;
  maxVoiceBytes: number;
}

const CONFIG_PATH = env.RELAY_CONFIG;

export const DEFAULT_CONFIG: RelayConfig = {
  debug: false,
  logRetentionDays: 7,
  minRequestIntervalMs: 4000,
  maxMessageLength: 4000,
  textModel: "gemini-2.0-flash",
  imageModel: "imagen-3.0-generate-002",
  voicePrompt: [
    "Listen to the attached voice message.",
    "First write down exactly what the speaker said, then reply to it helpfully.",
    "Use this format:",
    "Transcription: <what the speaker said>",
    "Response: <your reply>",
  ].join("\n"),
  backendTimeoutMs: 120000,
  // Telegram bots cannot download files above 20MB
  maxVoiceBytes: 20 * 1024 * 1024,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readNumber(source: Record<string, unknown>, key: keyof RelayConfig, fallback: number): number {
  const value = source[key];
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function readString(source: Record<string, unknown>, key: keyof RelayConfig, fallback: string): string {
  const value = source[key];
  return typeof value === "string" && value.trim() ? value : fallback;
}

function readBoolean(source: Record<string, unknown>, key: keyof RelayConfig, fallback: boolean): boolean {
  const value = source[key];
  return typeof value === "boolean" ? value : fallback;
}

export function loadConfig(configPath: string = CONFIG_PATH): RelayConfig {
  if (!existsSync(configPath)) {
    // Create default config
    const configDir = dirname(configPath);
    if (!existsSync(configDir)) {
      mkdirSync(configDir, { recursive: true });
    }
    writeFileSync(configPath, JSON.stringify(DEFAULT_CONFIG, null, 2));
    return { ...DEFAULT_CONFIG };
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    const parsed: unknown = JSON.parse(content);
    if (!isRecord(parsed)) {
      throw new Error("config root must be a JSON object");
    }

    // Merge with defaults
    const config: RelayConfig = {
      debug: readBoolean(parsed, "debug", DEFAULT_CONFIG.debug),
      logRetentionDays: readNumber(parsed, "logRetentionDays", DEFAULT_CONFIG.logRetentionDays),
      minRequestIntervalMs: readNumber(parsed, "minRequestIntervalMs", DEFAULT_CONFIG.minRequestIntervalMs),
      maxMessageLength: readNumber(parsed, "maxMessageLength", DEFAULT_CONFIG.maxMessageLength),
      textModel: readString(parsed, "textModel", DEFAULT_CONFIG.textModel),
      imageModel: readString(parsed, "imageModel", DEFAULT_CONFIG.imageModel),
      voicePrompt: readString(parsed, "voicePrompt", DEFAULT_CONFIG.voicePrompt),
      backendTimeoutMs: readNumber(parsed, "backendTimeoutMs", DEFAULT_CONFIG.backendTimeoutMs),
      maxVoiceBytes: readNumber(parsed, "maxVoiceBytes", DEFAULT_CONFIG.maxVoiceBytes),
    };

    // Validate critical numeric values
    if (config.logRetentionDays < 1) {
      config.logRetentionDays = 1;
    }
    if (config.minRequestIntervalMs < 0) {
      config.minRequestIntervalMs = DEFAULT_CONFIG.minRequestIntervalMs;
    }
    if (!Number.isInteger(config.maxMessageLength) || config.maxMessageLength < 100) {
      config.maxMessageLength = DEFAULT_CONFIG.maxMessageLength;
    }
    if (config.maxMessageLength > TELEGRAM_MAX_MESSAGE_LENGTH) {
      console.warn(`[Config] maxMessageLength too high, clamping to ${TELEGRAM_MAX_MESSAGE_LENGTH}`);
      config.maxMessageLength = TELEGRAM_MAX_MESSAGE_LENGTH;
    }
    if (config.backendTimeoutMs < 0) {
      config.backendTimeoutMs = 0;
    }
    if (config.maxVoiceBytes <= 0) {
      config.maxVoiceBytes = DEFAULT_CONFIG.maxVoiceBytes;
    }

    return config;
  } catch (err) {
    console.error("[Config] Failed to load config, using defaults:", err);
    return { ...DEFAULT_CONFIG };
  }
}

export function getConfigPath(): string {
  return CONFIG_PATH;
}
