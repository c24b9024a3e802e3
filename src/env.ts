/**
 * Environment configuration with sensible defaults
 * All paths can be overridden via environment variables
 */
import { homedir, tmpdir } from "os";
import { join } from "path";
import { parsePrincipalId } from "./utils";

const HOME = homedir();

// Determine project directory (works whether running from src/ or dist/)
const PROJECT_DIR = join(__dirname, "..");

const DATA_DIR = process.env.RELAY_DATA_DIR || join(HOME, ".telegram-ai-relay");

export const env = {
  // Credentials (checked at startup, never logged)
  TELEGRAM_BOT_TOKEN: process.env.TELEGRAM_BOT_TOKEN || "",
  GEMINI_API_KEY: process.env.GEMINI_API_KEY || "",

  // 0, empty or non-numeric means no admin is configured
  ADMIN_USER_ID: parsePrincipalId(process.env.ADMIN_USER_ID),

  // Core directories
  RELAY_DATA_DIR: DATA_DIR,
  RELAY_LOG_DIR: process.env.RELAY_LOG_DIR || join(DATA_DIR, "logs"),
  RELAY_TMP_DIR: process.env.RELAY_TMP_DIR || join(tmpdir(), "telegram-ai-relay"),
  RELAY_PROJECT_DIR: PROJECT_DIR,

  // Files
  RELAY_USERS_FILE: process.env.RELAY_USERS_FILE || join(DATA_DIR, "authorized_users.json"),
  RELAY_CONFIG: process.env.RELAY_CONFIG || join(PROJECT_DIR, "config", "relay.json"),
};
