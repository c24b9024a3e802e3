import "dotenv/config";
import { env } from "./env";
import { loadConfig, getConfigPath } from "./config";
import { BOT_VERSION } from "./constants";
import { initLogger, info, warn, error, getLogDir, startLogMaintenance, stopLogMaintenance } from "./logger";
import { createAIBackend } from "./ai";
import { RequestDispatcher } from "./dispatcher";
import { RateLimiter } from "./rate-limiter";
import { AuthorizationStore } from "./storage";
import { createBot, registerCommandMenu, startPolling } from "./poller";

async function main(): Promise<void> {
  // Load configuration first
  const config = loadConfig();

  initLogger({
    debug: config.debug,
    logRetentionDays: config.logRetentionDays,
  });
  startLogMaintenance();

  info("daemon", "starting", {
    version: BOT_VERSION,
    configPath: getConfigPath(),
    logDir: getLogDir(),
    debug: config.debug,
    minRequestIntervalMs: config.minRequestIntervalMs,
    maxMessageLength: config.maxMessageLength,
  });

  const missing = [
    ...(env.TELEGRAM_BOT_TOKEN ? [] : ["TELEGRAM_BOT_TOKEN"]),
    ...(env.GEMINI_API_KEY ? [] : ["GEMINI_API_KEY"]),
  ];
  if (missing.length > 0) {
    error("daemon", "missing_credentials", { missing });
    stopLogMaintenance();
    process.exit(1);
  }

  if (env.ADMIN_USER_ID === null) {
    warn("daemon", "admin_not_configured", {
      message: "ADMIN_USER_ID is not set; nobody can run admin commands",
    });
  }

  const store = new AuthorizationStore(env.RELAY_USERS_FILE, env.ADMIN_USER_ID);
  store.load();

  const dispatcher = new RequestDispatcher({
    store,
    limiter: new RateLimiter({ minIntervalMs: config.minRequestIntervalMs }),
    backend: createAIBackend({
      apiKey: env.GEMINI_API_KEY,
      textModel: config.textModel,
      imageModel: config.imageModel,
      timeoutMs: config.backendTimeoutMs,
    }),
    maxMessageLength: config.maxMessageLength,
    voicePrompt: config.voicePrompt,
    maxVoiceBytes: config.maxVoiceBytes,
  });

  const bot = createBot(env.TELEGRAM_BOT_TOKEN, dispatcher);

  process.on("uncaughtException", (err) => {
    error("daemon", "uncaught_exception", {
      error: err.message,
      stack: err.stack?.split("\n").slice(0, 10).join("\n"),
    });
    stopLogMaintenance();
    setTimeout(() => process.exit(1), 200);
  });

  process.on("unhandledRejection", (reason) => {
    error("daemon", "unhandled_rejection", {
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack?.split("\n").slice(0, 5).join("\n") : undefined,
    });
  });

  const runner = await startPolling(bot);
  await registerCommandMenu(bot);

  let isShuttingDown = false;
  const shutdown = async (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    info("daemon", "shutdown_starting", { signal });
    if (runner.isRunning()) {
      await runner.stop();
    }
    info("daemon", "shutdown_complete");
    stopLogMaintenance();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err) => {
        error("daemon", "shutdown_error", { error: err instanceof Error ? err.message : String(err) });
        stopLogMaintenance();
        process.exit(1);
      });
    });
  }

  await runner.task();
}

main().catch((err) => {
  error("daemon", "fatal_error", {
    error: err instanceof Error ? err.message : String(err),
  });
  stopLogMaintenance();
  process.exit(1);
});
