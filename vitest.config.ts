import { tmpdir } from "os";
import { join } from "path";
import { defineConfig } from "vitest/config";

const testRoot = join(tmpdir(), "telegram-ai-relay-tests");

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    env: {
      RELAY_DATA_DIR: testRoot,
      RELAY_LOG_DIR: join(testRoot, "logs"),
      RELAY_TMP_DIR: join(testRoot, "tmp"),
      RELAY_CONFIG: join(testRoot, "config", "relay.json"),
    },
  },
});
