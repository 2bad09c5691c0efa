import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@hub": fileURLToPath(new URL("./src", import.meta.url)),
    },
  },
  test: {
    include: ["tests/**/*.test.ts"],
    globals: false,
    env: {
      MANIFEST_HUB_LOG_LEVEL: "silent",
      NODE_ENV: "test",
    },
  },
});
