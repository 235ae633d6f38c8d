import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: [{ find: /^@\//, replacement: fileURLToPath(new URL("./", import.meta.url)) }]
  },
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
      PROVIDER_API_KEY: "test-secret",
      PROVIDER_API_BASE_URL: "https://provider.test",
      PROVIDER_HTTP_TIMEOUT_MS: "5000"
    }
  }
});
