import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: [
      "shared/*/test/**/*.test.ts",
      "shell/*/test/**/*.test.ts",
      "plugins/*/test/**/*.test.ts",
    ],
    environment: "node",
    testTimeout: 15000,
  },
});
