import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
    setupFiles: ["./tests/setup.ts"],
    env: {
      // Keep the developer's own key and global config out of the tests
      DEEPSEEK_API_KEY: "",
    },
    testTimeout: 10000,
  },
});
