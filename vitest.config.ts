import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    testTimeout: 10000,
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: ["src/web.ts", "src/types.ts", "src/interfaces.ts"],
      reporter: ["text", "text-summary", "html"],
    },
  },
});
