import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    globals: true,
    include: ["__tests__/**/*.{test,spec}.ts"],
    setupFiles: ["__tests__/vitest.setup.ts"],
    coverage: {
      enabled: false,
    },
  },
});
