import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts", "tests/**/*.test.ts"],
    testTimeout: 10_000,
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      // Boundary coverage: the surfaces producers and operators call
      include: [
        "src/filter/filter-engine.ts",
        "src/statement/generator.ts",
        "src/push/orchestrator.ts",
        "src/service/push-service.ts",
        "src/gateway/handlers.ts",
        "src/events/status-notifier.ts",
      ],
      exclude: [
        "src/**/__tests__/**",
        "src/testing/**",
        "src/schemas/**",   // Zod schemas tested via integration
      ],
    },
  },
});
