import { defineConfig } from "vitest/config";

/**
 * One run covers every service. Tests use in-process fakes for Postgres,
 * Kafka and the HTTP collaborators.
 */
export default defineConfig({
  test: {
    include: ["*-service/tests/**/*.test.ts"],
    environment: "node",
    testTimeout: 10000,
    restoreMocks: true,
  },
});
