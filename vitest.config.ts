import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "happy-dom",
    include: ["ui/tests/**/*.test.ts"],
    setupFiles: ["./ui/tests/setup.ts"],
    restoreMocks: true,
  },
});
