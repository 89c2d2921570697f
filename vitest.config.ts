import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    isolate: true,
    restoreMocks: true,
    clearMocks: true,
    environment: "node",
    include: ["src/**/*.{test,spec}.ts"],
    setupFiles: ["./src/test/setup.ts"],
    // Boundary tests spawn real processes
    testTimeout: 15000,
  },
});
