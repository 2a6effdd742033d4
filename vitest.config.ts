import { defineConfig } from "vitest/config";

// Tests live under src/tests and exercise the library directly in Node;
// there is no DOM and no setup file.
export default defineConfig({
  test: {
    environment: "node",
    globals: true,
    include: ["src/tests/**/*.test.ts"],
    env: { NODE_ENV: "test" },
  },
});
