import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    // the first shiki highlighter of a run loads its wasm engine and theme.
    testTimeout: 30_000
  }
});
