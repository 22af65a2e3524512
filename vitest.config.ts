import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    // Workspace packages resolve to their TypeScript sources.
    alias: {
      "@no-mercy/schema": new URL("./packages/schema/src/index.ts", import.meta.url).pathname,
      "@no-mercy/engine": new URL("./packages/engine/src/index.ts", import.meta.url).pathname,
    },
  },
});
