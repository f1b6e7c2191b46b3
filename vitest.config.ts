import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const root = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@lexcov\/cli\/(.*)$/, replacement: root("./apps/cli/src/$1.ts") },
      { find: /^@lexcov\/([a-z-]+)$/, replacement: root("./packages/$1/src/index.ts") },
    ],
  },
  test: {
    include: ["packages/tests/src/**/*.test.ts"],
    environment: "node",
  },
});
