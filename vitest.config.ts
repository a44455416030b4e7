import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const root = dirname(fileURLToPath(import.meta.url));
const source = (path: string) => resolve(root, "packages", path);

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/test/**/*.test.ts"],
  },
  resolve: {
    alias: [
      { find: /^@labelflow\/core\/testing$/, replacement: source("core/src/testing/index.ts") },
      { find: /^@labelflow\/core$/, replacement: source("core/src/index.ts") },
      { find: /^@labelflow\/workflow$/, replacement: source("workflow/src/index.ts") },
    ],
  },
});
