import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: [
      {
        find: /^taskpoints-mcp$/,
        replacement: fileURLToPath(new URL("./taskpoints-mcp/src/lib.ts", import.meta.url)),
      },
    ],
  },
  test: {
    include: ["taskpoints-*/src/__tests__/**/*.test.ts"],
  },
});
