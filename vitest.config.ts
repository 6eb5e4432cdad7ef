import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  test: {
    include: ["server/**/*.test.ts", "database/**/*.test.ts"],
    environment: "node",
  },
  resolve: {
    alias: {
      server: fileURLToPath(new URL("./server", import.meta.url)),
      "@database": fileURLToPath(new URL("./database", import.meta.url)),
    },
  },
});
