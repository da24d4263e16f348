import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      utils: fileURLToPath(new URL("./utils", import.meta.url)),
    },
  },
  test: {
    include: ["utils/**/*.test.ts", "workflows/**/*.test.ts"],
    environment: "node",
  },
});
