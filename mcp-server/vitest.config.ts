import { resolve } from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@lib": resolve(import.meta.dirname, "src/lib"),
      "@prompts": resolve(import.meta.dirname, "src/prompts"),
      "@tools": resolve(import.meta.dirname, "src/tools"),
    },
  },
  root: import.meta.dirname,
  test: {
    exclude: ["e2e/**", "node_modules/**"],
  },
});
