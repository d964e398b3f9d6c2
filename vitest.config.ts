import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.spec.ts"],
    // The ledger specs write database files; keep them off each other's toes.
    fileParallelism: false,
  },
});
