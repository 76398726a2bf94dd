import { fileURLToPath } from "node:url"
import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/test/**/*.test.ts"],
    testTimeout: 15_000,
    env: {
      OPENAI_API_KEY: "",
      PINECONE_API_KEY: "",
      STRATUM_PINECONE_INDEX: "",
      STRATUM_LOG_LEVEL: "ERROR",
    },
  },
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./packages/stratum/src", import.meta.url)),
    },
  },
})
