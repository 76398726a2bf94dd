import type { LLMSceneDefinitions } from "./types"

export const LLM_SCENE_DEFINITIONS: LLMSceneDefinitions = {
  language: {
    "answer.generate": {
      providerId: "openai",
      modelId: process.env.STRATUM_ANSWER_MODEL?.trim() || "gpt-4o-mini",
    },
  },
  embedding: {
    "text.embedding": {
      providerId: "openai",
      modelId: process.env.STRATUM_EMBEDDING_MODEL?.trim() || "text-embedding-3-small",
    },
  },
}
