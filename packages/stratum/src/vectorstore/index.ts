import type { RetryConfig } from "@/config/config"
import { resolvePineconeEnv, validatePineconeEnv } from "@/config/env"
import type { VectorIndex } from "@/provider/types"
import { Log } from "@/util/log"
import { MemoryVectorIndex } from "./memory"
import { PineconeVectorIndex } from "./pinecone"

const log = Log.create({ service: "vectorstore" })

export { cosineSimilarity, MemoryVectorIndex } from "./memory"
export { batchUpsertRecords, PineconeVectorIndex } from "./pinecone"

/** Pinecone when both of its variables are set, the in-memory index otherwise. */
export function createVectorIndex(retry: Readonly<RetryConfig>): VectorIndex {
  validatePineconeEnv()
  const env = resolvePineconeEnv()
  if (env.apiKey && env.indexName) {
    return new PineconeVectorIndex(retry)
  }
  log.info("Pinecone is not configured, using the in-memory vector index")
  return new MemoryVectorIndex({ persist: true })
}
