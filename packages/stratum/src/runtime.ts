import { HierarchicalChunker } from "@/chunker/hierarchical"
import { loadConfig, type StratumConfig } from "@/config/config"
import { loadEnv, resolvePineconeEnv } from "@/config/env"
import { ConfigurationError } from "@/error"
import { IndexService } from "@/indexing/service"
import { hasOpenAIKey } from "@/llm"
import { createEmbeddingProvider } from "@/provider/embedding"
import { createGenerationProvider } from "@/provider/generation"
import type { EmbeddingProvider, GenerationProvider, VectorIndex } from "@/provider/types"
import { AutoMergeEngine } from "@/retrieval/auto-merge"
import { BaseRetriever } from "@/retrieval/base-retriever"
import { QueryOrchestrator } from "@/retrieval/orchestrator"
import { TreeRepository } from "@/tree/repository"
import { NodeStore } from "@/tree/store"
import { Log } from "@/util/log"
import { createVectorIndex, MemoryVectorIndex } from "@/vectorstore"

const log = Log.create({ service: "runtime" })

export type Stratum = {
  config: StratumConfig
  store: NodeStore
  chunker: HierarchicalChunker
  embedder: EmbeddingProvider
  index: VectorIndex
  generator: GenerationProvider
  indexer: IndexService
  orchestrator: QueryOrchestrator
}

/** Wires one set of components. Providers not passed in are chosen from the environment. */
export function createStratum(input: {
  config: StratumConfig
  store?: NodeStore
  embedder?: EmbeddingProvider
  index?: VectorIndex
  generator?: GenerationProvider
  persist?: boolean
}): Stratum {
  const { config } = input
  const store = input.store ?? new NodeStore()
  const chunker = new HierarchicalChunker(config)
  const embedder =
    input.embedder ?? createEmbeddingProvider({ retry: config.retry, batchSize: config.embedding_batch_size })
  const index = input.index ?? createVectorIndex(config.retry)
  const generator = input.generator ?? createGenerationProvider({ retry: config.retry, offline: !hasOpenAIKey() })

  return {
    config,
    store,
    chunker,
    embedder,
    index,
    generator,
    indexer: new IndexService({ config, store, chunker, embedder, index, persist: input.persist }),
    orchestrator: new QueryOrchestrator({
      config,
      embedder,
      retriever: new BaseRetriever(index, config.retry),
      merger: new AutoMergeEngine(store, config),
      generator,
    }),
  }
}

/**
 * Loads `.env` and configuration, then restores persisted trees (and the
 * local vector snapshot when Pinecone is not configured).
 */
export async function openStratum(input: { configPath?: string } = {}): Promise<Stratum> {
  loadEnv()
  const config = loadConfig({ path: input.configPath })
  const pinecone = resolvePineconeEnv()
  if (pinecone.apiKey && pinecone.indexName && !hasOpenAIKey()) {
    throw new ConfigurationError("OPENAI_API_KEY is required when Pinecone is enabled")
  }

  const stratum = createStratum({ config })
  const trees = await TreeRepository.loadInto(stratum.store)
  const vectors = stratum.index instanceof MemoryVectorIndex ? await stratum.index.restore() : undefined
  log.info("opened", {
    trees,
    nodes: stratum.store.size,
    index: stratum.index.name,
    embedder: stratum.embedder.name,
    ...(vectors === undefined ? {} : { vectors }),
  })
  return stratum
}
